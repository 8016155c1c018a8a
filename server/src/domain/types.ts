export const USER_ROLES = ['affected_individual', 'volunteer', 'first_responder'] as const;
export const RESPONDER_ROLES = ['volunteer', 'first_responder'] as const;
export const URGENCY_LEVELS = ['High', 'Medium', 'Low', 'Unknown'] as const;
export const REQUEST_CATEGORIES = ['Medical', 'Food', 'Shelter', 'Evacuation', 'Other'] as const;
export const REQUEST_STATUSES = ['pending', 'processing', 'resolved'] as const;
export const PRESENCE_STATUSES = ['active', 'offline'] as const;

export type UserRole = (typeof USER_ROLES)[number];
export type ResponderRole = (typeof RESPONDER_ROLES)[number];
export type Urgency = (typeof URGENCY_LEVELS)[number];
export type RequestCategory = (typeof REQUEST_CATEGORIES)[number];
export type RequestStatus = (typeof REQUEST_STATUSES)[number];
export type PresenceStatus = (typeof PRESENCE_STATUSES)[number];

/** Epoch milliseconds. */
export type Millis = number;

export type User = {
  id: string;
  email: string;
  fullName: string;
  /** Fixed at creation. */
  role: UserRole;
  location: string;
  createdAt: Millis;
  userStatus: PresenceStatus;
  version: number;
};

export type EmergencyRequest = {
  id: string;
  submitterId: string;
  text: string;
  urgency: Urgency;
  category: RequestCategory;
  location: string;
  status: RequestStatus;
  createdAt: Millis;
  /** Null until the first status change. */
  lastUpdated: Millis | null;
  assignedResponderId: string | null;
  version: number;
};

export type VolunteerProfile = {
  /** Same id as the owning user. */
  id: string;
  email: string;
  name: string;
  role: ResponderRole;
  location: string;
  specialties: string[];
  availability: string;
  experience: string;
  userStatus: PresenceStatus;
  createdAt: Millis;
  version: number;
};

/** Reserves a normalised email for one user; the email is the document id. */
export type EmailClaim = {
  id: string;
  userId: string;
  createdAt: Millis;
  version: number;
};

export type Entities = {
  users: User;
  requests: EmergencyRequest;
  volunteers: VolunteerProfile;
  emails: EmailClaim;
};

export type CollectionName = keyof Entities;

/**
 * The authenticated identity behind a call. `role` is null until the
 * identity has registered a user record.
 */
export type Actor = {
  id: string;
  role: UserRole | null;
};

export function isResponderRole(role: UserRole | null): role is ResponderRole {
  return role === 'volunteer' || role === 'first_responder';
}
