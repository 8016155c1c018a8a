import { Timestamp } from 'firebase-admin/firestore';
import { z } from 'zod';

import {
  PRESENCE_STATUSES,
  REQUEST_CATEGORIES,
  REQUEST_STATUSES,
  RESPONDER_ROLES,
  URGENCY_LEVELS,
  USER_ROLES,
  type CollectionName,
  type EmailClaim,
  type EmergencyRequest,
  type Entities,
  type User,
  type VolunteerProfile
} from '../domain/types';

export type StoredDocument = Record<string, unknown>;

// Stored values may be plain millis or Firestore timestamps written by other clients.
const millis = z.union([z.number(), z.instanceof(Timestamp).transform((value) => value.toMillis())]);

const version = z.number().int().min(0).default(0);

const userDocument = z
  .object({
    id: z.string().min(1),
    // Older clients stored emails as typed.
    email: z.string().trim().toLowerCase().email(),
    fullName: z.string(),
    role: z.enum(USER_ROLES),
    location: z.string().default(''),
    created_at: millis,
    user_status: z.enum(PRESENCE_STATUSES).catch('active'),
    version
  })
  .transform(
    (doc): User => ({
      id: doc.id,
      email: doc.email,
      fullName: doc.fullName,
      role: doc.role,
      location: doc.location,
      createdAt: doc.created_at,
      userStatus: doc.user_status,
      version: doc.version
    })
  );

const requestDocument = z
  .object({
    id: z.string().min(1),
    submitterId: z.string().min(1),
    text: z.string().min(1),
    urgency: z.enum(URGENCY_LEVELS).catch('Unknown'),
    type: z.enum(REQUEST_CATEGORIES).catch('Other'),
    location: z.string(),
    status: z.enum(REQUEST_STATUSES),
    timestamp: millis,
    lastUpdated: millis.nullable().default(null),
    assigned_to: z.string().min(1).nullable().default(null),
    version
  })
  .transform(
    (doc): EmergencyRequest => ({
      id: doc.id,
      submitterId: doc.submitterId,
      text: doc.text,
      urgency: doc.urgency,
      category: doc.type,
      location: doc.location,
      status: doc.status,
      createdAt: doc.timestamp,
      lastUpdated: doc.lastUpdated,
      assignedResponderId: doc.assigned_to,
      version: doc.version
    })
  );

const volunteerDocument = z
  .object({
    id: z.string().min(1),
    email: z.string().email(),
    name: z.string(),
    role: z.enum(RESPONDER_ROLES),
    location: z.string().default(''),
    specialties: z.array(z.string()).default([]),
    availability: z.string().default(''),
    experience: z.string().default(''),
    user_status: z.enum(PRESENCE_STATUSES).catch('active'),
    created_at: millis,
    version
  })
  .transform(
    (doc): VolunteerProfile => ({
      id: doc.id,
      email: doc.email,
      name: doc.name,
      role: doc.role,
      location: doc.location,
      specialties: doc.specialties,
      availability: doc.availability,
      experience: doc.experience,
      userStatus: doc.user_status,
      createdAt: doc.created_at,
      version: doc.version
    })
  );

const emailClaimDocument = z
  .object({
    id: z.string().min(1),
    userId: z.string().min(1),
    created_at: millis,
    version
  })
  .transform(
    (doc): EmailClaim => ({
      id: doc.id,
      userId: doc.userId,
      createdAt: doc.created_at,
      version: doc.version
    })
  );

type Codec<T> = {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  encode: (entity: T) => StoredDocument;
  /** Stored field name for each domain field. */
  fields: { [K in keyof T]-?: string };
};

const userCodec: Codec<User> = {
  schema: userDocument,
  encode: (user) => ({
    id: user.id,
    email: user.email,
    fullName: user.fullName,
    role: user.role,
    location: user.location,
    created_at: user.createdAt,
    user_status: user.userStatus,
    version: user.version
  }),
  fields: {
    id: 'id',
    email: 'email',
    fullName: 'fullName',
    role: 'role',
    location: 'location',
    createdAt: 'created_at',
    userStatus: 'user_status',
    version: 'version'
  }
};

const requestCodec: Codec<EmergencyRequest> = {
  schema: requestDocument,
  encode: (request) => ({
    id: request.id,
    submitterId: request.submitterId,
    text: request.text,
    urgency: request.urgency,
    type: request.category,
    location: request.location,
    status: request.status,
    timestamp: request.createdAt,
    lastUpdated: request.lastUpdated,
    assigned_to: request.assignedResponderId,
    version: request.version
  }),
  fields: {
    id: 'id',
    submitterId: 'submitterId',
    text: 'text',
    urgency: 'urgency',
    category: 'type',
    location: 'location',
    status: 'status',
    createdAt: 'timestamp',
    lastUpdated: 'lastUpdated',
    assignedResponderId: 'assigned_to',
    version: 'version'
  }
};

const volunteerCodec: Codec<VolunteerProfile> = {
  schema: volunteerDocument,
  encode: (profile) => ({
    id: profile.id,
    email: profile.email,
    name: profile.name,
    role: profile.role,
    location: profile.location,
    specialties: [...new Set(profile.specialties)],
    availability: profile.availability,
    experience: profile.experience,
    user_status: profile.userStatus,
    created_at: profile.createdAt,
    version: profile.version
  }),
  fields: {
    id: 'id',
    email: 'email',
    name: 'name',
    role: 'role',
    location: 'location',
    specialties: 'specialties',
    availability: 'availability',
    experience: 'experience',
    userStatus: 'user_status',
    createdAt: 'created_at',
    version: 'version'
  }
};

const emailClaimCodec: Codec<EmailClaim> = {
  schema: emailClaimDocument,
  encode: (claim) => ({
    id: claim.id,
    userId: claim.userId,
    created_at: claim.createdAt,
    version: claim.version
  }),
  fields: {
    id: 'id',
    userId: 'userId',
    createdAt: 'created_at',
    version: 'version'
  }
};

export const codecs: { [C in CollectionName]: Codec<Entities[C]> } = {
  users: userCodec,
  requests: requestCodec,
  volunteers: volunteerCodec,
  emails: emailClaimCodec
};

export type DecodeOutcome<T> = { ok: true; value: T } | { ok: false; issues: string[] };

export function decodeDocument<C extends CollectionName>(
  collection: C,
  data: unknown
): DecodeOutcome<Entities[C]> {
  const parsed = codecs[collection].schema.safeParse(data);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  return {
    ok: false,
    issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
  };
}

/**
 * Encodes an entity and checks the result against the collection schema,
 * so nothing reaches the store that a later read could not decode.
 */
export function encodeDocument<C extends CollectionName>(
  collection: C,
  entity: Entities[C]
): DecodeOutcome<StoredDocument> {
  const document = codecs[collection].encode(entity);
  const check = decodeDocument(collection, document);
  return check.ok ? { ok: true, value: document } : check;
}

export function storedField<C extends CollectionName>(collection: C, field: keyof Entities[C]): string {
  return codecs[collection].fields[field];
}
