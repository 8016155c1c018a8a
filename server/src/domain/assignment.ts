import type { EmergencyRequest, RequestCategory, VolunteerProfile } from './types';

/** Orders candidate profiles for a request, best first. Returns profile ids. */
export type CandidateRanker = (request: EmergencyRequest, pool: readonly VolunteerProfile[]) => string[];

// Specialty tags offered at volunteer registration that serve each category.
const SPECIALTIES_BY_CATEGORY: Record<RequestCategory, readonly string[]> = {
  Medical: ['medical', 'mental health'],
  Food: ['food distribution', 'logistics'],
  Shelter: ['logistics', 'technical (electricity/water/gas)', 'childcare', 'elder care'],
  Evacuation: ['search & rescue', 'transportation', 'firefighting'],
  Other: []
};

const AVAILABILITY_SCORES: Record<string, number> = {
  'available immediately (24/7)': 4,
  'available during emergencies only': 3,
  'available on weekdays': 2,
  'available on weekends': 2,
  'limited availability (specify in experience)': 1
};

const normalize = (value: string) => value.trim().toLowerCase();

export function categoryMatches(category: RequestCategory, specialties: readonly string[]): boolean {
  const wanted = new Set([normalize(category), ...SPECIALTIES_BY_CATEGORY[category]]);
  return specialties.some((tag) => wanted.has(normalize(tag)));
}

export function availabilityScore(availability: string): number {
  return AVAILABILITY_SCORES[normalize(availability)] ?? 0;
}

/** 2 for the same place, 1 when one names the other, 0 otherwise. */
export function proximityScore(requestLocation: string, profileLocation: string): number {
  const a = normalize(requestLocation);
  const b = normalize(profileLocation);
  if (!a || !b) return 0;
  if (a === b) return 2;
  if (a.includes(b) || b.includes(a)) return 1;
  return 0;
}

export const rankCandidates: CandidateRanker = (request, pool) => {
  const scored = pool.map((profile) => ({
    profile,
    category: categoryMatches(request.category, profile.specialties) ? 1 : 0,
    availability: availabilityScore(profile.availability),
    proximity: proximityScore(request.location, profile.location)
  }));

  scored.sort(
    (a, b) =>
      b.category - a.category ||
      b.availability - a.availability ||
      b.proximity - a.proximity ||
      a.profile.createdAt - b.profile.createdAt ||
      a.profile.id.localeCompare(b.profile.id)
  );

  return scored.map(({ profile }) => profile.id);
};
