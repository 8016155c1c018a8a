import test from 'node:test';
import assert from 'node:assert/strict';

import { availabilityScore, categoryMatches, proximityScore, rankCandidates } from './assignment';
import { initialRequest } from './lifecycle';
import type { VolunteerProfile } from './types';

function profile(id: string, overrides: Partial<VolunteerProfile> = {}): VolunteerProfile {
  return {
    id,
    email: `${id}@example.test`,
    name: id,
    role: 'volunteer',
    location: '',
    specialties: [],
    availability: '',
    experience: '',
    userStatus: 'active',
    createdAt: 1_000,
    version: 0,
    ...overrides
  };
}

const medicalRequest = initialRequest(
  'r-1',
  'u-victim',
  { text: 'my neighbour fainted', location: 'Haifa', category: 'Medical' },
  5_000
);

test('a Medical request ranks the Medical-tagged profile ahead of the Food-tagged one', () => {
  const pool = [profile('food', { specialties: ['Food'] }), profile('medic', { specialties: ['Medical'] })];
  assert.deepEqual(rankCandidates(medicalRequest, pool), ['medic', 'food']);
});

test('category tags include the related registration specialties', () => {
  assert.equal(categoryMatches('Food', ['Food Distribution']), true);
  assert.equal(categoryMatches('Evacuation', [' search & rescue ']), true);
  assert.equal(categoryMatches('Medical', ['Logistics']), false);
  assert.equal(categoryMatches('Other', ['other']), true);
  assert.equal(categoryMatches('Other', ['Medical']), false);
});

test('availability breaks ties between equally matched profiles', () => {
  const pool = [
    profile('weekends', { specialties: ['Medical'], availability: 'Available on weekends' }),
    profile('always', { specialties: ['Medical'], availability: 'Available immediately (24/7)' }),
    profile('unknown', { specialties: ['Medical'], availability: 'whenever' })
  ];
  assert.deepEqual(rankCandidates(medicalRequest, pool), ['always', 'weekends', 'unknown']);
  assert.equal(availabilityScore('whenever'), 0);
});

test('category match outranks availability', () => {
  const pool = [
    profile('idle-driver', { specialties: ['Transportation'], availability: 'Available immediately (24/7)' }),
    profile('busy-medic', { specialties: ['Medical'], availability: 'Limited availability (specify in experience)' })
  ];
  assert.deepEqual(rankCandidates(medicalRequest, pool), ['busy-medic', 'idle-driver']);
});

test('location proximity prefers exact over substring over none', () => {
  assert.equal(proximityScore('Haifa', ' haifa '), 2);
  assert.equal(proximityScore('Haifa, Hadar', 'Haifa'), 1);
  assert.equal(proximityScore('Haifa', 'Eilat'), 0);
  assert.equal(proximityScore('', 'Haifa'), 0);

  const pool = [
    profile('far', { location: 'Eilat' }),
    profile('near', { location: 'haifa port area' }),
    profile('here', { location: 'Haifa' })
  ];
  assert.deepEqual(rankCandidates(medicalRequest, pool), ['here', 'near', 'far']);
});

test('remaining ties fall back to the oldest profile, then id', () => {
  const pool = [profile('b', { createdAt: 2_000 }), profile('c'), profile('a')];
  assert.deepEqual(rankCandidates(medicalRequest, pool), ['a', 'c', 'b']);
});

test('an empty pool yields no candidates', () => {
  assert.deepEqual(rankCandidates(medicalRequest, []), []);
});
