import test from 'node:test';
import assert from 'node:assert/strict';
import { Timestamp } from 'firebase-admin/firestore';

import { decodeDocument, encodeDocument, storedField } from './codec';
import { initialRequest } from '../domain/lifecycle';

test('requests are stored under the existing SafeBridge field names', () => {
  const request = {
    ...initialRequest('r-1', 'u-1', { text: 'need water', location: 'Haifa', category: 'Food' }, 1_000),
    status: 'processing' as const,
    assignedResponderId: 'u-vol',
    lastUpdated: 2_000,
    version: 1
  };

  const encoded = encodeDocument('requests', request);
  assert.deepEqual(encoded, {
    ok: true,
    value: {
      id: 'r-1',
      submitterId: 'u-1',
      text: 'need water',
      urgency: 'Unknown',
      type: 'Food',
      location: 'Haifa',
      status: 'processing',
      timestamp: 1_000,
      lastUpdated: 2_000,
      assigned_to: 'u-vol',
      version: 1
    }
  });
});

test('legacy request documents decode with defaults', () => {
  const decoded = decodeDocument('requests', {
    id: 'r-legacy',
    submitterId: 'u-1',
    text: 'flooded basement',
    urgency: 'Critical',
    type: 'Unknown',
    location: 'User reported location',
    timestamp: 1_500,
    status: 'pending',
    lastUpdated: null
  });

  assert.deepEqual(decoded, {
    ok: true,
    value: {
      id: 'r-legacy',
      submitterId: 'u-1',
      text: 'flooded basement',
      urgency: 'Unknown',
      category: 'Other',
      location: 'User reported location',
      status: 'pending',
      createdAt: 1_500,
      lastUpdated: null,
      assignedResponderId: null,
      version: 0
    }
  });
});

test('Firestore timestamps decode to epoch millis', () => {
  const decoded = decodeDocument('users', {
    id: 'u-1',
    email: 'dana@example.test',
    fullName: 'Dana',
    role: 'volunteer',
    location: 'Haifa',
    created_at: Timestamp.fromMillis(1_700_000_000_000),
    user_status: 'active'
  });
  assert.equal(decoded.ok, true);
  if (decoded.ok) assert.equal(decoded.value.createdAt, 1_700_000_000_000);
});

test('stored passwords are never part of the decoded user', () => {
  const decoded = decodeDocument('users', {
    id: 'u-1',
    email: 'dana@example.test',
    password: 'test-password',
    fullName: 'Dana',
    role: 'affected_individual',
    location: '',
    created_at: 1
  });
  assert.equal(decoded.ok, true);
  if (decoded.ok) assert.equal('password' in decoded.value, false);
});

test('emails typed in mixed case by older clients decode lower-cased', () => {
  const decoded = decodeDocument('users', {
    id: 'u-1',
    email: ' Dana@Example.TEST',
    fullName: 'Dana',
    role: 'volunteer',
    location: '',
    created_at: 1
  });
  assert.equal(decoded.ok && decoded.value.email, 'dana@example.test');
});

test('email claims keep their owner and stored creation time', () => {
  const claim = { id: 'dana@example.test', userId: 'u-1', createdAt: 1_000, version: 0 };
  const encoded = encodeDocument('emails', claim);
  assert.deepEqual(encoded, {
    ok: true,
    value: { id: 'dana@example.test', userId: 'u-1', created_at: 1_000, version: 0 }
  });
  if (encoded.ok) assert.deepEqual(decodeDocument('emails', encoded.value), { ok: true, value: claim });
});

test('documents outside the schema are rejected with the offending path', () => {
  const decoded = decodeDocument('users', {
    id: 'u-1',
    email: 'dana@example.test',
    fullName: 'Dana',
    role: 'admin',
    created_at: 1
  });
  assert.equal(decoded.ok, false);
  if (!decoded.ok) assert.ok(decoded.issues.some((issue) => issue.startsWith('role:')));
});

test('encoding refuses entities the schema would not read back', () => {
  const encoded = encodeDocument('requests', initialRequest('r-1', 'u-1', { text: '', location: 'Haifa' }, 1));
  assert.equal(encoded.ok, false);
});

test('queryable fields map to their stored names', () => {
  assert.equal(storedField('requests', 'category'), 'type');
  assert.equal(storedField('requests', 'assignedResponderId'), 'assigned_to');
  assert.equal(storedField('users', 'userStatus'), 'user_status');
  assert.equal(storedField('volunteers', 'specialties'), 'specialties');
});
