import test from 'node:test';
import assert from 'node:assert/strict';
import { once } from 'node:events';

import { createApp, type AppOptions } from './app';
import { MemoryGateway } from './gateway/memory.gateway';
import type { VerifyIdToken } from './middleware/auth';

const NOW = 1_700_000_000_000;

// "test-<uid>" is the only token shape this stand-in accepts.
const verifyIdToken: VerifyIdToken = async (token) => {
  if (!token.startsWith('test-')) {
    throw new Error('token rejected');
  }
  const uid = token.slice('test-'.length);
  return { uid, email: `${uid}@example.test` };
};

type Call = (method: string, path: string, options?: { token?: string; body?: unknown }) => Promise<{
  status: number;
  body: unknown;
}>;

async function withServer(run: (call: Call, gateway: MemoryGateway) => Promise<void>, overrides: Partial<AppOptions> = {}) {
  const gateway = new MemoryGateway();
  let nextId = 0;
  const app = createApp({
    gateway,
    verifyIdToken,
    nodeEnv: 'test',
    accessLog: false,
    now: () => NOW,
    generateId: () => `r-${++nextId}`,
    ...overrides
  });

  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server did not bind a TCP port');
  }
  const baseUrl = `http://127.0.0.1:${address.port}`;

  const call: Call = async (method, path, options = {}) => {
    const headers: Record<string, string> = {};
    if (options.token) headers.authorization = `Bearer ${options.token}`;
    if (options.body !== undefined) headers['content-type'] = 'application/json';
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body)
    });
    const text = await response.text();
    const isJson = (response.headers.get('content-type') ?? '').includes('application/json');
    const body: unknown = isJson && text ? JSON.parse(text) : text || null;
    return { status: response.status, body };
  };

  try {
    await run(call, gateway);
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  }
}

async function register(call: Call, uid: string, role: string) {
  const response = await call('POST', '/api/v1/users', {
    token: `test-${uid}`,
    body: { fullName: uid, role, location: 'Haifa' }
  });
  assert.equal(response.status, 201);
}

test('GET /health answers ok', async () => {
  await withServer(async (call) => {
    const response = await call('GET', '/health');
    assert.equal(response.status, 200);
    assert.ok(typeof response.body === 'object' && response.body !== null && 'status' in response.body);
    assert.equal(response.body.status, 'ok');
  });
});

test('protected routes refuse missing and invalid tokens', async () => {
  await withServer(async (call) => {
    assert.deepEqual(await call('POST', '/api/v1/requests', { body: { text: 'x', location: 'y' } }), {
      status: 401,
      body: { message: 'Missing Authorization header' }
    });
    assert.deepEqual(await call('POST', '/api/v1/requests', { token: 'forged', body: { text: 'x', location: 'y' } }), {
      status: 401,
      body: { message: 'Invalid or expired token' }
    });
  });
});

test('POST /api/v1/users registers the caller with the email from the token', async () => {
  await withServer(async (call) => {
    const response = await call('POST', '/api/v1/users', { token: 'test-u-victim', body: { fullName: 'Vic' } });
    assert.deepEqual(response, {
      status: 201,
      body: {
        id: 'u-victim',
        email: 'u-victim@example.test',
        fullName: 'Vic',
        role: 'affected_individual',
        location: '',
        createdAt: NOW,
        userStatus: 'active',
        version: 0
      }
    });

    const again = await call('POST', '/api/v1/users', { token: 'test-u-victim', body: { fullName: 'Vic' } });
    assert.equal(again.status, 409);
  });
});

test('a request moves through its lifecycle over HTTP', async () => {
  await withServer(async (call) => {
    await register(call, 'u-victim', 'affected_individual');
    await register(call, 'u-vol', 'volunteer');

    const created = await call('POST', '/api/v1/requests', {
      token: 'test-u-victim',
      body: { text: 'need water', location: 'Haifa' }
    });
    const pending = {
      id: 'r-1',
      submitterId: 'u-victim',
      text: 'need water',
      urgency: 'Unknown',
      category: 'Other',
      location: 'Haifa',
      status: 'pending',
      createdAt: NOW,
      lastUpdated: null,
      assignedResponderId: null,
      version: 0
    };
    assert.deepEqual(created, { status: 201, body: pending });

    assert.deepEqual(
      await call('POST', '/api/v1/requests/r-1/transition', { token: 'test-u-victim', body: { status: 'processing' } }),
      {
        status: 403,
        body: {
          message: 'Only volunteers and first responders can update request status',
          code: 'Denied',
          retryable: false
        }
      }
    );

    const accepted = await call('POST', '/api/v1/requests/r-1/transition', {
      token: 'test-u-vol',
      body: { status: 'processing' }
    });
    assert.deepEqual(accepted, {
      status: 200,
      body: { ...pending, status: 'processing', assignedResponderId: 'u-vol', lastUpdated: NOW, version: 1 }
    });

    const resolved = await call('POST', '/api/v1/requests/r-1/transition', {
      token: 'test-u-vol',
      body: { status: 'resolved' }
    });
    assert.equal(resolved.status, 200);

    assert.deepEqual(
      await call('POST', '/api/v1/requests/r-1/transition', { token: 'test-u-vol', body: { status: 'resolved' } }),
      {
        status: 422,
        body: {
          message: 'Request r-1 is already resolved',
          code: 'InvalidTransition',
          retryable: false,
          details: { from: 'resolved', to: 'resolved' }
        }
      }
    );
  });
});

test('public reads never verify a token, even a forged one', async () => {
  let verifications = 0;
  const countingVerifier: VerifyIdToken = async (token) => {
    verifications += 1;
    return verifyIdToken(token);
  };
  await withServer(
    async (call) => {
      assert.deepEqual(await call('GET', '/api/v1/requests', { token: 'forged' }), { status: 200, body: { items: [] } });
      assert.deepEqual(await call('GET', '/api/v1/volunteers', { token: 'forged' }), { status: 200, body: { items: [] } });
      assert.equal(verifications, 0);
    },
    { verifyIdToken: countingVerifier }
  );
});

test('transition bodies are validated before the service runs', async () => {
  await withServer(async (call) => {
    const response = await call('POST', '/api/v1/requests/r-1/transition', {
      token: 'test-u-vol',
      body: { status: 'done' }
    });
    assert.equal(response.status, 400);
    assert.ok(typeof response.body === 'object' && response.body !== null && 'message' in response.body);
    assert.equal(response.body.message, 'Invalid body');
  });
});

test('GET /api/v1/requests lists items and unknown ids are 404', async () => {
  await withServer(async (call) => {
    await register(call, 'u-victim', 'affected_individual');
    await call('POST', '/api/v1/requests', { token: 'test-u-victim', body: { text: 'a', location: 'Haifa', urgency: 'Low' } });
    await call('POST', '/api/v1/requests', { token: 'test-u-victim', body: { text: 'b', location: 'Haifa', urgency: 'High' } });

    const listed = await call('GET', '/api/v1/requests?status=pending');
    assert.equal(listed.status, 200);
    assert.ok(typeof listed.body === 'object' && listed.body !== null && 'items' in listed.body);
    assert.ok(Array.isArray(listed.body.items));
    assert.deepEqual(
      listed.body.items.map((item: { id: string }) => item.id),
      ['r-2', 'r-1']
    );

    assert.deepEqual(await call('GET', '/api/v1/requests/r-404'), {
      status: 404,
      body: { message: 'requests/r-404 not found', code: 'NotFound', retryable: false }
    });
  });
});

test('GET /api/v1/requests/:id/candidates ranks matching specialists first', async () => {
  await withServer(async (call) => {
    await register(call, 'u-victim', 'affected_individual');
    await register(call, 'u-vol', 'volunteer');
    await register(call, 'u-medic', 'volunteer');
    await call('POST', '/api/v1/volunteers', {
      token: 'test-u-vol',
      body: { specialties: ['Food Distribution'], availability: 'Available on weekends', experience: '' }
    });
    await call('POST', '/api/v1/volunteers', {
      token: 'test-u-medic',
      body: { specialties: ['Medical'], availability: 'Available on weekends', experience: '' }
    });
    await call('POST', '/api/v1/requests', {
      token: 'test-u-victim',
      body: { text: 'broken leg', location: 'Haifa', category: 'Medical' }
    });

    assert.deepEqual(await call('GET', '/api/v1/requests/r-1/candidates'), {
      status: 200,
      body: { requestId: 'r-1', candidates: ['u-medic', 'u-vol'] }
    });
  });
});

test('store outages answer 503 and are marked retryable', async () => {
  await withServer(async (call, gateway) => {
    gateway.setUnavailable(true);
    assert.deepEqual(await call('GET', '/api/v1/requests'), {
      status: 503,
      body: { message: 'Document store is unavailable', code: 'Unavailable', retryable: true }
    });
  });
});

test('mutating calls are rate limited per client', async () => {
  await withServer(
    async (call) => {
      const body = { text: 'x', location: 'y' };
      assert.equal((await call('POST', '/api/v1/requests', { body })).status, 401);
      assert.equal((await call('POST', '/api/v1/requests', { body })).status, 401);
      assert.equal((await call('POST', '/api/v1/requests', { body })).status, 429);
      assert.equal((await call('GET', '/api/v1/requests')).status, 200);
    },
    { rateLimitMax: 2 }
  );
});

test('unknown routes answer 404', async () => {
  await withServer(async (call) => {
    assert.deepEqual(await call('GET', '/api/v2/nothing'), { status: 404, body: { message: 'Not Found' } });
  });
});
