import { afterEach, describe, expect, it } from 'vitest';

import {
  VcenterHttpError,
  VcenterParseError,
  deploymentErrorMessages,
  findDatacenterByName,
  findLibraryItemByName,
  findResourcePoolByName,
  getCluster,
  openRestSession,
  resolveVcenterPlan,
  vapiErrorMessages,
} from '../client';

import { startMockVcenter } from '@/test/mock-vcenter';

import type { MockHandler, MockVcenter } from '@/test/mock-vcenter';

describe('vapiErrorMessages', () => {
  it('reads /api error bodies', () => {
    const body = JSON.stringify({
      error_type: 'NOT_ALLOWED_IN_CURRENT_STATE',
      messages: [
        { id: 'a', default_message: 'The library item is being synchronized.' },
        { id: 'b', default_message: '  ' },
      ],
    });
    expect(vapiErrorMessages(body)).toEqual(['The library item is being synchronized.']);
  });

  it('reads /rest error bodies wrapped in value', () => {
    const body = JSON.stringify({
      type: 'com.vmware.vapi.std.errors.not_found',
      value: { messages: [{ id: 'c', default_message: 'Resource pool resgroup-99 not found.' }] },
    });
    expect(vapiErrorMessages(body)).toEqual(['Resource pool resgroup-99 not found.']);
  });

  it('returns nothing for bodies that are not vAPI errors', () => {
    expect(vapiErrorMessages('<html>502</html>')).toEqual([]);
    expect(vapiErrorMessages(JSON.stringify({ messages: 'nope' }))).toEqual([]);
  });
});

describe('deploymentErrorMessages', () => {
  it('prefers the localized message and falls back to the category', () => {
    expect(
      deploymentErrorMessages({
        succeeded: false,
        error: {
          errors: [
            { category: 'SERVER', message: { id: 'x', default_message: 'Disk too small.' } },
            { category: 'INPUT', message: null },
          ],
        },
      }),
    ).toEqual(['Disk too small.', 'INPUT']);
  });
});

describe('resolveVcenterPlan', () => {
  it('maps versions to API roots', () => {
    expect(resolveVcenterPlan('7.0-8.x')).toEqual({ apiRoot: 'api', sessionPath: '/api/session', filterPrefix: '' });
    expect(resolveVcenterPlan('6.5-6.7')).toEqual({
      apiRoot: 'rest',
      sessionPath: '/rest/com/vmware/cis/session',
      filterPrefix: 'filter.',
    });
  });
});

describe('REST client against a 6.7 endpoint', () => {
  let mock: MockVcenter | undefined;

  afterEach(async () => {
    await mock?.close();
    mock = undefined;
  });

  const legacyVcenter: MockHandler = (req) => {
    const path = req.url.pathname;
    // 6.7 has no /api root at all.
    if (path.startsWith('/api/')) return undefined;
    if (path === '/rest/com/vmware/cis/session' && req.method === 'POST') return { json: { value: 'legacy-token' } };
    if (req.headers['vmware-api-session-id'] !== 'legacy-token') return { status: 401, json: { type: 'unauthenticated' } };
    if (path === '/rest/vcenter/datacenter') {
      return { json: { value: req.url.searchParams.get('filter.names') === 'DC 1' ? [{ datacenter: 'datacenter-2', name: 'DC 1' }] : [] } };
    }
    if (path === '/rest/vcenter/resource-pool') return { json: { value: [{ resource_pool: 'resgroup-5', name: 'Pool1' }] } };
    if (path === '/rest/vcenter/cluster/domain-c7') return { json: { value: { name: 'C1', resource_pool: 'resgroup-8' } } };
    if (path === '/rest/com/vmware/content/library/item' && req.url.search === '?~action=find') {
      return { json: { value: ['item-9'] } };
    }
    return undefined;
  };

  it('falls back from /api to /rest when the session endpoint is unknown', async () => {
    const server = await startMockVcenter(legacyVcenter);
    mock = server;

    const session = await openRestSession({
      endpoint: server.endpoint,
      username: 'admin',
      password: 'test-secret',
      validateCerts: true,
      timeoutMs: 5_000,
    });

    expect(session.plan.apiRoot).toBe('rest');
    expect(session.token).toBe('legacy-token');
    expect(server.requests.map((r) => r.url.pathname)).toEqual(['/api/session', '/rest/com/vmware/cis/session']);
  });

  it('uses filter. query names, ~action and spec envelopes', async () => {
    const server = await startMockVcenter(legacyVcenter);
    mock = server;
    const session = await openRestSession({
      endpoint: server.endpoint,
      username: 'admin',
      password: 'test-secret',
      validateCerts: true,
      version: '6.5-6.7',
      timeoutMs: 5_000,
    });

    expect(await findDatacenterByName(session, 'DC 1')).toBe('datacenter-2');
    expect(server.requests.at(-1)?.url.search).toBe('?filter.names=DC%201');

    expect(
      await findResourcePoolByName(session, { datacenterId: 'datacenter-2', name: 'Pool1', clusterId: 'domain-c7' }),
    ).toBe('resgroup-5');
    expect(server.requests.at(-1)?.url.search).toBe(
      '?filter.names=Pool1&filter.datacenters=datacenter-2&filter.clusters=domain-c7',
    );

    expect(await getCluster(session, 'domain-c7')).toEqual({ name: 'C1', resource_pool: 'resgroup-8' });

    expect(await findLibraryItemByName(session, 'rhel9', 'lib-1')).toBe('item-9');
    expect(JSON.parse(server.requests.at(-1)?.body ?? '')).toEqual({ spec: { name: 'rhel9', library_id: 'lib-1' } });
  });

  it('raises VcenterHttpError with the response body', async () => {
    const server = await startMockVcenter((req) =>
      req.url.pathname === '/api/session'
        ? { status: 503, json: { error_type: 'SERVICE_UNAVAILABLE', messages: [{ id: 'x', default_message: 'Service unavailable.' }] } }
        : undefined,
    );
    mock = server;

    const err = await openRestSession({
      endpoint: server.endpoint,
      username: 'admin',
      password: 'test-secret',
      validateCerts: true,
      timeoutMs: 5_000,
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(VcenterHttpError);
    expect(err).toMatchObject({ op: 'createSession(api)', status: 503 });
    expect(server.requests).toHaveLength(1);
  });

  it('raises VcenterParseError for payloads of the wrong shape', async () => {
    const server = await startMockVcenter((req) => {
      if (req.url.pathname === '/api/session') return { json: 'token-2' };
      if (req.url.pathname === '/api/vcenter/datacenter') return { json: { unexpected: true } };
      return undefined;
    });
    mock = server;
    const session = await openRestSession({
      endpoint: server.endpoint,
      username: 'admin',
      password: 'test-secret',
      validateCerts: true,
      version: '7.0-8.x',
      timeoutMs: 5_000,
    });

    const err = await findDatacenterByName(session, 'DC1').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(VcenterParseError);
    expect(err).toMatchObject({ op: 'findDatacenterByName', message: 'findDatacenterByName returned unexpected response' });
  });
});
