import { describe, expect, it } from 'vitest';

import { VcenterHttpError, VcenterParseError } from '../client';
import { toVcenterError } from '../errors';
import { notFound } from '../resolve';
import { SoapFaultError } from '../soap';

describe('toVcenterError', () => {
  it('maps 401 to an auth failure with the vAPI message', () => {
    const err = new VcenterHttpError({
      op: 'createSession(api)',
      status: 401,
      bodyText: JSON.stringify({ error_type: 'UNAUTHENTICATED', messages: [{ id: 'x', default_message: 'Unable to authenticate user' }] }),
    });

    expect(toVcenterError(err, 'session')).toEqual({
      code: 'VCENTER_AUTH_FAILED',
      category: 'auth',
      message: 'Unable to authenticate user',
      retryable: false,
      redacted_context: {
        stage: 'session',
        op: 'createSession(api)',
        status: 401,
        body_excerpt: err.bodyText,
        cause: 'createSession(api) failed with status 401',
      },
    });
  });

  it('maps 403 to permission denied', () => {
    const err = new VcenterHttpError({ op: 'deployOvfLibraryItem', status: 403, bodyText: '' });
    expect(toVcenterError(err, 'ovf_deploy')).toMatchObject({
      code: 'VCENTER_PERMISSION_DENIED',
      category: 'permission',
      message: 'permission denied',
    });
  });

  it('keeps the HTTP error text when the body has no vAPI messages', () => {
    const err = new VcenterHttpError({ op: 'getCluster', status: 404, bodyText: 'x'.repeat(800) });
    const mapped = toVcenterError(err, 'resolve');

    expect(mapped).toMatchObject({ code: 'VCENTER_API_ERROR', category: 'not_found', message: 'getCluster failed with status 404' });
    expect(mapped.redacted_context?.body_excerpt).toBe('x'.repeat(500));
  });

  it('maps soap login and permission faults', () => {
    const login = new SoapFaultError({
      op: 'Login',
      status: 500,
      faultString: 'Cannot complete login due to an incorrect user name or password.',
      faultType: 'InvalidLogin',
      bodyText: '',
    });
    const denied = new SoapFaultError({
      op: 'RetrieveEntityPermissions',
      status: 500,
      faultString: 'Permission to perform this operation was denied.',
      faultType: 'NoPermission',
      bodyText: '',
    });
    const other = new SoapFaultError({
      op: 'RetrievePropertiesEx',
      status: 500,
      faultString: 'The object has already been deleted or has not been completely created',
      faultType: 'ManagedObjectNotFound',
      bodyText: '',
    });

    expect(toVcenterError(login, 'session')).toMatchObject({ code: 'VCENTER_AUTH_FAILED', category: 'auth' });
    expect(toVcenterError(denied, 'permissions')).toMatchObject({ code: 'VCENTER_PERMISSION_DENIED' });
    expect(toVcenterError(other, 'resolve')).toMatchObject({
      code: 'VCENTER_SOAP_FAULT',
      message: 'The object has already been deleted or has not been completely created',
      redacted_context: { fault_type: 'ManagedObjectNotFound' },
    });
  });

  it('marks connection failures and timeouts as retryable network errors', () => {
    const refused = new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:443') });
    expect(toVcenterError(refused, 'session')).toMatchObject({
      code: 'VCENTER_NETWORK_ERROR',
      category: 'network',
      retryable: true,
      message: 'vcenter request failed: fetch failed: connect ECONNREFUSED 127.0.0.1:443',
    });

    const aborted = Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
    expect(toVcenterError(aborted, 'resolve')).toMatchObject({
      code: 'VCENTER_NETWORK_ERROR',
      message: 'vcenter request timed out',
    });
  });

  it('maps parse errors and passes module failures through', () => {
    expect(toVcenterError(new VcenterParseError('getCluster', 'getCluster returned unexpected response'), 'resolve')).toMatchObject({
      code: 'VCENTER_PARSE_ERROR',
      category: 'parse',
      redacted_context: { op: 'getCluster' },
    });

    const failure = notFound('Failed to find the folder vm', { folder: 'vm' });
    expect(toVcenterError(failure, 'resolve')).toBe(failure.error);
  });
});
