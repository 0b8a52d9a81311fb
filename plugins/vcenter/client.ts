/**
 * vSphere Automation API Client
 * @see https://developer.broadcom.com/xapis/vsphere-automation-api/latest/
 */

import { z } from 'zod/v4';

import { createDebugLog, excerpt } from './debug';

import type { VcenterVersion } from '@/lib/env/module-env';
import type { VcenterConnection } from '@/lib/module/connection';

type SessionToken = string;

const debugLog = createDebugLog('vcenter.rest', 'vcenter-rest-debug');

export class VcenterHttpError extends Error {
  readonly op: string;
  readonly status: number;
  readonly bodyText: string;

  constructor(input: { op: string; status: number; bodyText: string }) {
    super(`${input.op} failed with status ${input.status}`);
    this.name = 'VcenterHttpError';
    this.op = input.op;
    this.status = input.status;
    this.bodyText = input.bodyText;
  }
}

/** A response arrived but could not be read as the documented payload. */
export class VcenterParseError extends Error {
  readonly op: string;

  constructor(op: string, message: string) {
    super(message);
    this.name = 'VcenterParseError';
    this.op = op;
  }
}

function makeHttpError(input: { op: string; status: number; bodyText: string }): VcenterHttpError {
  return new VcenterHttpError(input);
}

function joinUrl(base: string, path: string) {
  return `${base.replace(/\/+$/, '')}${path}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function unwrapValue(data: unknown): unknown {
  // The 6.5/6.7 `/rest` API wraps every payload as `{ value: ... }`.
  if (isRecord(data) && 'value' in data) return data.value;
  return data;
}

function unwrapValueDeep(data: unknown, maxDepth = 3): unknown {
  let current: unknown = data;
  for (let i = 0; i < maxDepth; i++) {
    if (isRecord(current) && 'value' in current) {
      current = current.value;
      continue;
    }
    break;
  }
  return current;
}

function keysOf(data: unknown): string[] {
  return isRecord(data) ? Object.keys(data) : [];
}

export type VcenterApiRoot = 'api' | 'rest';

export type VcenterPlan = {
  apiRoot: VcenterApiRoot;
  sessionPath: string;
  filterPrefix: '' | 'filter.';
};

export function resolveVcenterPlan(preferred: VcenterVersion): VcenterPlan {
  if (preferred === '6.5-6.7') {
    return { apiRoot: 'rest', sessionPath: '/rest/com/vmware/cis/session', filterPrefix: 'filter.' };
  }
  return { apiRoot: 'api', sessionPath: '/api/session', filterPrefix: '' };
}

function plannedApiPath(plan: VcenterPlan, apiPath: string): string {
  if (plan.apiRoot === 'api') return apiPath;
  return apiPath.replace(/^\/api\//, '/rest/');
}

/** Content library and OVF operations live under `/rest/com/vmware/...` and use `~action`. */
function plannedActionPath(plan: VcenterPlan, apiPath: string, action: string): string {
  if (plan.apiRoot === 'api') return `${apiPath}?action=${action}`;
  return `${apiPath.replace(/^\/api\//, '/rest/com/vmware/')}?~action=${action}`;
}

function buildQuery(params: Array<[string, string]>): string {
  return params.map(([key, value]) => `${key}=${encodeURIComponent(value)}`).join('&');
}

export type RestSession = {
  endpoint: string;
  token: SessionToken;
  plan: VcenterPlan;
  timeoutMs: number;
};

type HttpResult = { ok: boolean; status: number; headers: Headers; bodyText: string };

async function fetchTextWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<HttpResult> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const start = Date.now();
  try {
    const res = await fetch(url, { ...init, signal: controller.signal });
    const bodyText = await res.text();
    debugLog('http.response', {
      method: init.method ?? 'GET',
      url,
      status: res.status,
      ok: res.ok,
      duration_ms: Date.now() - start,
      body_length: bodyText.length,
      ...(res.ok ? {} : { body_excerpt: excerpt(bodyText) }),
    });
    return { ok: res.ok, status: res.status, headers: res.headers, bodyText };
  } catch (err) {
    debugLog('http.fetch_error', {
      method: init.method ?? 'GET',
      url,
      timeout_ms: timeoutMs,
      duration_ms: Date.now() - start,
      cause: err instanceof Error ? err.message : String(err),
    });
    throw err;
  } finally {
    clearTimeout(timeout);
  }
}

function parseJson(text: string, op: string): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    debugLog('http.json_parse_error', {
      op,
      cause: err instanceof Error ? err.message : String(err),
      body_length: text.length,
      body_excerpt: excerpt(text),
    });
    throw new VcenterParseError(op, `${op} returned invalid json`);
  }
  return parsed;
}

function parsePayload<T>(data: unknown, schema: z.ZodType<T>, op: string): T {
  const unwrapped = unwrapValue(data);
  const result = schema.safeParse(unwrapped);
  if (result.success) return result.data;
  debugLog(`${op}.unexpected_response`, {
    data_type: Array.isArray(unwrapped) ? 'array' : typeof unwrapped,
    keys: keysOf(unwrapped),
    issues: result.error.issues.slice(0, 5).map((i) => i.message),
  });
  throw new VcenterParseError(op, `${op} returned unexpected response`);
}

async function requestJson<T>(
  session: RestSession,
  op: string,
  input: { method: 'GET' | 'POST'; path: string; body?: unknown },
  schema: z.ZodType<T>,
): Promise<T> {
  const result = await fetchTextWithTimeout(
    joinUrl(session.endpoint, input.path),
    {
      method: input.method,
      headers: {
        'vmware-api-session-id': session.token,
        accept: 'application/json',
        ...(input.body !== undefined ? { 'content-type': 'application/json' } : {}),
      },
      ...(input.body !== undefined ? { body: JSON.stringify(input.body) } : {}),
    },
    session.timeoutMs,
  );
  if (!result.ok) throw makeHttpError({ op, status: result.status, bodyText: result.bodyText });
  return parsePayload(parseJson(result.bodyText, op), schema, op);
}

const VapiErrorSchema = z.object({
  error_type: z.string().optional(),
  messages: z
    .array(z.object({ id: z.string().optional(), default_message: z.string().optional() }))
    .optional(),
});

/**
 * Localized messages of a vAPI error body. Both `{ error_type, messages }` (`/api`) and
 * `{ type, value: { messages } }` (`/rest`) are understood.
 */
export function vapiErrorMessages(bodyText: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bodyText);
  } catch {
    return [];
  }
  const result = VapiErrorSchema.safeParse(unwrapValue(parsed));
  if (!result.success) return [];
  return (result.data.messages ?? [])
    .map((m) => m.default_message?.trim() ?? '')
    .filter((m) => m.length > 0);
}

function parseSessionToken(data: unknown): SessionToken | null {
  const unwrapped = unwrapValueDeep(data);
  if (typeof unwrapped === 'string' && unwrapped.trim().length > 0) return unwrapped;
  return null;
}

function getSessionTokenFromHeaders(headers: Headers): SessionToken | null {
  const value = headers.get('vmware-api-session-id');
  if (!value) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export async function createSession(input: {
  endpoint: string;
  username: string;
  password: string;
  plan: VcenterPlan;
  timeoutMs: number;
}): Promise<SessionToken> {
  const auth = Buffer.from(`${input.username}:${input.password}`).toString('base64');
  const op = `createSession(${input.plan.apiRoot})`;

  const res = await fetchTextWithTimeout(
    joinUrl(input.endpoint, input.plan.sessionPath),
    {
      method: 'POST',
      headers: {
        Authorization: `Basic ${auth}`,
        // Some deployments/proxies require Content-Type for POST even with an empty body.
        'content-type': 'application/json',
        accept: 'application/json',
      },
    },
    input.timeoutMs,
  );
  if (!res.ok) throw makeHttpError({ op, status: res.status, bodyText: res.bodyText });

  const headerToken = getSessionTokenFromHeaders(res.headers);
  let data: unknown = null;
  if (res.bodyText.trim().length > 0) {
    try {
      data = JSON.parse(res.bodyText);
    } catch (err) {
      // Older setups can answer with a non-JSON body while still sending the session id header.
      if (!headerToken) {
        throw new VcenterParseError(op, `${op} returned invalid json: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  const token = parseSessionToken(data) ?? headerToken;
  if (token) return token;

  debugLog('createSession.unexpected_response', {
    endpoint: input.plan.sessionPath,
    data_type: typeof data,
    keys: keysOf(data),
  });
  throw new VcenterParseError(op, `${op} returned unexpected response`);
}

/**
 * Opens a REST session. Without a configured version the `/api` root is tried first and `/rest`
 * is used when the server does not know it (404).
 */
export async function openRestSession(connection: VcenterConnection): Promise<RestSession> {
  const open = async (plan: VcenterPlan): Promise<RestSession> => {
    const token = await createSession({
      endpoint: connection.endpoint,
      username: connection.username,
      password: connection.password,
      plan,
      timeoutMs: connection.timeoutMs,
    });
    return { endpoint: connection.endpoint, token, plan, timeoutMs: connection.timeoutMs };
  };

  if (connection.version) return await open(resolveVcenterPlan(connection.version));

  try {
    return await open(resolveVcenterPlan('7.0-8.x'));
  } catch (err) {
    if (!(err instanceof VcenterHttpError) || err.status !== 404) throw err;
    debugLog('createSession.fallback', { from: 'api', to: 'rest', status: err.status });
  }
  return await open(resolveVcenterPlan('6.5-6.7'));
}

export async function deleteSession(session: RestSession): Promise<void> {
  const res = await fetchTextWithTimeout(
    joinUrl(session.endpoint, session.plan.sessionPath),
    { method: 'DELETE', headers: { 'vmware-api-session-id': session.token } },
    session.timeoutMs,
  );
  if (!res.ok) throw makeHttpError({ op: 'deleteSession', status: res.status, bodyText: res.bodyText });
}

async function listFiltered<T>(
  session: RestSession,
  op: string,
  apiPath: string,
  filters: Record<string, string | undefined>,
  item: z.ZodType<T>,
): Promise<T[]> {
  const params: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(filters)) {
    if (value === undefined || value.length === 0) continue;
    params.push([`${session.plan.filterPrefix}${key}`, value]);
  }
  const query = buildQuery(params);
  const path = `${plannedApiPath(session.plan, apiPath)}${query ? `?${query}` : ''}`;
  return await requestJson(session, op, { method: 'GET', path }, z.array(item));
}

const DatacenterSummarySchema = z.object({ datacenter: z.string().min(1), name: z.string() });
const DatastoreSummarySchema = z.object({ datastore: z.string().min(1), name: z.string(), type: z.string().optional() });
const FolderSummarySchema = z.object({ folder: z.string().min(1), name: z.string(), type: z.string().optional() });
const HostSummarySchema = z.object({ host: z.string().min(1), name: z.string() });
const ClusterSummarySchema = z.object({ cluster: z.string().min(1), name: z.string() });
const ResourcePoolSummarySchema = z.object({ resource_pool: z.string().min(1), name: z.string() });
const VmSummarySchema = z.object({ vm: z.string().min(1), name: z.string() });

/**
 * @see https://developer.broadcom.com/xapis/vsphere-automation-api/latest/vcenter/api/vcenter/datacenter/get/
 */
export async function findDatacenterByName(session: RestSession, name: string): Promise<string | null> {
  const items = await listFiltered(
    session,
    'findDatacenterByName',
    '/api/vcenter/datacenter',
    { names: name },
    DatacenterSummarySchema,
  );
  return items[0]?.datacenter ?? null;
}

export async function findDatastoreByName(
  session: RestSession,
  datacenterId: string,
  name: string,
): Promise<string | null> {
  const items = await listFiltered(
    session,
    'findDatastoreByName',
    '/api/vcenter/datastore',
    { names: name, datacenters: datacenterId },
    DatastoreSummarySchema,
  );
  return items[0]?.datastore ?? null;
}

export type FolderType = 'VIRTUAL_MACHINE' | 'DATACENTER' | 'DATASTORE' | 'HOST' | 'NETWORK';

export async function findFolderByName(
  session: RestSession,
  datacenterId: string,
  name: string,
  type: FolderType = 'VIRTUAL_MACHINE',
): Promise<string | null> {
  const items = await listFiltered(
    session,
    'findFolderByName',
    '/api/vcenter/folder',
    { names: name, datacenters: datacenterId, type },
    FolderSummarySchema,
  );
  return items[0]?.folder ?? null;
}

export async function findHostByName(session: RestSession, datacenterId: string, name: string): Promise<string | null> {
  const items = await listFiltered(
    session,
    'findHostByName',
    '/api/vcenter/host',
    { names: name, datacenters: datacenterId },
    HostSummarySchema,
  );
  return items[0]?.host ?? null;
}

export async function findClusterByName(
  session: RestSession,
  datacenterId: string,
  name: string,
): Promise<string | null> {
  const items = await listFiltered(
    session,
    'findClusterByName',
    '/api/vcenter/cluster',
    { names: name, datacenters: datacenterId },
    ClusterSummarySchema,
  );
  return items[0]?.cluster ?? null;
}

/**
 * Resource pools are narrowed to the given cluster and host when those were resolved.
 * @see https://developer.broadcom.com/xapis/vsphere-automation-api/latest/vcenter/api/vcenter/resource-pool/get/
 */
export async function findResourcePoolByName(
  session: RestSession,
  input: { datacenterId: string; name: string; clusterId?: string; hostId?: string },
): Promise<string | null> {
  const items = await listFiltered(
    session,
    'findResourcePoolByName',
    '/api/vcenter/resource-pool',
    { names: input.name, datacenters: input.datacenterId, clusters: input.clusterId, hosts: input.hostId },
    ResourcePoolSummarySchema,
  );
  return items[0]?.resource_pool ?? null;
}

export async function findVmByName(session: RestSession, name: string): Promise<string | null> {
  const items = await listFiltered(session, 'findVmByName', '/api/vcenter/vm', { names: name }, VmSummarySchema);
  return items[0]?.vm ?? null;
}

const ClusterInfoSchema = z.object({ name: z.string(), resource_pool: z.string().min(1) });
export type ClusterInfo = z.output<typeof ClusterInfoSchema>;

export async function getCluster(session: RestSession, clusterId: string): Promise<ClusterInfo> {
  const path = plannedApiPath(session.plan, `/api/vcenter/cluster/${encodeURIComponent(clusterId)}`);
  return await requestJson(session, 'getCluster', { method: 'GET', path }, ClusterInfoSchema);
}

function findSpecBody(plan: VcenterPlan, spec: Record<string, string>): unknown {
  return plan.apiRoot === 'api' ? spec : { spec };
}

const IdListSchema = z.array(z.string());

/**
 * @see https://developer.broadcom.com/xapis/vsphere-automation-api/latest/content/api/content/library__actionfind/post/
 */
export async function findLibraryByName(session: RestSession, name: string): Promise<string | null> {
  const ids = await requestJson(
    session,
    'findLibraryByName',
    {
      method: 'POST',
      path: plannedActionPath(session.plan, '/api/content/library', 'find'),
      body: findSpecBody(session.plan, { name }),
    },
    IdListSchema,
  );
  return ids[0] ?? null;
}

/**
 * @see https://developer.broadcom.com/xapis/vsphere-automation-api/latest/content/api/content/library/item__actionfind/post/
 */
export async function findLibraryItemByName(
  session: RestSession,
  name: string,
  libraryId?: string,
): Promise<string | null> {
  const ids = await requestJson(
    session,
    'findLibraryItemByName',
    {
      method: 'POST',
      path: plannedActionPath(session.plan, '/api/content/library/item', 'find'),
      body: findSpecBody(session.plan, { name, ...(libraryId ? { library_id: libraryId } : {}) }),
    },
    IdListSchema,
  );
  return ids[0] ?? null;
}

export type DeploymentTarget = {
  resource_pool_id: string;
  folder_id?: string;
  host_id?: string;
};

export type StorageProvisioning = 'thin' | 'thick' | 'eagerZeroedThick';

export type ResourcePoolDeploymentSpec = {
  name: string;
  annotation?: string;
  accept_all_EULA: boolean;
  storage_provisioning?: StorageProvisioning;
  default_datastore_id?: string;
};

function ovfLibraryItemPath(plan: VcenterPlan, itemId: string, action: 'filter' | 'deploy'): string {
  const id = encodeURIComponent(itemId);
  if (plan.apiRoot === 'api') return `/api/vcenter/ovf/library-item/${id}?action=${action}`;
  return `/rest/com/vmware/vcenter/ovf/library-item/id:${id}?~action=${action}`;
}

const OvfSummarySchema = z.object({
  name: z.string().nullish(),
  annotation: z.string().nullish(),
  EULAs: z.array(z.string()).nullish(),
});
export type OvfSummary = z.output<typeof OvfSummarySchema>;

/**
 * @see https://developer.broadcom.com/xapis/vsphere-automation-api/latest/vcenter/api/vcenter/ovf/library-item/ovf_library_item_id__actionfilter/post/
 */
export async function filterOvfLibraryItem(
  session: RestSession,
  itemId: string,
  target: DeploymentTarget,
): Promise<OvfSummary> {
  return await requestJson(
    session,
    'filterOvfLibraryItem',
    { method: 'POST', path: ovfLibraryItemPath(session.plan, itemId, 'filter'), body: { target } },
    OvfSummarySchema,
  );
}

const OvfMessageSchema = z.object({
  category: z.string().nullish(),
  message: z.object({ id: z.string().nullish(), default_message: z.string().nullish() }).nullish(),
});

const DeploymentResultSchema = z.object({
  succeeded: z.boolean(),
  resource_id: z.object({ type: z.string(), id: z.string() }).nullish(),
  error: z
    .object({
      errors: z.array(OvfMessageSchema).nullish(),
      warnings: z.array(OvfMessageSchema).nullish(),
    })
    .nullish(),
});
export type DeploymentResult = z.output<typeof DeploymentResultSchema>;

/**
 * @see https://developer.broadcom.com/xapis/vsphere-automation-api/latest/vcenter/api/vcenter/ovf/library-item/ovf_library_item_id__actiondeploy/post/
 */
export async function deployOvfLibraryItem(
  session: RestSession,
  itemId: string,
  target: DeploymentTarget,
  deploymentSpec: ResourcePoolDeploymentSpec,
): Promise<DeploymentResult> {
  return await requestJson(
    session,
    'deployOvfLibraryItem',
    {
      method: 'POST',
      path: ovfLibraryItemPath(session.plan, itemId, 'deploy'),
      body: { target, deployment_spec: deploymentSpec },
    },
    DeploymentResultSchema,
  );
}

/** Human-readable OVF error messages of a failed deployment. */
export function deploymentErrorMessages(result: DeploymentResult): string[] {
  return (result.error?.errors ?? [])
    .map((e) => e.message?.default_message?.trim() || e.category?.trim() || '')
    .filter((m) => m.length > 0);
}
