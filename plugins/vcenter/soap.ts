import { XMLParser } from 'fast-xml-parser';

import { VcenterHttpError, VcenterParseError } from './client';
import { createDebugLog, excerpt } from './debug';

import { logEvent } from '@/lib/logging/logger';

import type { VcenterConnection } from '@/lib/module/connection';

const debugLog = createDebugLog('vcenter.soap', 'vcenter-soap-debug');

// Namespace prefixes are dropped from tag names only; `type` and `xsi:type` stay distinct attributes.
const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  transformTagName: (name) => name.replace(/^[^:]+:/, ''),
});

export type ManagedObjectRef = { type: string; value: string };

export type ServiceContent = {
  rootFolder: ManagedObjectRef;
  propertyCollector: ManagedObjectRef;
  viewManager: ManagedObjectRef;
  authorizationManager: ManagedObjectRef;
  sessionManager: ManagedObjectRef;
};

export type SoapSession = {
  sdkEndpoint: string;
  cookie: string;
  timeoutMs: number;
  serviceContent: ServiceContent;
};

export class SoapFaultError extends Error {
  readonly op: string;
  readonly status: number;
  readonly faultString: string;
  readonly faultType?: string;
  readonly bodyText: string;

  constructor(input: { op: string; status: number; faultString: string; faultType?: string; bodyText: string }) {
    super(input.faultString);
    this.name = 'SoapFaultError';
    this.op = input.op;
    this.status = input.status;
    this.faultString = input.faultString;
    if (input.faultType) this.faultType = input.faultType;
    this.bodyText = input.bodyText;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function child(node: unknown, key: string): unknown {
  return isRecord(node) ? node[key] : undefined;
}

function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null || value === '') return [];
  return Array.isArray(value) ? value : [value];
}

/** Text content of a parsed element, whether or not it carried attributes. */
export function textOf(node: unknown): string | undefined {
  if (typeof node === 'string') return node;
  if (typeof node === 'number' && Number.isFinite(node)) return String(node);
  if (isRecord(node)) return textOf(node['#text']);
  return undefined;
}

function toMoRef(node: unknown): ManagedObjectRef | undefined {
  const value = textOf(node)?.trim();
  const type = child(node, '@_type');
  if (!value || typeof type !== 'string' || !type) return undefined;
  return { type, value };
}

function toBooleanValue(node: unknown): boolean | undefined {
  const text = textOf(node)?.trim().toLowerCase();
  if (text === 'true' || text === '1') return true;
  if (text === 'false' || text === '0') return false;
  return undefined;
}

function toNumberValue(node: unknown): number | undefined {
  const text = textOf(node)?.trim();
  if (!text) return undefined;
  const num = Number(text);
  return Number.isFinite(num) ? num : undefined;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function moRefXml(tag: string, ref: ManagedObjectRef): string {
  return `<vim25:${tag} type="${escapeXml(ref.type)}">${escapeXml(ref.value)}</vim25:${tag}>`;
}

function toSdkEndpoint(endpoint: string): string {
  const trimmed = endpoint.replace(/\/+$/, '');
  if (trimmed.endsWith('/sdk')) return trimmed;
  return `${trimmed}/sdk`;
}

function soapEnvelope(innerXml: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<soapenv:Envelope xmlns:soapenv="http://schemas.xmlsoap.org/soap/envelope/" xmlns:vim25="urn:vim25" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <soapenv:Body>
    ${innerXml}
  </soapenv:Body>
</soapenv:Envelope>`;
}

function parseBody(xml: string, op: string): unknown {
  let parsed: unknown;
  try {
    parsed = parser.parse(xml);
  } catch (err) {
    debugLog('soap.xml_parse_error', {
      op,
      cause: err instanceof Error ? err.message : String(err),
      body_excerpt: excerpt(xml),
    });
    throw new VcenterParseError(op, `${op} returned invalid xml`);
  }
  return child(child(parsed, 'Envelope'), 'Body');
}

export function parseSoapFault(xml: string): { faultString: string; faultType?: string } | undefined {
  let body: unknown;
  try {
    body = parseBody(xml, 'Fault');
  } catch {
    return undefined;
  }
  const fault = child(body, 'Fault');
  const faultString = textOf(child(fault, 'faultstring'))?.trim();
  if (!faultString) return undefined;

  const detail = child(fault, 'detail');
  const detailKey = isRecord(detail) ? Object.keys(detail).find((key) => !key.startsWith('@_')) : undefined;
  if (!detailKey) return { faultString };
  const xsiType = child(child(detail, detailKey), '@_xsi:type');
  const faultType = typeof xsiType === 'string' && xsiType ? xsiType : detailKey.replace(/Fault$/, '');
  return { faultString, faultType };
}

async function soapPost(input: {
  sdkEndpoint: string;
  op: string;
  bodyXml: string;
  cookie?: string;
  timeoutMs: number;
}): Promise<{ status: number; headers: Headers; bodyText: string }> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), input.timeoutMs);
  const start = Date.now();
  try {
    const res = await fetch(input.sdkEndpoint, {
      method: 'POST',
      headers: {
        'content-type': 'text/xml; charset=utf-8',
        ...(input.cookie ? { cookie: input.cookie } : {}),
      },
      body: input.bodyXml,
      signal: controller.signal,
    });
    const bodyText = await res.text();
    debugLog('soap.response', {
      op: input.op,
      status: res.status,
      duration_ms: Date.now() - start,
      body_length: bodyText.length,
      ...(res.ok ? {} : { body_excerpt: excerpt(bodyText) }),
    });
    return { status: res.status, headers: res.headers, bodyText };
  } catch (err) {
    debugLog('soap.fetch_error', {
      op: input.op,
      timeout_ms: input.timeoutMs,
      duration_ms: Date.now() - start,
      cause: err instanceof Error ? err.message : String(err),
    });
    throw err;
  } finally {
    clearTimeout(timeout);
  }
}

function toSoapError(op: string, res: { status: number; bodyText: string }): Error {
  const fault = parseSoapFault(res.bodyText);
  if (fault) return new SoapFaultError({ op, status: res.status, bodyText: res.bodyText, ...fault });
  return new VcenterHttpError({ op, status: res.status, bodyText: res.bodyText });
}

async function invoke(
  target: { sdkEndpoint: string; timeoutMs: number; cookie?: string },
  op: string,
  innerXml: string,
): Promise<unknown> {
  const res = await soapPost({ ...target, op, bodyXml: soapEnvelope(innerXml) });
  if (res.status < 200 || res.status >= 300) throw toSoapError(op, res);
  return child(child(parseBody(res.bodyText, op), `${op}Response`), 'returnval');
}

function parseServiceContent(returnval: unknown): ServiceContent {
  const pick = (key: string) => {
    const ref = toMoRef(child(returnval, key));
    if (!ref) {
      throw new VcenterParseError('RetrieveServiceContent', `RetrieveServiceContent returned unexpected response (missing ${key})`);
    }
    return ref;
  };
  return {
    rootFolder: pick('rootFolder'),
    propertyCollector: pick('propertyCollector'),
    viewManager: pick('viewManager'),
    authorizationManager: pick('authorizationManager'),
    sessionManager: pick('sessionManager'),
  };
}

function extractCookie(headers: Headers): string | undefined {
  const setCookie = headers.get('set-cookie');
  if (!setCookie) return undefined;
  return setCookie.split(';')[0];
}

export async function openSoapSession(connection: VcenterConnection): Promise<SoapSession> {
  const sdkEndpoint = toSdkEndpoint(connection.endpoint);
  const timeoutMs = connection.timeoutMs;

  const serviceContent = parseServiceContent(
    await invoke(
      { sdkEndpoint, timeoutMs },
      'RetrieveServiceContent',
      `<vim25:RetrieveServiceContent>
        <vim25:_this type="ServiceInstance">ServiceInstance</vim25:_this>
      </vim25:RetrieveServiceContent>`,
    ),
  );

  const loginRes = await soapPost({
    sdkEndpoint,
    timeoutMs,
    op: 'Login',
    bodyXml: soapEnvelope(
      `<vim25:Login>
        ${moRefXml('_this', serviceContent.sessionManager)}
        <vim25:userName>${escapeXml(connection.username)}</vim25:userName>
        <vim25:password>${escapeXml(connection.password)}</vim25:password>
      </vim25:Login>`,
    ),
  });
  if (loginRes.status < 200 || loginRes.status >= 300) throw toSoapError('Login', loginRes);
  const cookie = extractCookie(loginRes.headers);
  if (!cookie) throw new VcenterParseError('Login', 'Login did not return session cookie');

  return { sdkEndpoint, cookie, timeoutMs, serviceContent };
}

export async function closeSoapSession(session: SoapSession): Promise<void> {
  await invoke(session, 'Logout', `<vim25:Logout>${moRefXml('_this', session.serviceContent.sessionManager)}</vim25:Logout>`);
}

export type PropertySpecInput = { type: string; pathSet: string[] };

export type ObjectSpecInput = {
  obj: ManagedObjectRef;
  skip?: boolean;
  /** Single TraversalSpec hop, e.g. ContainerView.view. */
  traverse?: { type: string; path: string };
};

export type ObjectContent = {
  obj: ManagedObjectRef;
  props: Map<string, unknown>;
};

function specSetXml(input: { propSet: PropertySpecInput[]; objectSet: ObjectSpecInput[] }): string {
  const propSet = input.propSet
    .map(
      (p) =>
        `<vim25:propSet><vim25:type>${escapeXml(p.type)}</vim25:type>${p.pathSet
          .map((path) => `<vim25:pathSet>${escapeXml(path)}</vim25:pathSet>`)
          .join('')}</vim25:propSet>`,
    )
    .join('');
  const objectSet = input.objectSet
    .map((o) => {
      const skip = o.skip === undefined ? '' : `<vim25:skip>${o.skip}</vim25:skip>`;
      const traverse = o.traverse
        ? `<vim25:selectSet xsi:type="vim25:TraversalSpec"><vim25:name>traverse</vim25:name><vim25:type>${escapeXml(
            o.traverse.type,
          )}</vim25:type><vim25:path>${escapeXml(o.traverse.path)}</vim25:path><vim25:skip>false</vim25:skip></vim25:selectSet>`
        : '';
      return `<vim25:objectSet>${moRefXml('obj', o.obj)}${skip}${traverse}</vim25:objectSet>`;
    })
    .join('');
  return `<vim25:specSet>${propSet}${objectSet}</vim25:specSet>`;
}

function parseObjectContents(objects: unknown): ObjectContent[] {
  const out: ObjectContent[] = [];
  for (const object of toArray(objects)) {
    const obj = toMoRef(child(object, 'obj'));
    if (!obj) continue;
    const props = new Map<string, unknown>();
    for (const prop of toArray(child(object, 'propSet'))) {
      const name = textOf(child(prop, 'name'));
      if (name) props.set(name, child(prop, 'val'));
    }
    out.push({ obj, props });
  }
  return out;
}

function isExUnsupported(err: unknown): boolean {
  if (!(err instanceof SoapFaultError) || err.status !== 500) return false;
  const faultLower = err.faultString.toLowerCase();
  return faultLower.includes('unable to resolve wsdl method name') && faultLower.includes('retrievepropertiesex');
}

/**
 * RetrievePropertiesEx with ContinueRetrievePropertiesEx paging. Some old vSphere deployments
 * don't know RetrievePropertiesEx (vim25/2.5u2); RetrieveProperties is used there instead.
 */
export async function retrieveProperties(
  session: SoapSession,
  input: { propSet: PropertySpecInput[]; objectSet: ObjectSpecInput[] },
): Promise<ObjectContent[]> {
  const collector = session.serviceContent.propertyCollector;
  const specSet = specSetXml(input);

  let returnval: unknown;
  try {
    returnval = await invoke(
      session,
      'RetrievePropertiesEx',
      `<vim25:RetrievePropertiesEx>${moRefXml('_this', collector)}${specSet}<vim25:options/></vim25:RetrievePropertiesEx>`,
    );
  } catch (err) {
    if (!isExUnsupported(err)) throw err;
    debugLog('RetrievePropertiesEx.fallback', { to: 'RetrieveProperties' });
    const legacy = await invoke(
      session,
      'RetrieveProperties',
      `<vim25:RetrieveProperties>${moRefXml('_this', collector)}${specSet}</vim25:RetrieveProperties>`,
    );
    return parseObjectContents(legacy);
  }

  const out = parseObjectContents(child(returnval, 'objects'));
  let token = textOf(child(returnval, 'token'));
  while (token) {
    const page = await invoke(
      session,
      'ContinueRetrievePropertiesEx',
      `<vim25:ContinueRetrievePropertiesEx>${moRefXml('_this', collector)}<vim25:token>${escapeXml(
        token,
      )}</vim25:token></vim25:ContinueRetrievePropertiesEx>`,
    );
    out.push(...parseObjectContents(child(page, 'objects')));
    token = textOf(child(page, 'token'));
  }
  return out;
}

async function createContainerView(session: SoapSession, type: string): Promise<ManagedObjectRef> {
  const returnval = await invoke(
    session,
    'CreateContainerView',
    `<vim25:CreateContainerView>${moRefXml('_this', session.serviceContent.viewManager)}${moRefXml(
      'container',
      session.serviceContent.rootFolder,
    )}<vim25:type>${escapeXml(type)}</vim25:type><vim25:recursive>true</vim25:recursive></vim25:CreateContainerView>`,
  );
  const view = toMoRef(returnval);
  if (!view) throw new VcenterParseError('CreateContainerView', 'CreateContainerView returned unexpected response');
  return view;
}

async function destroyView(session: SoapSession, view: ManagedObjectRef): Promise<void> {
  await invoke(session, 'DestroyView', `<vim25:DestroyView>${moRefXml('_this', view)}</vim25:DestroyView>`);
}

/** First managed object of `type` under rootFolder whose `name` matches exactly. */
export async function findManagedObjectByName(
  session: SoapSession,
  type: string,
  name: string,
): Promise<ManagedObjectRef | null> {
  const view = await createContainerView(session, type);
  try {
    const contents = await retrieveProperties(session, {
      propSet: [{ type, pathSet: ['name'] }],
      objectSet: [{ obj: view, skip: true, traverse: { type: 'ContainerView', path: 'view' } }],
    });
    return contents.find((c) => textOf(c.props.get('name')) === name)?.obj ?? null;
  } finally {
    // A view left behind expires with the session; the lookup result stands.
    try {
      await destroyView(session, view);
    } catch (err) {
      logEvent({
        event_type: 'vcenter.destroy_view_failed',
        level: 'error',
        service: 'vcenter',
        view: view.value,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

export type EntityPermission = {
  entity: ManagedObjectRef;
  principal: string;
  group: boolean;
  roleId: number;
  propagate: boolean;
};

export async function retrieveEntityPermissions(
  session: SoapSession,
  entity: ManagedObjectRef,
  inherited = false,
): Promise<EntityPermission[]> {
  const returnval = await invoke(
    session,
    'RetrieveEntityPermissions',
    `<vim25:RetrieveEntityPermissions>${moRefXml('_this', session.serviceContent.authorizationManager)}${moRefXml(
      'entity',
      entity,
    )}<vim25:inherited>${inherited}</vim25:inherited></vim25:RetrieveEntityPermissions>`,
  );

  const out: EntityPermission[] = [];
  for (const item of toArray(returnval)) {
    const principal = textOf(child(item, 'principal'));
    const roleId = toNumberValue(child(item, 'roleId'));
    if (principal === undefined || roleId === undefined) continue;
    out.push({
      entity: toMoRef(child(item, 'entity')) ?? entity,
      principal,
      group: toBooleanValue(child(item, 'group')) ?? false,
      roleId,
      propagate: toBooleanValue(child(item, 'propagate')) ?? false,
    });
  }
  return out;
}

/** Role id to role name, from AuthorizationManager.roleList. */
export async function retrieveRoleList(session: SoapSession): Promise<Map<number, string>> {
  const contents = await retrieveProperties(session, {
    propSet: [{ type: 'AuthorizationManager', pathSet: ['roleList'] }],
    objectSet: [{ obj: session.serviceContent.authorizationManager }],
  });

  const roles = new Map<number, string>();
  for (const content of contents) {
    for (const role of toArray(child(content.props.get('roleList'), 'AuthorizationRole'))) {
      const roleId = toNumberValue(child(role, 'roleId'));
      const name = textOf(child(role, 'name'));
      if (roleId !== undefined && name) roles.set(roleId, name);
    }
  }
  return roles;
}

export async function findDatastoreClusterByName(session: SoapSession, name: string): Promise<ManagedObjectRef | null> {
  return await findManagedObjectByName(session, 'StoragePod', name);
}

/**
 * Datastore of a datastore cluster with the most free space, skipping inaccessible datastores
 * and those in (or entering) maintenance mode. Returns the datastore's managed object id.
 */
export async function recommendDatastore(session: SoapSession, storagePod: ManagedObjectRef): Promise<string | null> {
  const [pod] = await retrieveProperties(session, {
    propSet: [{ type: 'StoragePod', pathSet: ['childEntity'] }],
    objectSet: [{ obj: storagePod }],
  });
  const children = toArray(child(pod?.props.get('childEntity'), 'ManagedObjectReference'))
    .map((node) => toMoRef(node))
    .filter((ref): ref is ManagedObjectRef => ref?.type === 'Datastore');
  if (children.length === 0) return null;

  const datastores = await retrieveProperties(session, {
    propSet: [{ type: 'Datastore', pathSet: ['summary.freeSpace', 'summary.accessible', 'summary.maintenanceMode'] }],
    objectSet: children.map((obj) => ({ obj })),
  });

  let best: { moid: string; freeSpace: number } | null = null;
  for (const ds of datastores) {
    if (toBooleanValue(ds.props.get('summary.accessible')) !== true) continue;
    const maintenance = textOf(ds.props.get('summary.maintenanceMode'))?.trim();
    if (maintenance && maintenance !== 'normal') continue;
    const freeSpace = toNumberValue(ds.props.get('summary.freeSpace')) ?? 0;
    if (!best || freeSpace > best.freeSpace) best = { moid: ds.obj.value, freeSpace };
  }
  return best?.moid ?? null;
}
