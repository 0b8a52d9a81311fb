import { objectPermissionsInfoSpec } from './params';
import { toVcenterError } from '../vcenter/errors';
import { requireFound } from '../vcenter/resolve';
import {
  closeSoapSession,
  findManagedObjectByName,
  openSoapSession,
  retrieveEntityPermissions,
  retrieveRoleList,
} from '../vcenter/soap';

import { logEvent } from '@/lib/logging/logger';
import { applyTlsPolicy, toVcenterConnection } from '@/lib/module/connection';
import { exitJson, failJson } from '@/lib/module/module-result';
import { parseModuleParams } from '@/lib/module/params';

import type { ObjectPermissionsInfoParams } from './params';
import type { EntityPermission, ManagedObjectRef, SoapSession } from '../vcenter/soap';
import type { ModuleOutcome } from '@/lib/module/module-result';
import type { ModuleContext } from '@/lib/module/run';

const SERVICE = 'object-permissions-info';

export const DVS_PERMISSION_WARNING =
  'You are applying permissions to a Distributed vSwitch. ' +
  'This will probably fail, since Distributed vSwitches inherits permissions from the datacenter or a folder level. ' +
  'Define permissions on the datacenter or the folder containing the switch.';

export type PermissionEntry = {
  entity: { type: string; moid: string };
  principal: string;
  group: boolean;
  role_id: number;
  role: string | null;
  propagate: boolean;
};

async function resolveEntity(soap: SoapSession, params: ObjectPermissionsInfoParams): Promise<ManagedObjectRef> {
  if (params.moid) return { type: params.object_type, value: params.moid };

  const name = params.object_name ?? '';
  if (params.object_type === 'Folder' && name === 'rootFolder') return soap.serviceContent.rootFolder;

  return await requireFound(
    findManagedObjectByName(soap, params.object_type, name),
    `Specified object ${name} of type ${params.object_type} was not found.`,
    { object_name: name, object_type: params.object_type },
  );
}

/** Principal names are compared case-insensitively, the way vCenter matches SSO principals. */
function appliesTo(permission: EntityPermission, params: ObjectPermissionsInfoParams): boolean {
  if (params.group) return permission.group && permission.principal.toLowerCase() === params.group.toLowerCase();
  if (params.principal) {
    return !permission.group && permission.principal.toLowerCase() === params.principal.toLowerCase();
  }
  return true;
}

export function toPermissionEntries(
  permissions: EntityPermission[],
  roles: Map<number, string>,
  params: ObjectPermissionsInfoParams,
): PermissionEntry[] {
  return permissions
    .filter((p) => appliesTo(p, params))
    .map((p) => ({
      entity: { type: p.entity.type, moid: p.entity.value },
      principal: p.principal,
      group: p.group,
      role_id: p.roleId,
      role: roles.get(p.roleId) ?? null,
      propagate: p.propagate,
    }));
}

/** Reads the permissions defined directly on one managed object. Never changes anything. */
export async function runObjectPermissionsInfo({ args, env }: ModuleContext): Promise<ModuleOutcome> {
  const parsed = parseModuleParams(objectPermissionsInfoSpec(env), args.params);
  if (!parsed.ok) return failJson(parsed.error);
  const { params } = parsed;
  const warnings = [...parsed.warnings];
  if (params.object_type === 'DistributedVirtualSwitch') warnings.push(DVS_PERMISSION_WARNING);

  const connection = toVcenterConnection(params);
  applyTlsPolicy(connection);

  let stage = 'session';
  let soap: SoapSession | undefined;
  try {
    soap = await openSoapSession(connection);

    stage = 'resolve';
    const entity = await resolveEntity(soap, params);

    stage = 'permissions';
    const permissions = await retrieveEntityPermissions(soap, entity, false);
    const roles = await retrieveRoleList(soap);
    const entries = toPermissionEntries(permissions, roles, params);

    logEvent({
      event_type: 'permissions.retrieved',
      level: 'info',
      service: SERVICE,
      entity_type: entity.type,
      entity_moid: entity.value,
      total: permissions.length,
      matched: entries.length,
    });

    return exitJson({ changed: false, permissions: entries }, warnings);
  } catch (err) {
    return failJson(toVcenterError(err, stage), undefined, warnings);
  } finally {
    if (soap) {
      try {
        await closeSoapSession(soap);
      } catch (err) {
        logEvent({
          event_type: 'vcenter.session_close_failed',
          level: 'error',
          service: SERVICE,
          api: 'soap',
          cause: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}
