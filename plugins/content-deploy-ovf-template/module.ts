import { deployOvfTemplateSpec } from './params';
import {
  deleteSession,
  deployOvfLibraryItem,
  deploymentErrorMessages,
  filterOvfLibraryItem,
  findClusterByName,
  findResourcePoolByName,
  findVmByName,
  getCluster,
  openRestSession,
} from '../vcenter/client';
import { toVcenterError } from '../vcenter/errors';
import {
  notFound,
  requireCluster,
  requireDatacenter,
  requireDatastore,
  requireFolder,
  requireFound,
  requireHost,
  requireLibraryItem,
} from '../vcenter/resolve';
import { closeSoapSession, findDatastoreClusterByName, openSoapSession, recommendDatastore } from '../vcenter/soap';

import { logEvent } from '@/lib/logging/logger';
import { applyTlsPolicy, toVcenterConnection } from '@/lib/module/connection';
import { exitJson, failJson } from '@/lib/module/module-result';
import { parseModuleParams } from '@/lib/module/params';

import type { DeployOvfTemplateParams } from './params';
import type { DeploymentTarget, ResourcePoolDeploymentSpec, RestSession } from '../vcenter/client';
import type { SoapSession } from '../vcenter/soap';
import type { VcenterConnection } from '@/lib/module/connection';
import type { ModuleOutcome } from '@/lib/module/module-result';
import type { ModuleContext } from '@/lib/module/run';

const SERVICE = 'content-deploy-ovf-template';

type DeployPlan = {
  libraryItemId: string;
  target: DeploymentTarget;
  datastoreId: string;
};

async function resolveDatastore(
  session: RestSession,
  connection: VcenterConnection,
  params: DeployOvfTemplateParams,
  datacenterId: string,
  soapSessions: SoapSession[],
): Promise<string> {
  if (params.datastore) return await requireDatastore(session, datacenterId, params.datastore);

  let datastoreId: string | null = null;
  if (params.datastore_cluster) {
    // Datastore clusters (StoragePods) are only reachable through the SOAP API.
    const soap = await openSoapSession(connection);
    soapSessions.push(soap);
    const pod = await requireFound(
      findDatastoreClusterByName(soap, params.datastore_cluster),
      `Failed to find the datastore cluster ${params.datastore_cluster}`,
      { datastore_cluster: params.datastore_cluster },
    );
    datastoreId = await recommendDatastore(soap, pod);
  }
  if (!datastoreId) throw notFound('Failed to find the datastore using either datastore or datastore cluster');
  return datastoreId;
}

async function resolveDeployPlan(
  session: RestSession,
  connection: VcenterConnection,
  params: DeployOvfTemplateParams,
  soapSessions: SoapSession[],
): Promise<DeployPlan> {
  const datacenterId = await requireDatacenter(session, params.datacenter);
  const datastoreId = await resolveDatastore(session, connection, params, datacenterId, soapSessions);
  const libraryItemId = await requireLibraryItem(session, params.template, params.library);
  const folderId = await requireFolder(session, datacenterId, params.folder);
  const hostId = params.host ? await requireHost(session, datacenterId, params.host) : undefined;

  let resourcePoolId: string | null = null;
  if (params.resource_pool) {
    const poolNotFound = notFound(`Failed to find the resource_pool ${params.resource_pool}`, {
      resource_pool: params.resource_pool,
    });
    // The cluster only narrows the pool search here; an unknown one means no pool can match.
    const clusterId = params.cluster ? await findClusterByName(session, datacenterId, params.cluster) : undefined;
    if (clusterId === null) throw poolNotFound;
    resourcePoolId = await findResourcePoolByName(session, {
      datacenterId,
      name: params.resource_pool,
      ...(clusterId ? { clusterId } : {}),
      ...(hostId ? { hostId } : {}),
    });
    if (!resourcePoolId) throw poolNotFound;
  } else if (params.cluster) {
    const clusterId = await requireCluster(session, datacenterId, params.cluster);
    resourcePoolId = (await getCluster(session, clusterId)).resource_pool;
  }
  if (!resourcePoolId) throw notFound('Failed to find a resource pool either by name or cluster');

  return {
    libraryItemId,
    datastoreId,
    target: { resource_pool_id: resourcePoolId, folder_id: folderId, ...(hostId ? { host_id: hostId } : {}) },
  };
}

async function closeSessions(rest: RestSession | undefined, soapSessions: SoapSession[]): Promise<void> {
  for (const soap of soapSessions) {
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
  if (!rest) return;
  try {
    await deleteSession(rest);
  } catch (err) {
    logEvent({
      event_type: 'vcenter.session_close_failed',
      level: 'error',
      service: SERVICE,
      api: 'rest',
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Deploys a VM from an OVF library item. The VM is left powered off; an existing VM with the same
 * name is reported unchanged.
 */
export async function runDeployOvfTemplate({ args, env }: ModuleContext): Promise<ModuleOutcome> {
  const parsed = parseModuleParams(deployOvfTemplateSpec(env), args.params);
  if (!parsed.ok) return failJson(parsed.error);
  const { params, warnings } = parsed;

  const connection = toVcenterConnection(params);
  applyTlsPolicy(connection);

  let stage = 'session';
  let session: RestSession | undefined;
  const soapSessions: SoapSession[] = [];
  try {
    session = await openRestSession(connection);

    stage = 'find_vm';
    const existingVmId = await findVmByName(session, params.name);
    if (existingVmId) {
      return exitJson(
        {
          changed: false,
          vm_deploy_info: { msg: `Virtual Machine '${params.name}' already Exists.`, vm_id: existingVmId },
        },
        warnings,
      );
    }

    if (args.checkMode) {
      return exitJson(
        { changed: true, vm_name: params.name, desired_operation: 'Create VM with PowerOff State' },
        warnings,
      );
    }

    stage = 'resolve';
    const plan = await resolveDeployPlan(session, connection, params, soapSessions);
    logEvent({
      event_type: 'deploy.resolved',
      level: 'debug',
      service: SERVICE,
      library_item_id: plan.libraryItemId,
      datastore_id: plan.datastoreId,
      target: plan.target,
    });

    stage = 'ovf_filter';
    const summary = await filterOvfLibraryItem(session, plan.libraryItemId, plan.target);

    const deploymentSpec: ResourcePoolDeploymentSpec = {
      name: params.name,
      ...(summary.annotation ? { annotation: summary.annotation } : {}),
      accept_all_EULA: true,
      storage_provisioning: params.storage_provisioning,
      default_datastore_id: plan.datastoreId,
    };

    stage = 'ovf_deploy';
    const result = await deployOvfLibraryItem(session, plan.libraryItemId, plan.target, deploymentSpec);
    const vmId = result.resource_id?.id ?? '';

    logEvent({
      event_type: 'deploy.result',
      level: result.succeeded ? 'info' : 'error',
      service: SERVICE,
      succeeded: result.succeeded,
      vm_id: vmId,
    });

    if (result.succeeded && vmId) {
      return exitJson(
        { changed: true, vm_deploy_info: { msg: `Deployed Virtual Machine '${params.name}'.`, vm_id: vmId } },
        warnings,
      );
    }

    const deployErrors = deploymentErrorMessages(result);
    return exitJson(
      {
        changed: false,
        vm_deploy_info: { msg: 'Virtual Machine deployment failed', vm_id: '' },
        ...(deployErrors.length > 0 ? { deploy_errors: deployErrors } : {}),
      },
      warnings,
    );
  } catch (err) {
    return failJson(toVcenterError(err, stage), undefined, warnings);
  } finally {
    await closeSessions(session, soapSessions);
  }
}
