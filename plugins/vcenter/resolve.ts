import {
  findClusterByName,
  findDatacenterByName,
  findDatastoreByName,
  findFolderByName,
  findHostByName,
  findLibraryByName,
  findLibraryItemByName,
} from './client';

import { ModuleFailure } from '@/lib/errors/error';
import { ErrorCode } from '@/lib/errors/error-codes';

import type { RestSession } from './client';
import type { JsonValue } from '@/lib/errors/error';

export function notFound(message: string, context: Record<string, JsonValue> = {}): ModuleFailure {
  return new ModuleFailure({
    code: ErrorCode.VCENTER_OBJECT_NOT_FOUND,
    category: 'not_found',
    message,
    retryable: false,
    redacted_context: context,
  });
}

/** Awaits a lookup and bails out with `message` when it found nothing. */
export async function requireFound<T>(
  lookup: Promise<T | null>,
  message: string,
  context: Record<string, JsonValue> = {},
): Promise<T> {
  const found = await lookup;
  if (found === null) throw notFound(message, context);
  return found;
}

export async function requireDatacenter(session: RestSession, name: string): Promise<string> {
  return await requireFound(findDatacenterByName(session, name), `Failed to find the datacenter ${name}`, {
    datacenter: name,
  });
}

export async function requireDatastore(session: RestSession, datacenterId: string, name: string): Promise<string> {
  return await requireFound(findDatastoreByName(session, datacenterId, name), `Failed to find the datastore ${name}`, {
    datastore: name,
  });
}

export async function requireFolder(session: RestSession, datacenterId: string, name: string): Promise<string> {
  return await requireFound(findFolderByName(session, datacenterId, name), `Failed to find the folder ${name}`, {
    folder: name,
  });
}

export async function requireHost(session: RestSession, datacenterId: string, name: string): Promise<string> {
  return await requireFound(findHostByName(session, datacenterId, name), `Failed to find the Host ${name}`, {
    host: name,
  });
}

export async function requireCluster(session: RestSession, datacenterId: string, name: string): Promise<string> {
  return await requireFound(findClusterByName(session, datacenterId, name), `Failed to find the Cluster ${name}`, {
    cluster: name,
  });
}

/**
 * Library item by name, optionally scoped to a content library. An unknown library reports the
 * same message as a missing item in it.
 */
export async function requireLibraryItem(
  session: RestSession,
  template: string,
  library?: string,
): Promise<string> {
  if (!library) {
    return await requireFound(
      findLibraryItemByName(session, template),
      `Failed to find the library Item ${template}`,
      { template },
    );
  }

  const message = `Failed to find the library Item ${template} in content library ${library}`;
  const libraryId = await requireFound(findLibraryByName(session, library), message, { template, library });
  return await requireFound(findLibraryItemByName(session, template, libraryId), message, { template, library });
}
