import { z } from 'zod/v4';

import { connectionAliases, connectionDefaults, connectionFallbacks, connectionShape } from '@/lib/module/connection';

import type { ModuleEnv } from '@/lib/env/module-env';
import type { ArgumentSpec } from '@/lib/module/params';

export const OBJECT_TYPES = [
  'Folder',
  'VirtualMachine',
  'Datacenter',
  'ResourcePool',
  'Datastore',
  'Network',
  'HostSystem',
  'ComputeResource',
  'ClusterComputeResource',
  'DistributedVirtualSwitch',
] as const;

const objectPermissionsInfoSchema = z.object({
  ...connectionShape,
  moid: z.string().min(1).optional(),
  object_name: z.string().min(1).optional(),
  object_type: z.enum(OBJECT_TYPES),
  principal: z.string().min(1).optional(),
  group: z.string().min(1).optional(),
});

export type ObjectPermissionsInfoParams = z.output<typeof objectPermissionsInfoSchema>;

export function objectPermissionsInfoSpec(env: ModuleEnv): ArgumentSpec<typeof objectPermissionsInfoSchema> {
  return {
    schema: objectPermissionsInfoSchema,
    aliases: connectionAliases,
    defaults: { ...connectionDefaults, object_type: 'Folder' },
    fallbacks: connectionFallbacks(env),
    mutuallyExclusive: [
      ['moid', 'object_name'],
      ['principal', 'group'],
    ],
    requiredOneOf: [
      ['moid', 'object_name'],
      ['principal', 'group'],
    ],
    requiredBy: { object_name: ['object_type'] },
  };
}
