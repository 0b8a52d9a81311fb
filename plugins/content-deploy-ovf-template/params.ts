import { z } from 'zod/v4';

import { connectionAliases, connectionDefaults, connectionFallbacks, connectionShape } from '@/lib/module/connection';

import type { ModuleEnv } from '@/lib/env/module-env';
import type { ArgumentSpec } from '@/lib/module/params';

export const STORAGE_PROVISIONING_CHOICES = ['thin', 'thick', 'eagerZeroedThick', 'eagerzeroedthick'] as const;

const optionalName = z.string().min(1).optional();

const deployOvfTemplateSchema = z.object({
  ...connectionShape,
  template: z.string().min(1),
  library: optionalName,
  name: z.string().min(1),
  datacenter: z.string().min(1),
  datastore: optionalName,
  datastore_cluster: optionalName,
  folder: z.string().min(1),
  host: optionalName,
  resource_pool: optionalName,
  cluster: optionalName,
  storage_provisioning: z
    .enum(STORAGE_PROVISIONING_CHOICES)
    .transform((value) => (value === 'eagerzeroedthick' ? 'eagerZeroedThick' : value)),
});

export type DeployOvfTemplateParams = z.output<typeof deployOvfTemplateSchema>;

export function deployOvfTemplateSpec(env: ModuleEnv): ArgumentSpec<typeof deployOvfTemplateSchema> {
  return {
    schema: deployOvfTemplateSchema,
    aliases: {
      ...connectionAliases,
      template: ['ovf', 'ovf_template', 'template_src'],
      library: ['content_library'],
      name: ['vm_name'],
    },
    defaults: { ...connectionDefaults, folder: 'vm', storage_provisioning: 'thin' },
    fallbacks: { ...connectionFallbacks(env), storage_provisioning: env.VMWARE_STORAGE_PROVISIONING },
    requiredOneOf: [['datastore', 'datastore_cluster']],
  };
}
