import { z } from 'zod/v4';

import { createEnv } from '@t3-oss/env-core';

export const VCENTER_VERSIONS = ['6.5-6.7', '7.0-8.x'] as const;
export type VcenterVersion = (typeof VCENTER_VERSIONS)[number];

export const LOG_LEVELS = ['debug', 'info', 'error', 'silent'] as const;

/**
 * Environment fallbacks shared by every module. Values stay raw strings where the module
 * argument parser owns the coercion (booleans, choices), so env and explicit params share one
 * validation path.
 */
export function loadModuleEnv(runtimeEnv: Record<string, string | undefined> = process.env) {
  return createEnv({
    server: {
      NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),

      VMWARE_HOST: z.string().min(1).optional(),
      VMWARE_USER: z.string().min(1).optional(),
      VMWARE_PASSWORD: z.string().min(1).optional(),
      VMWARE_PORT: z.coerce.number().int().positive().max(65535).optional(),
      VMWARE_VALIDATE_CERTS: z.string().min(1).optional(),
      VMWARE_VCENTER_VERSION: z.enum(VCENTER_VERSIONS).optional(),
      VMWARE_STORAGE_PROVISIONING: z.string().min(1).optional(),

      VSPHERE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
      VSPHERE_DEBUG: z.string().min(1).optional(),
    },
    runtimeEnv,
    emptyStringAsUndefined: true,
  });
}

export type ModuleEnv = ReturnType<typeof loadModuleEnv>;
