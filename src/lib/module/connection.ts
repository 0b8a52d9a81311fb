import { z } from 'zod/v4';

import { VCENTER_VERSIONS } from '@/lib/env/module-env';
import { moduleBoolean, moduleInt } from '@/lib/module/params';

import type { ModuleEnv, VcenterVersion } from '@/lib/env/module-env';

/** Connection options shared by every vSphere module. */
export const connectionShape = {
  hostname: z.string().trim().min(1),
  username: z.string().min(1),
  password: z.string().min(1),
  port: moduleInt.pipe(z.number().int().min(1).max(65535)),
  validate_certs: moduleBoolean,
  protocol: z.enum(['https', 'http']),
  vcenter_version: z.enum(VCENTER_VERSIONS).optional(),
  timeout: moduleInt.pipe(z.number().int().positive()),
};

export const connectionAliases = {
  username: ['admin', 'user'],
  password: ['pass', 'pwd'],
} as const;

export const connectionDefaults = {
  port: 443,
  validate_certs: true,
  protocol: 'https',
  timeout: 30,
};

export function connectionFallbacks(env: ModuleEnv): Record<string, unknown> {
  return {
    hostname: env.VMWARE_HOST,
    username: env.VMWARE_USER,
    password: env.VMWARE_PASSWORD,
    port: env.VMWARE_PORT,
    validate_certs: env.VMWARE_VALIDATE_CERTS,
    vcenter_version: env.VMWARE_VCENTER_VERSION,
  };
}

export type ConnectionParams = {
  hostname: string;
  username: string;
  password: string;
  port: number;
  validate_certs: boolean;
  protocol: 'https' | 'http';
  vcenter_version?: VcenterVersion;
  timeout: number;
};

export type VcenterConnection = {
  endpoint: string;
  username: string;
  password: string;
  validateCerts: boolean;
  version?: VcenterVersion;
  timeoutMs: number;
};

function formatHost(hostname: string): string {
  // Bare IPv6 literals need brackets inside a URL authority.
  if (hostname.includes(':') && !hostname.startsWith('[')) return `[${hostname}]`;
  return hostname;
}

export function toVcenterConnection(params: ConnectionParams): VcenterConnection {
  return {
    endpoint: `${params.protocol}://${formatHost(params.hostname)}:${params.port}`,
    username: params.username,
    password: params.password,
    validateCerts: params.validate_certs,
    ...(params.vcenter_version ? { version: params.vcenter_version } : {}),
    timeoutMs: params.timeout * 1000,
  };
}

/**
 * fetch has no per-request switch for certificate checks, so `validate_certs: false` turns them off
 * for the whole process. A module run is a single short-lived process.
 */
export function applyTlsPolicy(connection: VcenterConnection, env: NodeJS.ProcessEnv = process.env): void {
  if (!connection.validateCerts) env.NODE_TLS_REJECT_UNAUTHORIZED = '0';
}
