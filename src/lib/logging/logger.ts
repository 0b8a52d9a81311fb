import { redactJsonSecrets } from '@/lib/redaction/redact-json';

export type LogLevel = 'debug' | 'info' | 'error';
export type ModuleName = 'content-deploy-ovf-template' | 'object-permissions-info';
/** `vcenter` is the client layer shared by the modules. */
export type ServiceName = ModuleName | 'vcenter';

export type LogEventInput = {
  event_type: string;
  level: LogLevel;
  service: ServiceName;
  message?: string;
} & Record<string, unknown>;

const EXCERPT_LIMIT = 2000;

function getEnv() {
  const env = process.env.NODE_ENV;
  if (env === 'production' || env === 'test' || env === 'development') return env;
  return 'production';
}

function getVersion() {
  return process.env.VSPHERE_MODULES_VERSION ?? process.env.GIT_SHA ?? 'unknown';
}

function levelRank(level: LogLevel | 'silent'): number {
  if (level === 'debug') return 10;
  if (level === 'info') return 20;
  if (level === 'error') return 30;
  return 100;
}

function getMinLevel(): LogLevel | 'silent' {
  const value = process.env.VSPHERE_LOG_LEVEL?.trim().toLowerCase();
  if (value === 'debug' || value === 'info' || value === 'error' || value === 'silent') return value;
  return 'info';
}

function truncateExcerptsDeep(input: unknown): unknown {
  if (Array.isArray(input)) return input.map((v) => truncateExcerptsDeep(v));
  if (!input || typeof input !== 'object') return input;

  const out: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(input)) {
    if (key.endsWith('_excerpt') && typeof value === 'string') {
      out[key] = value.length > EXCERPT_LIMIT ? value.slice(0, EXCERPT_LIMIT) : value;
      continue;
    }

    out[key] = truncateExcerptsDeep(value);
  }

  return out;
}

/**
 * Emits one JSON line on stderr. stdout belongs to the module result document, so log lines
 * never go there.
 */
export function logEvent(input: LogEventInput) {
  if (levelRank(input.level) < levelRank(getMinLevel())) return;

  const base = {
    ts: new Date().toISOString(),
    env: getEnv(),
    version: getVersion(),
    ...input,
  };

  const event = truncateExcerptsDeep(redactJsonSecrets(base));
  console.error(JSON.stringify(event));
}
