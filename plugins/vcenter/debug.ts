import { appendFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';

import { toModuleBoolean } from '@/lib/module/params';
import { redactJsonSecrets } from '@/lib/redaction/redact-json';

const DEBUG_EXCERPT_LIMIT = 2000;

export function excerpt(text: string, limit = DEBUG_EXCERPT_LIMIT): string {
  return text.length > limit ? text.slice(0, limit) : text;
}

function isDebugEnabled(): boolean {
  return toModuleBoolean(process.env.VSPHERE_DEBUG) ?? toModuleBoolean(process.env.VSPHERE_MODULES_DEBUG) ?? false;
}

/**
 * Wire trace for the vCenter clients, written to `logs/<prefix>-YYYY-MM-DD.log` under the
 * working directory when VSPHERE_DEBUG is set.
 */
export function createDebugLog(component: 'vcenter.rest' | 'vcenter.soap', filePrefix: string) {
  return function debugLog(message: string, data?: unknown) {
    if (!isDebugEnabled()) return;
    try {
      const logsDir = join(process.cwd(), 'logs');
      mkdirSync(logsDir, { recursive: true });
      const logFile = join(logsDir, `${filePrefix}-${new Date().toISOString().slice(0, 10)}.log`);
      const payload = {
        ts: new Date().toISOString(),
        level: 'debug',
        component,
        message,
        ...(data !== undefined ? { data: redactJsonSecrets(data) } : {}),
      };
      appendFileSync(logFile, `${JSON.stringify(payload)}\n`);
    } catch (err) {
      // Reported on stderr only; the trace is optional and the module run continues.
      console.error(
        JSON.stringify({
          ts: new Date().toISOString(),
          level: 'error',
          component,
          event_type: 'debug.trace_write_failed',
          cause: err instanceof Error ? err.message : String(err),
        }),
      );
    }
  };
}
