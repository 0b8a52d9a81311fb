import { ErrorCode } from '@/lib/errors/error-codes';
import { validateModuleResultV1 } from '@/lib/schema/validate';

import type { AppError } from '@/lib/errors/error';

export type ModuleResult = {
  changed: boolean;
  failed?: true;
  msg?: string;
  warnings?: string[];
  error?: AppError;
} & Record<string, unknown>;

export type ModuleOutcome = { result: ModuleResult; exitCode: 0 | 1 };

function withWarnings(result: ModuleResult, warnings: string[] | undefined): ModuleResult {
  if (!warnings || warnings.length === 0) return result;
  return { ...result, warnings };
}

export function exitJson(payload: ModuleResult, warnings?: string[]): ModuleOutcome {
  return { result: withWarnings(payload, warnings), exitCode: 0 };
}

export function failJson(error: AppError, extra?: Record<string, unknown>, warnings?: string[]): ModuleOutcome {
  return {
    result: withWarnings({ ...extra, changed: false, failed: true, msg: error.message, error }, warnings),
    exitCode: 1,
  };
}

/** Replaces a document that does not match module-result-v1 with a failure describing why. */
export function finalizeModuleOutcome(outcome: ModuleOutcome): ModuleOutcome {
  const validation = validateModuleResultV1(outcome.result);
  if (validation.ok) return outcome;

  return failJson({
    code: ErrorCode.MODULE_OUTPUT_INVALID,
    category: 'schema',
    message: 'module result failed module-result-v1 schema validation',
    retryable: false,
    redacted_context: { issues: validation.issues.slice(0, 20) },
  });
}

export function writeModuleResult(
  outcome: ModuleOutcome,
  write: (line: string) => void = (line) => {
    process.stdout.write(line);
  },
): 0 | 1 {
  const finalized = finalizeModuleOutcome(outcome);
  write(`${JSON.stringify(finalized.result)}\n`);
  return finalized.exitCode;
}
