import { ModuleFailure, toPublicError } from '@/lib/errors/error';
import { ErrorCode } from '@/lib/errors/error-codes';
import { loadModuleEnv } from '@/lib/env/module-env';
import { logEvent } from '@/lib/logging/logger';
import { parseModuleArgs, readModuleInput } from '@/lib/module/module-args';
import { failJson, writeModuleResult } from '@/lib/module/module-result';

import type { ModuleEnv } from '@/lib/env/module-env';
import type { ModuleName } from '@/lib/logging/logger';
import type { ModuleArgs } from '@/lib/module/module-args';
import type { ModuleOutcome } from '@/lib/module/module-result';

export type ModuleContext = { args: ModuleArgs; env: ModuleEnv };

export type ModuleRunner = (ctx: ModuleContext) => Promise<ModuleOutcome>;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Parses the module input, loads the env fallbacks and runs one module invocation. */
export async function runModule(input: {
  service: ModuleName;
  run: ModuleRunner;
  text: string;
  runtimeEnv?: Record<string, string | undefined>;
}): Promise<ModuleOutcome> {
  const parsed = parseModuleArgs(input.text);
  if (!parsed.ok) {
    logEvent({ event_type: 'module.args_invalid', level: 'error', service: input.service, message: parsed.error.message });
    return failJson(parsed.error);
  }

  let env: ModuleEnv;
  try {
    env = loadModuleEnv(input.runtimeEnv ?? process.env);
  } catch (err) {
    return failJson({
      code: ErrorCode.CONFIG_ENV_INVALID,
      category: 'config',
      message: errorMessage(err),
      retryable: false,
    });
  }

  const startedAt = Date.now();
  logEvent({
    event_type: 'module.start',
    level: 'info',
    service: input.service,
    check_mode: parsed.args.checkMode,
  });

  let outcome: ModuleOutcome;
  try {
    outcome = await input.run({ args: parsed.args, env });
  } catch (err) {
    const error = err instanceof ModuleFailure ? err.error : toPublicError(err);
    logEvent({
      event_type: 'module.unhandled_error',
      level: 'error',
      service: input.service,
      error_code: error.code,
      cause: errorMessage(err),
    });
    outcome = failJson(error);
  }

  logEvent({
    event_type: 'module.finish',
    level: outcome.exitCode === 0 ? 'info' : 'error',
    service: input.service,
    changed: outcome.result.changed,
    exit_code: outcome.exitCode,
    duration_ms: Date.now() - startedAt,
    ...(outcome.result.error ? { error_code: outcome.result.error.code } : {}),
  });
  return outcome;
}

/** Entry point shared by the module binaries: read, run, write exactly one result document. */
export async function runModuleMain(input: {
  service: ModuleName;
  run: ModuleRunner;
  argv?: string[];
  stdin?: AsyncIterable<Buffer | string>;
  write?: (line: string) => void;
}): Promise<0 | 1> {
  let text: string;
  try {
    text = await readModuleInput({ argv: input.argv ?? process.argv, stdin: input.stdin ?? process.stdin });
  } catch (err) {
    const outcome = failJson({
      code: ErrorCode.MODULE_ARGS_INVALID,
      category: 'parse',
      message: `unable to read module input: ${errorMessage(err)}`,
      retryable: false,
    });
    return writeModuleResult(outcome, input.write);
  }

  return writeModuleResult(await runModule({ service: input.service, run: input.run, text }), input.write);
}
