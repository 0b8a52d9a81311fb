import { readFile } from 'node:fs/promises';

import { ErrorCode } from '@/lib/errors/error-codes';
import { toModuleBoolean } from '@/lib/module/params';

import type { AppError } from '@/lib/errors/error';

export type ModuleArgs = {
  params: Record<string, unknown>;
  checkMode: boolean;
  /** `_ansible_*` keys passed by the runtime, without the prefix. */
  internal: Record<string, unknown>;
};

export type ModuleArgsResult = { ok: true; args: ModuleArgs } | { ok: false; error: AppError };

const INTERNAL_PREFIX = '_ansible_';

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function stripUtf8Bom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function argsInvalid(message: string): ModuleArgsResult {
  return {
    ok: false,
    error: { code: ErrorCode.MODULE_ARGS_INVALID, category: 'parse', message, retryable: false },
  };
}

/**
 * Binary modules get the path of an args file as their only argument; without one the JSON
 * is read from stdin.
 */
export async function readModuleInput(input: {
  argv: string[];
  stdin: AsyncIterable<Buffer | string>;
}): Promise<string> {
  const argsPath = input.argv.slice(2).find((arg) => arg.trim().length > 0);
  if (argsPath) return await readFile(argsPath, 'utf8');

  const chunks: Buffer[] = [];
  for await (const chunk of input.stdin) chunks.push(Buffer.from(chunk));
  return Buffer.concat(chunks).toString('utf8');
}

export function parseModuleArgs(text: string): ModuleArgsResult {
  const normalized = stripUtf8Bom(text).trim();
  if (!normalized) return argsInvalid('module input is empty');

  let parsed: unknown;
  try {
    parsed = JSON.parse(normalized);
  } catch {
    return argsInvalid('module input is not valid json');
  }
  if (!isRecord(parsed)) return argsInvalid('module input must be a json object');

  const wrapped = parsed.ANSIBLE_MODULE_ARGS;
  if (wrapped !== undefined && !isRecord(wrapped)) return argsInvalid('ANSIBLE_MODULE_ARGS must be an object');
  const source = wrapped ?? parsed;

  const params: Record<string, unknown> = {};
  const internal: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    if (key.startsWith(INTERNAL_PREFIX)) internal[key.slice(INTERNAL_PREFIX.length)] = value;
    else params[key] = value;
  }

  return {
    ok: true,
    args: { params, internal, checkMode: toModuleBoolean(internal.check_mode) ?? false },
  };
}
