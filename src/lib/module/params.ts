import { z } from 'zod/v4';

import { ErrorCode } from '@/lib/errors/error-codes';

import type { AppError, ErrorDetail } from '@/lib/errors/error';

const TRUE_STRINGS = new Set(['y', 'yes', 'on', '1', 'true', 't']);
const FALSE_STRINGS = new Set(['n', 'no', 'off', '0', 'false', 'f']);

/** Boolean spellings accepted by the orchestration runtime. */
export function toModuleBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number' && Number.isFinite(value)) {
    if (value === 1) return true;
    if (value === 0) return false;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(normalized)) return true;
    if (FALSE_STRINGS.has(normalized)) return false;
  }
  return undefined;
}

export function toModuleInt(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return Number(value.trim());
  return undefined;
}

export const moduleBoolean = z.preprocess((value) => toModuleBoolean(value) ?? value, z.boolean());
export const moduleInt = z.preprocess((value) => toModuleInt(value) ?? value, z.number().int());

type ParamGroups = ReadonlyArray<readonly string[]>;

export type ArgumentSpec<S extends z.ZodObject> = {
  schema: S;
  aliases?: Record<string, readonly string[]>;
  /** Values used when neither the param nor its fallback is set. */
  defaults?: Record<string, unknown>;
  /** Environment-derived values used when the param is not set. */
  fallbacks?: Record<string, unknown>;
  mutuallyExclusive?: ParamGroups;
  requiredOneOf?: ParamGroups;
  requiredTogether?: ParamGroups;
  /** Params that need others once set; defaults count as set here. */
  requiredBy?: Record<string, readonly string[]>;
};

export type ParamsResult<T> = { ok: true; params: T; warnings: string[] } | { ok: false; error: AppError };

function isSet(value: unknown): boolean {
  return value !== undefined && value !== null;
}

export function applyAliases(
  raw: Record<string, unknown>,
  aliases: Record<string, readonly string[]>,
): { params: Record<string, unknown>; warnings: string[] } {
  const params: Record<string, unknown> = { ...raw };
  const warnings: string[] = [];

  for (const [canonical, names] of Object.entries(aliases)) {
    for (const alias of names) {
      if (!(alias in params)) continue;
      const value = params[alias];
      delete params[alias];
      if (isSet(params[canonical])) {
        warnings.push(`Both option ${canonical} and its alias ${alias} are set.`);
        continue;
      }
      params[canonical] = value;
    }
  }

  return { params, warnings };
}

export function mutuallyExclusive(params: Record<string, unknown>, group: readonly string[]): ErrorDetail | null {
  const present = group.filter((name) => isSet(params[name]));
  if (present.length <= 1) return null;
  return {
    field: group.join('|'),
    issue: 'mutually_exclusive',
    message: `parameters are mutually exclusive: ${group.join('|')}`,
  };
}

export function requiredOneOf(params: Record<string, unknown>, group: readonly string[]): ErrorDetail | null {
  if (group.some((name) => isSet(params[name]))) return null;
  return {
    field: group.join('|'),
    issue: 'required_one_of',
    message: `one of the following is required: ${group.join(', ')}`,
  };
}

export function requiredTogether(params: Record<string, unknown>, group: readonly string[]): ErrorDetail | null {
  const present = group.filter((name) => isSet(params[name]));
  if (present.length === 0 || present.length === group.length) return null;
  return {
    field: group.join('|'),
    issue: 'required_together',
    message: `parameters are required together: ${group.join(', ')}`,
  };
}

export function requiredBy(
  params: Record<string, unknown>,
  name: string,
  needs: readonly string[],
): ErrorDetail | null {
  if (!isSet(params[name])) return null;
  const missing = needs.filter((other) => !isSet(params[other]));
  if (missing.length === 0) return null;
  return {
    field: name,
    issue: 'required_by',
    message: `missing parameter(s) required by '${name}': ${missing.join(', ')}`,
  };
}

function issuesToDetails(issues: z.core.$ZodIssue[], merged: Record<string, unknown>): ErrorDetail[] {
  const missing: string[] = [];
  const details: ErrorDetail[] = [];

  for (const issue of issues) {
    const field = issue.path.map((p) => String(p)).join('.');
    const top = issue.path[0];
    const value = typeof top === 'string' ? merged[top] : undefined;

    if (!isSet(value) && issue.path.length === 1) {
      missing.push(field);
      continue;
    }

    if (issue.code === 'invalid_value') {
      details.push({
        field,
        issue: 'choices',
        message: `value of ${field} must be one of: ${issue.values.map((v) => String(v)).join(', ')}, got: ${String(value)}`,
      });
      continue;
    }

    details.push({ field, issue: issue.code, message: `argument ${field} is invalid: ${issue.message}` });
  }

  if (missing.length > 0) {
    details.unshift({
      field: missing.join(','),
      issue: 'required',
      message: `missing required arguments: ${missing.join(', ')}`,
    });
  }

  return details;
}

function paramsInvalid(details: ErrorDetail[]): { ok: false; error: AppError } {
  return {
    ok: false,
    error: {
      code: ErrorCode.MODULE_PARAMS_INVALID,
      category: 'config',
      message: details[0]?.message ?? 'invalid module parameters',
      retryable: false,
      details,
    },
  };
}

/**
 * Validates raw module params the way the runtime's argument spec does: aliases, unsupported
 * names and mutual exclusion first, then fallbacks and defaults, then types/choices, and the
 * group constraints last.
 */
export function parseModuleParams<S extends z.ZodObject>(
  spec: ArgumentSpec<S>,
  raw: Record<string, unknown>,
): ParamsResult<z.output<S>> {
  const aliases = spec.aliases ?? {};
  const { params, warnings } = applyAliases(raw, aliases);

  const supported = Object.keys(spec.schema.shape);
  const unsupported = Object.keys(params).filter((name) => !supported.includes(name));
  if (unsupported.length > 0) {
    const names = [...supported, ...Object.values(aliases).flat()].sort();
    return paramsInvalid([
      {
        field: unsupported.join(','),
        issue: 'unsupported',
        message: `Unsupported parameters: ${unsupported.join(', ')}. Supported parameters include: ${names.join(', ')}.`,
      },
    ]);
  }

  const exclusive = (spec.mutuallyExclusive ?? [])
    .map((group) => mutuallyExclusive(params, group))
    .filter((d): d is ErrorDetail => d !== null);
  if (exclusive.length > 0) return paramsInvalid(exclusive);

  // Group constraints look at what the caller supplied; defaults never satisfy them.
  const supplied: Record<string, unknown> = {};
  const merged: Record<string, unknown> = {};
  for (const name of supported) {
    const given = [params[name], spec.fallbacks?.[name]].find((v) => isSet(v));
    if (given !== undefined) supplied[name] = given;
    const value = given ?? spec.defaults?.[name];
    if (isSet(value)) merged[name] = value;
  }

  const parsed = spec.schema.safeParse(merged);
  if (!parsed.success) return paramsInvalid(issuesToDetails(parsed.error.issues, merged));

  const groups = [
    ...(spec.requiredTogether ?? []).map((group) => requiredTogether(supplied, group)),
    ...(spec.requiredOneOf ?? []).map((group) => requiredOneOf(supplied, group)),
    ...Object.entries(spec.requiredBy ?? {}).map(([name, needs]) => requiredBy(merged, name, needs)),
  ].filter((d): d is ErrorDetail => d !== null);
  if (groups.length > 0) return paramsInvalid(groups);

  return { ok: true, params: parsed.data, warnings };
}
