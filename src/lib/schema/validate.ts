import Ajv from 'ajv/dist/2020';

import moduleResultV1Schema from './module-result-v1.schema.json';

type Issue = { instancePath: string; message: string };

export type ValidationResult = { ok: true } | { ok: false; issues: Issue[] };

const ajv = new Ajv({ allErrors: true, strict: false });

const validateModuleResult = ajv.compile(moduleResultV1Schema);

function toIssues(errors: typeof validateModuleResult.errors): Issue[] {
  if (!errors) return [];
  return errors.map((err) => ({
    instancePath: err.instancePath,
    message: err.message ?? 'invalid',
  }));
}

export function validateModuleResultV1(input: unknown): ValidationResult {
  const ok = validateModuleResult(input);
  if (ok) return { ok: true };
  return { ok: false, issues: toIssues(validateModuleResult.errors) };
}
