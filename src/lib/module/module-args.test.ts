import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { parseModuleArgs, readModuleInput } from '@/lib/module/module-args';

async function* chunks(...parts: string[]): AsyncGenerator<string> {
  for (const part of parts) yield part;
}

describe('readModuleInput', () => {
  it('reads stdin when no args file is given', async () => {
    const text = await readModuleInput({ argv: ['node', 'index.ts'], stdin: chunks('{"a":', '1}') });
    expect(text).toBe('{"a":1}');
  });

  it('prefers the args file passed as first argument', async () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'vsphere-module-args-'));
    const file = path.join(dir, 'args');
    writeFileSync(file, '{"ANSIBLE_MODULE_ARGS":{"name":"web-01"}}', 'utf8');

    const text = await readModuleInput({ argv: ['node', 'index.ts', file], stdin: chunks('ignored') });
    expect(text).toBe('{"ANSIBLE_MODULE_ARGS":{"name":"web-01"}}');
  });
});

describe('parseModuleArgs', () => {
  it('unwraps ANSIBLE_MODULE_ARGS and splits internal keys', () => {
    const result = parseModuleArgs(
      JSON.stringify({
        ANSIBLE_MODULE_ARGS: { name: 'web-01', _ansible_check_mode: true, _ansible_verbosity: 2 },
      }),
    );

    expect(result).toEqual({
      ok: true,
      args: { params: { name: 'web-01' }, internal: { check_mode: true, verbosity: 2 }, checkMode: true },
    });
  });

  it('accepts bare params with a BOM', () => {
    const result = parseModuleArgs('\uFEFF{"object_name":"rootFolder"}');
    expect(result).toEqual({
      ok: true,
      args: { params: { object_name: 'rootFolder' }, internal: {}, checkMode: false },
    });
  });

  it('rejects invalid json', () => {
    expect(parseModuleArgs('{nope')).toEqual({
      ok: false,
      error: { code: 'MODULE_ARGS_INVALID', category: 'parse', message: 'module input is not valid json', retryable: false },
    });
  });

  it('rejects non-object input', () => {
    const result = parseModuleArgs('[1,2]');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('module input must be a json object');
  });
});
