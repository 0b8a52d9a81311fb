import { describe, expect, it } from 'vitest';

import { ModuleFailure } from '@/lib/errors/error';
import { exitJson } from '@/lib/module/module-result';
import { runModule, runModuleMain } from '@/lib/module/run';

import type { ModuleRunner } from '@/lib/module/run';

async function* chunks(...parts: string[]) {
  for (const part of parts) yield Buffer.from(part);
}

describe('runModule', () => {
  it('hands parsed args and env to the runner', async () => {
    const run: ModuleRunner = async ({ args, env }) =>
      exitJson({ changed: args.checkMode, vm_name: String(args.params.name), desired_operation: env.VMWARE_HOST ?? '' });

    const outcome = await runModule({
      service: 'content-deploy-ovf-template',
      run,
      text: JSON.stringify({ ANSIBLE_MODULE_ARGS: { name: 'web-01', _ansible_check_mode: 'yes' } }),
      runtimeEnv: { VMWARE_HOST: 'vc.example.test' },
    });

    expect(outcome).toEqual({
      exitCode: 0,
      result: { changed: true, vm_name: 'web-01', desired_operation: 'vc.example.test' },
    });
  });

  it('fails on invalid environment fallbacks', async () => {
    const outcome = await runModule({
      service: 'object-permissions-info',
      run: async () => exitJson({ changed: false }),
      text: '{}',
      runtimeEnv: { VMWARE_VCENTER_VERSION: '5.5' },
    });

    expect(outcome.exitCode).toBe(1);
    expect(outcome.result.error).toMatchObject({ code: 'CONFIG_ENV_INVALID', category: 'config' });
  });

  it('keeps ModuleFailure errors and hides unexpected ones', async () => {
    const failing = await runModule({
      service: 'object-permissions-info',
      run: async () => {
        throw new ModuleFailure({ code: 'VCENTER_OBJECT_NOT_FOUND', category: 'not_found', message: 'gone', retryable: false });
      },
      text: '{}',
      runtimeEnv: {},
    });
    expect(failing.result).toEqual({
      changed: false,
      failed: true,
      msg: 'gone',
      error: { code: 'VCENTER_OBJECT_NOT_FOUND', category: 'not_found', message: 'gone', retryable: false },
    });

    const crashing = await runModule({
      service: 'object-permissions-info',
      run: async () => {
        throw new Error('boom');
      },
      text: '{}',
      runtimeEnv: {},
    });
    expect(crashing.result.msg).toBe('Internal error');
    expect(crashing.result.error).toEqual({
      code: 'INTERNAL_ERROR',
      category: 'unknown',
      message: 'Internal error',
      retryable: false,
    });
  });
});

describe('runModuleMain', () => {
  it('reads stdin and writes exactly one line', async () => {
    const lines: string[] = [];

    const exitCode = await runModuleMain({
      service: 'object-permissions-info',
      run: async ({ args }) => exitJson({ changed: false, msg: String(args.params.greeting) }),
      argv: ['node', 'index.ts'],
      stdin: chunks('{"greeting":', '"hello"}'),
      write: (line) => lines.push(line),
    });

    expect(exitCode).toBe(0);
    expect(lines).toEqual(['{"changed":false,"msg":"hello"}\n']);
  });

  it('reports an unreadable args file', async () => {
    const lines: string[] = [];

    const exitCode = await runModuleMain({
      service: 'object-permissions-info',
      run: async () => exitJson({ changed: false }),
      argv: ['node', 'index.ts', '/nonexistent/args.json'],
      stdin: chunks(),
      write: (line) => lines.push(line),
    });

    expect(exitCode).toBe(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      failed: true,
      error: { code: 'MODULE_ARGS_INVALID', category: 'parse' },
    });
  });
});
