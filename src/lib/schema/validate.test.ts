import { describe, expect, it } from 'vitest';

import { validateModuleResultV1 } from '@/lib/schema/validate';

describe('validateModuleResultV1', () => {
  it('accepts a deploy success document', () => {
    expect(
      validateModuleResultV1({
        changed: true,
        vm_deploy_info: { msg: "Deployed Virtual Machine 'web-01'.", vm_id: 'vm-1009' },
      }),
    ).toEqual({ ok: true });
  });

  it('accepts a permissions document', () => {
    expect(
      validateModuleResultV1({
        changed: false,
        permissions: [
          {
            entity: { type: 'Folder', moid: 'group-v3' },
            principal: 'VSPHERE.LOCAL\\ops',
            group: true,
            role_id: -2,
            role: 'ReadOnly',
            propagate: true,
          },
        ],
      }),
    ).toEqual({ ok: true });
  });

  it('requires msg and error on failures', () => {
    const result = validateModuleResultV1({ changed: false, failed: true });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues.map((i) => i.message)).toContain("must have required property 'msg'");
    expect(result.issues.map((i) => i.message)).toContain("must have required property 'error'");
  });

  it('rejects a failure that reports a change', () => {
    const result = validateModuleResultV1({
      changed: true,
      failed: true,
      msg: 'x',
      error: { code: 'INTERNAL_ERROR', category: 'unknown', message: 'x', retryable: false },
    });
    expect(result.ok).toBe(false);
  });

  it('rejects vm_deploy_info without vm_id', () => {
    const result = validateModuleResultV1({ changed: false, vm_deploy_info: { msg: 'x' } });
    expect(result).toEqual({
      ok: false,
      issues: [{ instancePath: '/vm_deploy_info', message: "must have required property 'vm_id'" }],
    });
  });
});
