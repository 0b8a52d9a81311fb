import { describe, expect, it } from 'vitest';

import { loadModuleEnv } from '@/lib/env/module-env';

describe('loadModuleEnv', () => {
  it('applies defaults and treats empty strings as unset', () => {
    const env = loadModuleEnv({ VMWARE_HOST: '', VMWARE_USER: 'administrator@vsphere.local' });

    expect(env.VMWARE_HOST).toBeUndefined();
    expect(env.VMWARE_USER).toBe('administrator@vsphere.local');
    expect(env.VSPHERE_LOG_LEVEL).toBe('info');
    expect(env.NODE_ENV).toBe('production');
  });

  it('coerces VMWARE_PORT to a number', () => {
    expect(loadModuleEnv({ VMWARE_PORT: '8443' }).VMWARE_PORT).toBe(8443);
  });

  it('rejects an unknown vcenter version', () => {
    expect(() => loadModuleEnv({ VMWARE_VCENTER_VERSION: '5.5' })).toThrow(/invalid environment variables/i);
  });
});
