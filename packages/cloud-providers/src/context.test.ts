import { describe, it, expect } from 'vitest';
import { RuntimeConfigSchema } from '@vmforge/core';
import { createProvisioningContext } from './context';

const silent = RuntimeConfigSchema.parse({ logLevel: 'silent' });

describe('createProvisioningContext', () => {
  it('seeds the bundled templates by default', () => {
    const context = createProvisioningContext({ config: silent });

    expect(context.prototypes.size).toBe(3);
    expect(context.factories.getSupportedProviders()).toEqual(['aws', 'azure', 'gcp', 'onpremise']);
  });

  it('leaves the template registry empty when seeding is off', () => {
    const context = createProvisioningContext({
      config: RuntimeConfigSchema.parse({ logLevel: 'silent', seedDefaultTemplates: false }),
    });
    expect(context.prototypes.size).toBe(0);
  });

  it('builds independent contexts', () => {
    const first = createProvisioningContext({ config: silent });
    const second = createProvisioningContext({ config: silent });

    first.templates.deleteTemplate('web-server-standard');

    expect(first.prototypes.size).toBe(2);
    expect(second.prototypes.size).toBe(3);
    expect(first.factories).not.toBe(second.factories);
  });

  it('shares the registry between the template and construction services', () => {
    const context = createProvisioningContext({ config: silent });

    const result = context.templates.createFromTemplate('web-server-standard', { provider: 'gcp' });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.createdResources.map((r) => r.resourceType)).toEqual(['network', 'storage', 'vm']);
    expect(result.createdResources[0].resourceId).toMatch(/^gcp-net-/);
  });
});
