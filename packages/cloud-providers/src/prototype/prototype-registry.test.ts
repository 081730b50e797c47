import { describe, it, expect, beforeEach } from 'vitest';
import { VmDirector } from '../director/vm-director';
import { PrototypeRegistry } from './prototype-registry';
import { VmTemplatePrototype } from './vm-prototype';
import { loadTemplateDefinitions, registerDefaultTemplates } from './default-templates';

const director = new VmDirector();

function prototype(name: string, category: string, provider = 'aws'): VmTemplatePrototype {
  const region = provider === 'aws' ? 'us-east-1' : 'eastus';
  return new VmTemplatePrototype({
    templateName: name,
    description: `${name} template`,
    vmSpecification: director.getVmSpecification(provider, 'standard', region),
    category,
  });
}

describe('PrototypeRegistry', () => {
  let registry: PrototypeRegistry;

  beforeEach(() => {
    registry = new PrototypeRegistry();
  });

  it('refuses to overwrite an existing name', () => {
    const first = prototype('web', 'web-services');
    expect(registry.register('web', first)).toBe(true);
    expect(registry.register('web', prototype('web', 'other'))).toBe(false);

    expect(registry.getPrototype('web')?.getTemplateInfo()).toEqual(first.getTemplateInfo());
    expect(registry.getCategories()).toEqual(['web-services']);
    expect(registry.size).toBe(1);
  });

  it('indexes templates by category', () => {
    registry.register('web', prototype('web', 'web-services'));
    registry.register('cache', prototype('cache', 'databases'));
    registry.register('proxy', prototype('proxy', 'web-services'));

    const web = registry.listTemplates('web-services');
    expect(web.total).toBe(2);
    expect(web.templates.map((t) => t.templateName)).toEqual(['web', 'proxy']);
    expect(web.categories).toEqual(['web-services']);

    const all = registry.listTemplates();
    expect(all.total).toBe(3);
    expect(all.categories).toEqual(['web-services', 'databases']);
  });

  it('returns an empty listing for an unknown category', () => {
    expect(registry.listTemplates('nothing')).toEqual({ templates: [], total: 0, categories: [] });
  });

  it('removes templates from both indexes and prunes empty buckets', () => {
    registry.register('web', prototype('web', 'web-services'));
    registry.register('cache', prototype('cache', 'databases'));

    expect(registry.removeTemplate('cache')).toBe(true);
    expect(registry.getPrototype('cache')).toBeUndefined();
    expect(registry.getCategories()).toEqual(['web-services']);
    expect(registry.removeTemplate('cache')).toBe(false);
    expect(registry.size).toBe(1);
  });

  it('clones and customizes in one step', () => {
    registry.register('web', prototype('web', 'web-services'));
    const clone = registry.cloneAndCustomize('web', { vmConfig: { vcpus: 4 } });

    expect(clone?.getVmSpecification().vmConfig.vcpus).toBe(4);
    expect(registry.getPrototype('web')?.getVmSpecification().vmConfig.vcpus).toBe(2);
    expect(registry.getPrototype('web')?.getTemplateInfo().creationCount).toBe(1);
  });

  it('looks up a template without exposing its mutators', () => {
    registry.register('web', prototype('web', 'web-services'));
    const view = registry.getPrototype('web');

    expect(view?.templateName).toBe('web');
    expect(view?.category).toBe('web-services');
    expect(view !== undefined && 'customize' in view).toBe(false);
    expect(view !== undefined && 'clone' in view).toBe(false);

    const spec = view?.getVmSpecification();
    if (spec) {
      spec.vmConfig.vcpus = 64;
    }
    expect(registry.getPrototype('web')?.getVmSpecification().vmConfig.vcpus).toBe(2);
    expect(registry.getPrototype('web')?.getTemplateInfo().creationCount).toBe(0);
  });

  it('returns undefined when looking up an unknown template', () => {
    expect(registry.getPrototype('missing')).toBeUndefined();
  });

  it('returns undefined when cloning an unknown template', () => {
    expect(registry.cloneAndCustomize('missing')).toBeUndefined();
  });
});

describe('registerDefaultTemplates', () => {
  it('seeds the three bundled templates', () => {
    const registry = new PrototypeRegistry();
    expect(registerDefaultTemplates(registry)).toBe(3);
    expect(registry.getCategories()).toEqual(['web-services', 'databases', 'analytics']);

    const database = registry.getPrototype('database-optimized');
    expect(database?.getTemplateInfo()).toMatchObject({
      vmType: 'memory_optimized',
      tags: { purpose: 'database', tier: 'backend', performance: 'high' },
      specifications: { vcpus: 4, memoryGb: 32, storageGb: 100 },
    });
    expect(database?.getVmSpecification().networkConfig.publicIp).toBe(false);
  });

  it('does not register duplicates when seeded twice', () => {
    const registry = new PrototypeRegistry();
    registerDefaultTemplates(registry);
    expect(registerDefaultTemplates(registry)).toBe(0);
    expect(registry.size).toBe(3);
  });

  it('validates template definitions', () => {
    expect(() => loadTemplateDefinitions([{ templateName: 'broken' }])).toThrow();
  });
});
