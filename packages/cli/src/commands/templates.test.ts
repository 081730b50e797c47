import { describe, it, expect, beforeEach } from 'vitest';
import { createProvisioningContext } from '@vmforge/cloud-providers';
import type { ProvisioningContext } from '@vmforge/cloud-providers';
import { MemoryOutputService } from '../services/memory-output.service';
import { runHandler } from '../program';
import { createFromTemplate, listTemplates, showTemplate, validateTemplate } from './templates';

describe('templates commands', () => {
  let context: ProvisioningContext;
  let output: MemoryOutputService;

  beforeEach(() => {
    context = createProvisioningContext();
    output = new MemoryOutputService();
  });

  it('lists the seeded templates', () => {
    expect(listTemplates(context, {}, output)).toBe(0);

    expect(output.linesOf('header')).toEqual(['📦 VM templates']);
    expect(output.linesOf('field')).toEqual([
      'web-server-standard: aws standard [web-services], used 0 time(s)',
      'database-optimized: aws memory_optimized [databases], used 0 time(s)',
      'analytics-compute: aws compute_optimized [analytics], used 0 time(s)',
    ]);
    expect(output.linesOf('dim').at(-1)).toBe('3 template(s) in 3 categories');
  });

  it('says so when a category is empty', () => {
    expect(listTemplates(context, { category: 'gaming' }, output)).toBe(0);
    expect(output.linesOf('dim')).toEqual(["No templates in category 'gaming'"]);
  });

  it('shows template details', () => {
    expect(showTemplate(context, 'database-optimized', {}, output)).toBe(0);

    const fields = output.linesOf('field');
    expect(fields).toContain('Category: databases');
    expect(fields).toContain('Memory (GB): 32');
    expect(fields).toContain('Compatible providers: aws, azure, gcp, onpremise');
    expect(fields).toContain('tag purpose: database');
  });

  it('reports an unknown template', () => {
    expect(showTemplate(context, 'nope', {}, output)).toBe(1);
    expect(output.linesOf('error')).toEqual(["Template 'nope' not found"]);
  });

  it('builds a VM from a template in another region', () => {
    expect(createFromTemplate(context, 'web-server-standard', { region: 'eu-west-1' }, output)).toBe(0);

    expect(output.linesOf('success')).toEqual(['Built aws standard VM in eu-west-1']);
    expect(context.prototypes.getPrototype('web-server-standard')?.getTemplateInfo().creationCount).toBe(1);
  });

  it('rejects customizations that do not match the schema', () => {
    const code = runHandler(output, () =>
      createFromTemplate(context, 'web-server-standard', { customizations: '{"vmConfig":5}' }, output)
    );

    expect(code).toBe(1);
    expect(output.linesOf('error')).toEqual([
      'Invalid --customizations: vmConfig: Expected object, received number',
    ]);
  });

  it('prints validation issues and suggestions', () => {
    expect(validateTemplate(context, 'web-server-standard', { provider: 'ibm' }, output)).toBe(1);

    expect(output.linesOf('error')).toEqual(["Template 'web-server-standard' is not valid"]);
    expect(output.linesOf('info')).toEqual([
      "- Cannot adapt template to provider 'ibm': Unsupported provider 'ibm'",
    ]);
    expect(output.linesOf('dim')).toEqual(['Supported providers: aws, azure, gcp, onpremise']);
    expect(output.linesOf('field')).toEqual([]);
  });
});
