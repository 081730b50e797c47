import { describe, it, expect, beforeEach } from 'vitest';
import { createProvisioningContext } from '@vmforge/cloud-providers';
import type { ProvisioningContext } from '@vmforge/cloud-providers';
import { MemoryOutputService } from '../services/memory-output.service';
import { runHandler } from '../program';
import { build, catalog, validate } from './build';

describe('build commands', () => {
  let context: ProvisioningContext;
  let output: MemoryOutputService;

  beforeEach(() => {
    context = createProvisioningContext();
    output = new MemoryOutputService();
  });

  it('builds a catalog VM and prints a summary', () => {
    const code = build(context, { provider: 'aws', type: 'standard', region: 'us-east-1' }, output);

    expect(code).toBe(0);
    expect(output.linesOf('success')).toEqual(['Built aws standard VM in us-east-1']);
    const fields = output.linesOf('field');
    expect(fields.slice(0, 3)).toEqual(['vCPUs: 2', 'Memory (GB): 8', 'Storage (GB): 50']);
    expect(fields[3]).toMatch(/^network: aws-net-/);
    expect(fields[6]).toMatch(/^Estimated monthly cost: \d+\.\d{2} USD$/);
  });

  it('applies JSON overrides and prints JSON on request', () => {
    const code = build(
      context,
      {
        provider: 'gcp',
        type: 'compute_optimized',
        region: 'us-central1',
        flavor: 'large',
        vmConfig: '{"vcpus":12}',
        storageConfig: '{"sizeGb":80}',
        json: true,
      },
      output
    );

    expect(code).toBe(0);
    const printed = JSON.parse(output.linesOf('json')[0]);
    expect(printed.vmSpecification.vmConfig.vcpus).toBe(12);
    expect(printed.vmSpecification.vmConfig.machineType).toBe('n2-highcpu-8');
    expect(printed.vmSpecification.storageConfig.sizeGb).toBe(80);
    expect(printed.createdResources).toHaveLength(3);
  });

  it('prints validation suggestions', () => {
    const code = validate(context, { provider: 'aws', type: 'gpu', region: 'us-east-1' }, output);

    expect(code).toBe(1);
    expect(output.linesOf('error')).toEqual(["VM type 'gpu' is not supported for provider 'aws'"]);
    expect(output.linesOf('dim')).toEqual([
      'Available VM types for aws: standard, memory_optimized, compute_optimized',
      'Supported regions: us-east-1, us-west-2, eu-west-1, ap-southeast-1',
    ]);
  });

  it('prints warnings for a valid configuration', () => {
    const code = validate(context, { provider: 'azure', type: 'memory_optimized', region: 'eastus', flavor: 'large' }, output);

    expect(code).toBe(0);
    expect(output.linesOf('success')).toEqual(['Configuration is valid: azure memory_optimized in eastus']);
    expect(output.linesOf('warn')).toContain('High-memory configuration may increase costs significantly');
  });

  it('lists the catalog of a provider', () => {
    expect(catalog(context, { provider: 'gcp' }, output)).toBe(0);

    expect(output.linesOf('header')).toEqual(['VM catalog for gcp']);
    expect(output.linesOf('info')).toEqual([
      'standard (default flavor: small)',
      'memory_optimized (default flavor: small)',
      'compute_optimized (default flavor: medium)',
    ]);
    expect(output.linesOf('field')[0]).toBe('small: e2-standard-2, 2 vCPU, 8 GB');
    expect(output.linesOf('dim')).toEqual(['Regions: us-central1, us-west1, europe-west1, asia-southeast1']);
  });

  it('turns an unknown catalog provider into exit code 1', () => {
    expect(runHandler(output, () => catalog(context, { provider: 'ibm' }, output))).toBe(1);
    expect(output.linesOf('error')).toEqual(["Unsupported provider 'ibm'"]);
  });

  it('rejects malformed override JSON', () => {
    const code = runHandler(output, () =>
      build(context, { provider: 'aws', type: 'standard', region: 'us-east-1', vmConfig: '[]' }, output)
    );

    expect(code).toBe(1);
    expect(output.linesOf('error')).toEqual(['Invalid --vm-config: Expected object, received array']);
  });
});
