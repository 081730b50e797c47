import { describe, it, expect, beforeEach } from 'vitest';
import { createProvisioningContext } from '@vmforge/cloud-providers';
import type { ProvisioningContext } from '@vmforge/cloud-providers';
import { MemoryOutputService } from '../services/memory-output.service';
import { provision, quickProvision } from './provision';

const awsFamily = {
  provider: 'aws',
  vm: JSON.stringify({ instance_type: 't3.micro', region: 'us-east-1', ami: 'ami-12345678' }),
  network: JSON.stringify({ vpcId: 'vpc-1', subnet: 'subnet-1', securityGroup: 'sg-1' }),
  storage: JSON.stringify({ volumeType: 'gp3', sizeGB: 20, encrypted: true }),
};

describe('provision command', () => {
  let context: ProvisioningContext;
  let output: MemoryOutputService;

  beforeEach(() => {
    context = createProvisioningContext();
    output = new MemoryOutputService();
  });

  it('prints every created resource', () => {
    expect(provision(context, awsFamily, output)).toBe(0);

    expect(output.linesOf('success')).toEqual(['Provisioned AWS resource family']);
    const fields = output.linesOf('field');
    expect(fields).toHaveLength(3);
    expect(fields[0]).toMatch(/^network: aws-net-[0-9a-f]{8} \(available\)$/);
    expect(fields[1]).toMatch(/^storage: aws-vol-[0-9a-f]{8} \(available\)$/);
    expect(fields[2]).toMatch(/^vm: aws-vm-[0-9a-f]{8} \(provisioned\)$/);
  });

  it('reports the failing step', () => {
    expect(provision(context, { ...awsFamily, network: '{}' }, output)).toBe(1);
    expect(output.linesOf('error')).toEqual([
      'Failed to create network resource: Missing required AWS network parameter: vpcId',
    ]);
    expect(context.provisioning.getProvisioningLog()).toEqual([]);
  });
});

describe('quick-provision command', () => {
  it('prints the VM id', () => {
    const output = new MemoryOutputService();
    const params = JSON.stringify({ instance_type: 't3.micro', region: 'us-east-1', vpc: 'vpc-1', ami: 'ami-1' });

    expect(quickProvision(createProvisioningContext(), { provider: 'aws', params }, output)).toBe(0);
    expect(output.linesOf('success')[0]).toMatch(/^Provisioned VM aws-vm-[0-9a-f]{8}$/);
  });

  it('reports missing fields and unknown providers', () => {
    const context = createProvisioningContext();
    const output = new MemoryOutputService();

    expect(quickProvision(context, { provider: 'azure', params: '{"size":"B1s"}' }, output)).toBe(1);
    expect(quickProvision(context, { provider: 'ibm', params: '{}' }, output)).toBe(1);
    expect(output.linesOf('error')).toEqual([
      'Missing required Azure parameter: resource_group',
      "Unsupported provider 'ibm'",
    ]);
  });
});
