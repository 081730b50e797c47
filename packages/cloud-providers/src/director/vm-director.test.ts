import { describe, it, expect } from 'vitest';
import { ValidationError } from '@vmforge/core';
import { VmDirector } from './vm-director';
import { loadVmCatalog } from './vm-catalog';

const director = new VmDirector();

describe('VmDirector.getVmSpecification', () => {
  it('builds an AWS standard specification from the default flavor', () => {
    const spec = director.getVmSpecification('aws', 'standard', 'us-east-1');

    expect(spec.vmType).toBe('standard');
    expect(spec.provider).toBe('aws');
    expect(spec.region).toBe('us-east-1');
    expect(spec.vmConfig).toMatchObject({
      provider: 'aws',
      vcpus: 2,
      memoryGb: 8,
      instanceType: 'm5.large',
      ami: 'ami-0c02fb55956c7d316',
      memoryOptimization: false,
      diskOptimization: false,
      keyPairName: 'default-key',
    });
    expect(spec.networkConfig).toMatchObject({
      region: 'us-east-1',
      firewallRules: ['SSH', 'HTTP', 'HTTPS'],
      publicIp: true,
      vpcId: 'vpc-useast1',
      subnet: 'subnet-useast1',
      securityGroup: 'sg-standard',
    });
    expect(spec.storageConfig).toMatchObject({
      region: 'us-east-1',
      sizeGb: 50,
      iops: 1000,
      volumeType: 'gp2',
      encrypted: true,
    });
  });

  it('selects an explicit flavor', () => {
    const spec = director.getVmSpecification('aws', 'compute_optimized', 'us-west-2', 'large');
    expect(spec.vmConfig.instanceType).toBe('c5.2xlarge');
    expect(spec.vmConfig.vcpus).toBe(8);
    expect(spec.vmConfig.diskOptimization).toBe(true);
    expect(spec.storageConfig).toMatchObject({ sizeGb: 30, iops: 3000, volumeType: 'gp3' });
  });

  it('derives the Azure memory-optimized layout', () => {
    const spec = director.getVmSpecification('azure', 'memory_optimized', 'eastus');
    expect(spec.vmConfig).toMatchObject({
      size: 'E2s_v3',
      vcpus: 2,
      memoryGb: 16,
      resourceGroup: 'rg-default',
      image: 'UbuntuLTS',
      memoryOptimization: true,
    });
    expect(spec.networkConfig).toMatchObject({
      virtualNetwork: 'vnet-eastus',
      subnetName: 'subnet-memory_optimized',
      networkSecurityGroup: 'nsg-memory_optimized',
    });
    expect(spec.storageConfig).toMatchObject({ sizeGb: 100, diskSku: 'Premium_LRS', managedDisk: true });
  });

  it('derives GCP and on-premise naming', () => {
    const gcp = director.getVmSpecification('gcp', 'compute_optimized', 'us-central1');
    expect(gcp.vmConfig).toMatchObject({ machineType: 'n2-highcpu-4', project: 'default-project' });
    expect(gcp.networkConfig).toMatchObject({
      networkName: 'default',
      subnetworkName: 'subnet-us-central1',
      firewallTag: 'allow-compute_optimized',
    });
    expect(gcp.storageConfig.diskType).toBe('pd-ssd');

    const onprem = director.getVmSpecification('onpremise', 'standard', 'datacenter-1');
    expect(onprem.vmConfig).toMatchObject({ cpu: 4, ram: 8, hypervisor: 'vmware' });
    expect(onprem.networkConfig).toMatchObject({
      physicalInterface: 'eth0',
      vlanId: 100,
      firewallPolicy: 'policy-standard',
    });
    expect(onprem.storageConfig).toMatchObject({ storagePool: 'pool-standard', raidLevel: 'raid1' });
  });

  it('gives overrides precedence over catalog values', () => {
    const spec = director.getVmSpecification('aws', 'memory_optimized', 'us-east-1', undefined, {
      vcpus: 12,
      instanceType: 'custom.large',
      memoryOptimization: false,
    });
    expect(spec.vmConfig.vcpus).toBe(12);
    expect(spec.vmConfig.instanceType).toBe('custom.large');
    expect(spec.vmConfig.memoryOptimization).toBe(false);
    expect(spec.vmConfig.memoryGb).toBe(16);
  });

  it('drops unknown override keys', () => {
    const spec = director.getVmSpecification('aws', 'standard', 'us-east-1', undefined, {
      gpuCount: 2,
    });
    expect('gpuCount' in spec.vmConfig).toBe(false);
  });

  it('rejects invalid override values', () => {
    expect(() =>
      director.getVmSpecification('aws', 'standard', 'us-east-1', undefined, { vcpus: 'many' })
    ).toThrow(ValidationError);
  });

  it('accepts provider and vm type case-insensitively', () => {
    expect(director.getVmSpecification('AWS', 'STANDARD', 'us-east-1').provider).toBe('aws');
  });

  it('reports each lookup failure distinctly', () => {
    expect(() => director.getVmSpecification('oracle', 'standard', 'x')).toThrow(
      "Unsupported provider 'oracle'"
    );
    expect(() => director.getVmSpecification('aws', 'gpu', 'us-east-1')).toThrow(
      "VM type 'gpu' is not supported for provider 'aws'"
    );
    expect(() => director.getVmSpecification('aws', 'standard', 'us-east-1', 'huge')).toThrow(
      "Flavor 'huge' is not available for aws standard"
    );
  });

  it.each(['constructor', 'toString', '__proto__', 'hasOwnProperty'])(
    'treats the inherited property name %s as an unknown flavor',
    (flavor) => {
      expect(() => director.getVmSpecification('aws', 'standard', 'us-east-1', flavor)).toThrow(
        `Flavor '${flavor}' is not available for aws standard`
      );
    }
  );

  it('uses the default flavor when the flavor name is empty', () => {
    const spec = director.getVmSpecification('aws', 'standard', 'us-east-1', '');
    expect(spec.vmConfig.instanceType).toBe('m5.large');
  });

  it('lists available flavors as a suggestion', () => {
    try {
      director.getVmSpecification('gcp', 'standard', 'us-central1', 'xl');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.suggestions).toEqual(['Available flavors: small, medium, large']);
      }
    }
  });

  it('returns independent specifications for each call', () => {
    const first = director.getVmSpecification('aws', 'standard', 'us-east-1');
    first.networkConfig.firewallRules.push('RDP');
    const second = director.getVmSpecification('aws', 'standard', 'us-east-1');
    expect(second.networkConfig.firewallRules).toEqual(['SSH', 'HTTP', 'HTTPS']);
  });
});

describe('VmDirector.getAvailableVmTypes', () => {
  it('exposes flavor names, default and configurations', () => {
    const types = director.getAvailableVmTypes('azure');
    expect(Object.keys(types)).toEqual(['standard', 'memory_optimized', 'compute_optimized']);
    expect(types.compute_optimized).toEqual({
      flavors: ['small', 'medium', 'large'],
      defaultFlavor: 'medium',
      configurations: {
        small: { sku: 'F2s_v2', vcpus: 2, memoryGb: 4 },
        medium: { sku: 'F4s_v2', vcpus: 4, memoryGb: 8 },
        large: { sku: 'F8s_v2', vcpus: 8, memoryGb: 16 },
      },
    });
  });

  it('returns an empty object for an unknown provider', () => {
    expect(director.getAvailableVmTypes('oracle')).toEqual({});
  });

  it('does not expose the catalog for mutation', () => {
    const types = director.getAvailableVmTypes('aws');
    const standard = types.standard;
    if (standard) {
      standard.configurations.medium.vcpus = 64;
    }
    expect(director.getVmSpecification('aws', 'standard', 'us-east-1').vmConfig.vcpus).toBe(2);
  });
});

describe('custom catalogs', () => {
  it('rejects a default flavor that is not in the entry', () => {
    expect(() =>
      loadVmCatalog({
        aws: { standard: { defaultFlavor: 'tiny', flavors: { small: { sku: 'a', vcpus: 1, memoryGb: 1 } } } },
      })
    ).toThrow();
  });

  it('reports a VM type missing from a partial catalog', () => {
    const partial = new VmDirector({
      catalog: loadVmCatalog({
        gcp: { standard: { defaultFlavor: 'one', flavors: { one: { sku: 'e2-micro', vcpus: 1, memoryGb: 1 } } } },
      }),
    });
    expect(partial.getVmSpecification('gcp', 'standard', 'us-west1').vmConfig.machineType).toBe('e2-micro');
    expect(() => partial.getVmSpecification('gcp', 'memory_optimized', 'us-west1')).toThrow(
      "VM type 'memory_optimized' is not supported for provider 'gcp'"
    );
    expect(() => partial.getVmSpecification('aws', 'standard', 'us-east-1')).toThrow(
      "Unsupported provider 'aws'"
    );
    expect(partial.getCatalogProviders()).toEqual(['gcp']);
  });
});
