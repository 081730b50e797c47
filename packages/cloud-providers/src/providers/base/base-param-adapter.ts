import type { NetworkConfig, StorageConfig, VirtualMachineConfig } from "@vmforge/core";
import type { ResourceParams } from "../../interface/resources";

export function baseNetworkParams(config: NetworkConfig): ResourceParams {
  return {
    region: config.region,
    firewallRules: [...config.firewallRules],
    publicIP: config.publicIp,
  };
}

export function baseStorageParams(config: StorageConfig): ResourceParams {
  return {
    sizeGB: config.sizeGb,
    region: config.region,
    iops: config.iops,
  };
}

export function baseVmParams(config: VirtualMachineConfig): ResourceParams {
  return {
    vcpus: config.vcpus,
    memoryGB: config.memoryGb,
    memoryOptimization: config.memoryOptimization,
    diskOptimization: config.diskOptimization,
    keyPairName: config.keyPairName,
  };
}

/** Region with dashes removed, as used in synthesized AWS names. */
export function compactRegion(region: string): string {
  return region.replace(/-/g, "");
}
