import { PROVIDER_DISPLAY_NAMES } from "@vmforge/core";
import type { NetworkConfig, StorageConfig, VirtualMachineConfig } from "@vmforge/core";
import type {
  CloudResourceFactory,
  NetworkResource,
  ParamAdapter,
  ResourceParams,
  StorageResource,
  VMResource,
} from "../../interface/resources";
import { baseNetworkParams, baseStorageParams, baseVmParams } from "../base/base-param-adapter";
import { OnPremiseNetwork, OnPremiseStorage, OnPremiseVm } from "./onpremise-resources";

export const DEFAULT_VLAN_ID = 100;
export const DEFAULT_HYPERVISOR = "vmware";

export class OnPremiseParamAdapter implements ParamAdapter {
  toNetworkParams(config: NetworkConfig): ResourceParams {
    return {
      ...baseNetworkParams(config),
      physicalInterface: config.physicalInterface ?? "eth0",
      vlanId: config.vlanId ?? DEFAULT_VLAN_ID,
      firewallPolicy: config.firewallPolicy ?? "allow-default",
    };
  }

  toStorageParams(config: StorageConfig): ResourceParams {
    return {
      ...baseStorageParams(config),
      storagePool: config.storagePool ?? "pool-default",
      raidLevel: config.raidLevel ?? "raid1",
    };
  }

  toVmParams(config: VirtualMachineConfig, network: NetworkConfig): ResourceParams {
    return {
      ...baseVmParams(config),
      cpu: config.cpu ?? config.vcpus,
      ram: config.ram ?? config.memoryGb,
      hypervisor: config.hypervisor ?? DEFAULT_HYPERVISOR,
      region: network.region,
    };
  }
}

export class OnPremiseResourceFactory implements CloudResourceFactory {
  readonly paramAdapter: ParamAdapter = new OnPremiseParamAdapter();

  getProviderName(): string {
    return PROVIDER_DISPLAY_NAMES.onpremise;
  }

  createNetwork(): NetworkResource {
    return new OnPremiseNetwork();
  }

  createStorage(): StorageResource {
    return new OnPremiseStorage();
  }

  createVm(): VMResource {
    return new OnPremiseVm();
  }
}
