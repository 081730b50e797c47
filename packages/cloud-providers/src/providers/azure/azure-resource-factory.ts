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
import { AzureNetwork, AzureStorage, AzureVm } from "./azure-resources";

export class AzureParamAdapter implements ParamAdapter {
  toNetworkParams(config: NetworkConfig): ResourceParams {
    return {
      ...baseNetworkParams(config),
      virtualNetwork: config.virtualNetwork ?? `vnet-${config.region}`,
      subnetName: config.subnetName ?? "subnet-default",
      networkSecurityGroup: config.networkSecurityGroup ?? "nsg-default",
    };
  }

  toStorageParams(config: StorageConfig): ResourceParams {
    return {
      ...baseStorageParams(config),
      diskSku: config.diskSku ?? "Standard_LRS",
      managedDisk: config.managedDisk,
    };
  }

  toVmParams(config: VirtualMachineConfig, network: NetworkConfig): ResourceParams {
    return {
      ...baseVmParams(config),
      size: config.size,
      resource_group: config.resourceGroup,
      image: config.image,
      region: network.region,
    };
  }
}

export class AzureResourceFactory implements CloudResourceFactory {
  readonly paramAdapter: ParamAdapter = new AzureParamAdapter();

  getProviderName(): string {
    return PROVIDER_DISPLAY_NAMES.azure;
  }

  createNetwork(): NetworkResource {
    return new AzureNetwork();
  }

  createStorage(): StorageResource {
    return new AzureStorage();
  }

  createVm(): VMResource {
    return new AzureVm();
  }
}
