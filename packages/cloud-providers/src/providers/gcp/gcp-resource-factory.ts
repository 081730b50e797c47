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
import { GcpNetwork, GcpStorage, GcpVm } from "./gcp-resources";

export class GcpParamAdapter implements ParamAdapter {
  toNetworkParams(config: NetworkConfig): ResourceParams {
    return {
      ...baseNetworkParams(config),
      networkName: config.networkName ?? "default",
      subnetworkName: config.subnetworkName ?? `subnet-${config.region}`,
      firewallTag: config.firewallTag ?? "allow-default",
    };
  }

  toStorageParams(config: StorageConfig): ResourceParams {
    return {
      ...baseStorageParams(config),
      diskType: config.diskType ?? "pd-standard",
      autoDelete: config.autoDelete,
    };
  }

  // GCP places instances in a zone; the network region stands in for it.
  toVmParams(config: VirtualMachineConfig, network: NetworkConfig): ResourceParams {
    return {
      ...baseVmParams(config),
      machine_type: config.machineType,
      zone: network.region,
      project: config.project,
    };
  }
}

export class GcpResourceFactory implements CloudResourceFactory {
  readonly paramAdapter: ParamAdapter = new GcpParamAdapter();

  getProviderName(): string {
    return PROVIDER_DISPLAY_NAMES.gcp;
  }

  createNetwork(): NetworkResource {
    return new GcpNetwork();
  }

  createStorage(): StorageResource {
    return new GcpStorage();
  }

  createVm(): VMResource {
    return new GcpVm();
  }
}
