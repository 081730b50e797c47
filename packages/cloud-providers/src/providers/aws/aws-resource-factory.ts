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
import {
  baseNetworkParams,
  baseStorageParams,
  baseVmParams,
  compactRegion,
} from "../base/base-param-adapter";
import { AwsNetwork, AwsStorage, AwsVm } from "./aws-resources";

export class AwsParamAdapter implements ParamAdapter {
  toNetworkParams(config: NetworkConfig): ResourceParams {
    const region = compactRegion(config.region);
    return {
      ...baseNetworkParams(config),
      vpcId: config.vpcId ?? `vpc-${region}`,
      subnet: config.subnet ?? `subnet-${region}`,
      securityGroup: config.securityGroup ?? "sg-default",
    };
  }

  toStorageParams(config: StorageConfig): ResourceParams {
    return {
      ...baseStorageParams(config),
      volumeType: config.volumeType ?? "gp2",
      encrypted: config.encrypted,
    };
  }

  toVmParams(config: VirtualMachineConfig, network: NetworkConfig): ResourceParams {
    return {
      ...baseVmParams(config),
      instance_type: config.instanceType,
      region: network.region,
      ami: config.ami,
    };
  }
}

export class AwsResourceFactory implements CloudResourceFactory {
  readonly paramAdapter: ParamAdapter = new AwsParamAdapter();

  getProviderName(): string {
    return PROVIDER_DISPLAY_NAMES.aws;
  }

  createNetwork(): NetworkResource {
    return new AwsNetwork();
  }

  createStorage(): StorageResource {
    return new AwsStorage();
  }

  createVm(): VMResource {
    return new AwsVm();
  }
}
