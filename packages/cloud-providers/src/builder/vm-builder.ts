import {
  InternalError,
  copyNetworkConfig,
  copyStorageConfig,
  copyVirtualMachineConfig,
  createLogger,
  isExpectedError,
  logParams,
} from "@vmforge/core";
import type {
  Logger,
  NetworkConfig,
  ResourceInfo,
  StorageConfig,
  VirtualMachineConfig,
} from "@vmforge/core";
import type { CloudResourceFactory, CreateResult } from "../interface/resources";
import type { ResourceFactoryRegistry } from "../providers/factory-registry";

export interface RealizedVmSpecification {
  vmConfig: VirtualMachineConfig;
  networkConfig: NetworkConfig;
  storageConfig: StorageConfig;
}

export type VmBuildResult =
  | {
      success: true;
      provider: string;
      resources: ResourceInfo[];
      vmSpecification: RealizedVmSpecification;
    }
  | { success: false; error: string };

/**
 * Stepwise VM construction. Setters only record; all validation is deferred
 * to build().
 */
export interface VmBuilder {
  reset(): VmBuilder;
  setVmConfig(config: VirtualMachineConfig): VmBuilder;
  setNetworkConfig(config: NetworkConfig): VmBuilder;
  setStorageConfig(config: StorageConfig): VmBuilder;
  build(): VmBuildResult;
}

export interface ResourceVmBuilderOptions {
  logger?: Logger;
}

type StepResult = { ok: true; info: ResourceInfo } | { ok: false; error: string };

export const BUILD_INTERNAL_ERROR_MESSAGE = "Internal error during VM construction";

/**
 * Builder that materializes the configured VM through the resource factory of
 * the VM config's provider, in the order network, storage, VM.
 */
export class ResourceVmBuilder implements VmBuilder {
  private vmConfig?: VirtualMachineConfig;
  private networkConfig?: NetworkConfig;
  private storageConfig?: StorageConfig;
  private readonly logger: Logger;

  constructor(
    private readonly registry: ResourceFactoryRegistry,
    options: ResourceVmBuilderOptions = {}
  ) {
    this.logger = options.logger ?? createLogger("vm-builder");
  }

  reset(): VmBuilder {
    this.vmConfig = undefined;
    this.networkConfig = undefined;
    this.storageConfig = undefined;
    return this;
  }

  setVmConfig(config: VirtualMachineConfig): VmBuilder {
    this.vmConfig = copyVirtualMachineConfig(config);
    return this;
  }

  setNetworkConfig(config: NetworkConfig): VmBuilder {
    this.networkConfig = copyNetworkConfig(config);
    return this;
  }

  setStorageConfig(config: StorageConfig): VmBuilder {
    this.storageConfig = copyStorageConfig(config);
    return this;
  }

  build(): VmBuildResult {
    const { vmConfig, networkConfig, storageConfig } = this;
    if (!vmConfig || !networkConfig || !storageConfig) {
      const missing: string[] = [];
      if (!vmConfig) missing.push("vmConfig");
      if (!networkConfig) missing.push("networkConfig");
      if (!storageConfig) missing.push("storageConfig");
      return { success: false, error: `Missing required configuration: ${missing.join(", ")}` };
    }

    if (networkConfig.region !== storageConfig.region) {
      return {
        success: false,
        error: `Network region '${networkConfig.region}' does not match storage region '${storageConfig.region}'`,
      };
    }

    try {
      const factory = this.registry.getFactory(vmConfig.provider);
      const resources: ResourceInfo[] = [];

      const network = this.createNetwork(factory, networkConfig);
      if (!network.ok) {
        return { success: false, error: network.error };
      }
      resources.push(network.info);

      const storage = this.createStorage(factory, storageConfig);
      if (!storage.ok) {
        return { success: false, error: storage.error };
      }
      resources.push(storage.info);

      const vm = this.createVm(factory, vmConfig, networkConfig, network.info, storage.info);
      if (!vm.ok) {
        return { success: false, error: vm.error };
      }
      resources.push(vm.info);

      this.logger.info(
        { provider: vmConfig.provider, vmId: vm.info.resourceId },
        "VM built"
      );

      return {
        success: true,
        provider: vmConfig.provider.toUpperCase(),
        resources,
        vmSpecification: {
          vmConfig: copyVirtualMachineConfig(vmConfig),
          networkConfig: copyNetworkConfig(networkConfig),
          storageConfig: copyStorageConfig(storageConfig),
        },
      };
    } catch (error) {
      if (isExpectedError(error)) {
        return { success: false, error: error.message };
      }
      this.logger.error({ err: error }, "Unexpected error while building VM");
      return { success: false, error: BUILD_INTERNAL_ERROR_MESSAGE };
    }
  }

  private createNetwork(factory: CloudResourceFactory, config: NetworkConfig): StepResult {
    const params = factory.paramAdapter.toNetworkParams(config);
    logParams(this.logger, "Creating network resource", params);
    const resource = factory.createNetwork();
    return toStepResult(resource.create(params), () => resource.getInfo());
  }

  private createStorage(factory: CloudResourceFactory, config: StorageConfig): StepResult {
    const params = factory.paramAdapter.toStorageParams(config);
    logParams(this.logger, "Creating storage resource", params);
    const resource = factory.createStorage();
    return toStepResult(resource.create(params), () => resource.getInfo());
  }

  private createVm(
    factory: CloudResourceFactory,
    config: VirtualMachineConfig,
    networkConfig: NetworkConfig,
    network: ResourceInfo,
    storage: ResourceInfo
  ): StepResult {
    const params = factory.paramAdapter.toVmParams(config, networkConfig);
    logParams(this.logger, "Creating VM resource", params);
    const resource = factory.createVm();
    return toStepResult(
      resource.create(params, network.resourceId, storage.resourceId),
      () => resource.getInfo()
    );
  }
}

function toStepResult(result: CreateResult, getInfo: () => ResourceInfo | undefined): StepResult {
  if (!result.ok) {
    return result;
  }
  const info = getInfo();
  if (!info) {
    throw new InternalError(`Resource ${result.resourceId} reported success without metadata`);
  }
  return { ok: true, info };
}

