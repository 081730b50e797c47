import { InternalError, createLogger, isExpectedError, logParams } from "@vmforge/core";
import type {
  Logger,
  ResourceFamilyResult,
  ResourceInfo,
  SingleVmResult,
} from "@vmforge/core";
import type { CloudResourceFactoryClass, ResourceParams } from "../interface/resources";
import type { ResourceFactoryRegistry } from "../providers/factory-registry";
import { VmProvisionerFactory } from "../providers/single-vm/vm-provisioner-factory";

export const PROVISIONING_INTERNAL_ERROR_MESSAGE = "Internal error during resource provisioning";

export interface ProvisioningLogEntry {
  provider: string;
  resource: ResourceInfo;
  createdAt: Date;
}

export interface ResourceProvisioningServiceOptions {
  provisioners?: VmProvisionerFactory;
  logger?: Logger;
}

/**
 * Provisions resource families through the Abstract Factory registry.
 *
 * Creation order is network, storage, VM: the VM needs both ids. A failing
 * step aborts the family but resources already created are not rolled back;
 * they stay visible in the provisioning log.
 */
export class ResourceProvisioningService {
  private readonly provisioners: VmProvisionerFactory;
  private readonly logger: Logger;
  private readonly provisioningLog: ProvisioningLogEntry[] = [];

  constructor(
    private readonly registry: ResourceFactoryRegistry,
    options: ResourceProvisioningServiceOptions = {}
  ) {
    this.provisioners = options.provisioners ?? VmProvisionerFactory.withBuiltinProvisioners();
    this.logger = options.logger ?? createLogger("resource-provisioning");
  }

  provisionFamily(
    provider: string,
    vmParams: ResourceParams,
    networkParams: ResourceParams,
    storageParams: ResourceParams
  ): ResourceFamilyResult {
    logParams(this.logger, `Provisioning resource family for ${provider}`, {
      vmParams,
      networkParams,
      storageParams,
    });

    try {
      const factory = this.registry.getFactory(provider);
      const providerName = factory.getProviderName();
      const resources: ResourceInfo[] = [];

      const network = factory.createNetwork();
      const networkResult = network.create(networkParams);
      if (!networkResult.ok) {
        return { success: false, error: `Failed to create network resource: ${networkResult.error}` };
      }
      resources.push(this.record(providerName, network.getInfo()));

      const storage = factory.createStorage();
      const storageResult = storage.create(storageParams);
      if (!storageResult.ok) {
        return { success: false, error: `Failed to create storage resource: ${storageResult.error}` };
      }
      resources.push(this.record(providerName, storage.getInfo()));

      const vm = factory.createVm();
      const vmResult = vm.create(vmParams, networkResult.resourceId, storageResult.resourceId);
      if (!vmResult.ok) {
        return { success: false, error: `Failed to create VM: ${vmResult.error}` };
      }
      resources.push(this.record(providerName, vm.getInfo()));

      this.logger.info(
        { provider: providerName, resourceIds: resources.map((r) => r.resourceId) },
        "Resource family provisioned"
      );
      return { success: true, provider: providerName, resources };
    } catch (error) {
      if (isExpectedError(error)) {
        return { success: false, error: error.message };
      }
      this.logger.error({ err: error, provider }, "Unexpected error during resource provisioning");
      return { success: false, error: PROVISIONING_INTERNAL_ERROR_MESSAGE };
    }
  }

  /** Single-VM provisioning through the Factory Method provisioners. */
  provisionVm(provider: string, params: ResourceParams): SingleVmResult {
    logParams(this.logger, `Provisioning single VM for ${provider}`, params);

    try {
      const result = this.provisioners.createProvisioner(provider).createVm(params);
      if (!result.ok) {
        return { success: false, error: result.error };
      }
      return { success: true, vmId: result.resourceId };
    } catch (error) {
      if (isExpectedError(error)) {
        return { success: false, error: error.message };
      }
      this.logger.error({ err: error, provider }, "Unexpected error during VM provisioning");
      return { success: false, error: PROVISIONING_INTERNAL_ERROR_MESSAGE };
    }
  }

  /** The log keeps every resource created until cleared; it has no size cap. */
  getProvisioningLog(): ProvisioningLogEntry[] {
    return this.provisioningLog.map((entry) => ({ ...entry }));
  }

  /** Drops all log entries and returns how many were removed. */
  clearProvisioningLog(): number {
    const removed = this.provisioningLog.length;
    this.provisioningLog.length = 0;
    this.logger.debug({ removed }, "Provisioning log cleared");
    return removed;
  }

  getSupportedProviders(): string[] {
    return this.registry.getSupportedProviders();
  }

  registerProvider(providerName: string, factoryClass: CloudResourceFactoryClass): void {
    this.registry.registerFactory(providerName, factoryClass);
    this.logger.info({ provider: providerName.toLowerCase() }, "Registered resource factory");
  }

  private record(provider: string, info: ResourceInfo | undefined): ResourceInfo {
    if (!info) {
      throw new InternalError(`${provider} resource reported success without metadata`);
    }
    this.provisioningLog.push({ provider, resource: info, createdAt: new Date() });
    return info;
  }
}
