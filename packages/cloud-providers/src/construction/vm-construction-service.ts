import {
  DEFAULT_STORAGE_IOPS,
  DIRECTOR_FIREWALL_RULES,
  NotFoundError,
  createLogger,
  getSupportedRegions,
  isExpectedError,
  mergeNetworkConfig,
  mergeStorageConfig,
  parseProvider,
  parseVmType,
} from "@vmforge/core";
import type {
  ConfigOverrides,
  Logger,
  Provider,
  ResourceInfo,
  VMSpecification,
  VMType,
} from "@vmforge/core";
import { BUILD_INTERNAL_ERROR_MESSAGE, ResourceVmBuilder } from "../builder/vm-builder";
import type { AvailableVmType, VmDirector } from "../director/vm-director";
import type { ResourceFactoryRegistry } from "../providers/factory-registry";
import { getConfigurationWarnings } from "./configuration-warnings";
import { estimateCost } from "./cost-estimator";
import type { CostEstimate } from "./cost-estimator";

export interface BuildVmOptions {
  vmType: string;
  provider: string;
  region: string;
  flavor?: string;
  customVmConfig?: ConfigOverrides;
  customNetworkConfig?: ConfigOverrides;
  customStorageConfig?: ConfigOverrides;
}

export type BuildVmResult =
  | { success: true; vmSpecification: VMSpecification; createdResources: ResourceInfo[] }
  | { success: false; error: string };

export type ConfigurationValidation =
  | { valid: true; specification: VMSpecification; estimatedCost: CostEstimate; warnings: string[] }
  | { valid: false; error: string; suggestions: string[] };

export interface DefaultConfigs {
  defaultVmType: VMType;
  defaultFlavor: string;
  defaultRegion?: string;
  networkDefaults: { firewallRules: string[]; publicIp: boolean };
  storageDefaults: { iops: number; encrypted: boolean };
}

export interface AvailableConfigurations {
  provider: Provider;
  vmTypes: Partial<Record<VMType, AvailableVmType>>;
  supportedRegions: string[];
  defaultConfigs: DefaultConfigs;
}

export interface VmConstructionServiceOptions {
  logger?: Logger;
}

/**
 * Combines the Director's catalog specification with caller overrides and
 * runs the result through a fresh Builder.
 */
export class VmConstructionService {
  private readonly logger: Logger;

  constructor(
    private readonly director: VmDirector,
    private readonly registry: ResourceFactoryRegistry,
    options: VmConstructionServiceOptions = {}
  ) {
    this.logger = options.logger ?? createLogger("vm-construction");
  }

  buildVm(options: BuildVmOptions): BuildVmResult {
    this.logger.info(
      {
        provider: options.provider,
        vmType: options.vmType,
        region: options.region,
        flavor: options.flavor,
      },
      "Building VM"
    );

    try {
      const specification = this.director.getVmSpecification(
        options.provider,
        options.vmType,
        options.region,
        options.flavor,
        options.customVmConfig
      );

      if (options.customNetworkConfig) {
        specification.networkConfig = mergeNetworkConfig(
          specification.networkConfig,
          options.customNetworkConfig
        );
      }
      if (options.customStorageConfig) {
        specification.storageConfig = mergeStorageConfig(
          specification.storageConfig,
          options.customStorageConfig
        );
      }

      return this.buildSpecification(specification);
    } catch (error) {
      if (isExpectedError(error)) {
        return { success: false, error: error.message };
      }
      this.logger.error({ err: error }, "Unexpected error while building VM");
      return { success: false, error: BUILD_INTERNAL_ERROR_MESSAGE };
    }
  }

  /** Drives a fresh builder through the three sections of a specification. */
  buildSpecification(specification: VMSpecification): BuildVmResult {
    const result = new ResourceVmBuilder(this.registry, { logger: this.logger })
      .setVmConfig(specification.vmConfig)
      .setNetworkConfig(specification.networkConfig)
      .setStorageConfig(specification.storageConfig)
      .build();

    if (!result.success) {
      return { success: false, error: result.error };
    }
    return { success: true, vmSpecification: specification, createdResources: result.resources };
  }

  /** Dry run: consults the Director only and creates nothing. */
  validateConfiguration(
    provider: string,
    vmType: string,
    region: string,
    flavor?: string
  ): ConfigurationValidation {
    try {
      const specification = this.director.getVmSpecification(provider, vmType, region, flavor);
      return {
        valid: true,
        specification,
        estimatedCost: estimateCost(specification),
        warnings: getConfigurationWarnings(specification),
      };
    } catch (error) {
      if (!isExpectedError(error)) {
        this.logger.error({ err: error }, "Unexpected error while validating configuration");
      }
      return {
        valid: false,
        error: isExpectedError(error) ? error.message : BUILD_INTERNAL_ERROR_MESSAGE,
        suggestions: this.getConfigurationSuggestions(provider, vmType),
      };
    }
  }

  getAvailableConfigurations(providerName: string): AvailableConfigurations {
    const provider = parseProvider(providerName);
    if (!provider) {
      throw new NotFoundError(`Unsupported provider '${providerName}'`);
    }
    const supportedRegions = getSupportedRegions(provider);
    return {
      provider,
      vmTypes: this.director.getAvailableVmTypes(provider),
      supportedRegions,
      defaultConfigs: {
        defaultVmType: "standard",
        defaultFlavor: "medium",
        defaultRegion: supportedRegions[0],
        networkDefaults: { firewallRules: [...DIRECTOR_FIREWALL_RULES], publicIp: true },
        storageDefaults: { iops: DEFAULT_STORAGE_IOPS, encrypted: true },
      },
    };
  }

  private getConfigurationSuggestions(providerName: string, vmTypeName: string): string[] {
    const provider = parseProvider(providerName);
    if (!provider || !this.director.getCatalogProviders().includes(provider)) {
      return [`Supported providers: ${this.director.getCatalogProviders().join(", ")}`];
    }

    const suggestions: string[] = [];
    const vmTypes = this.director.getAvailableVmTypes(provider);
    suggestions.push(`Available VM types for ${provider}: ${Object.keys(vmTypes).join(", ")}`);

    const vmType = parseVmType(vmTypeName);
    const entry = vmType ? vmTypes[vmType] : undefined;
    if (vmType && entry) {
      suggestions.push(`Available flavors for ${vmType}: ${entry.flavors.join(", ")}`);
    }

    suggestions.push(`Supported regions: ${getSupportedRegions(provider).join(", ")}`);
    return suggestions;
  }
}
