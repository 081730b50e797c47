import {
  DEFAULT_KEY_PAIR_NAME,
  DIRECTOR_FIREWALL_RULES,
  NetworkConfigSchema,
  StorageConfigSchema,
  SUPPORTED_PROVIDERS,
  ValidationError,
  VirtualMachineConfigSchema,
  createLogger,
  formatSchemaError,
  parseProvider,
  parseVmType,
} from "@vmforge/core";
import type {
  ConfigOverrides,
  Logger,
  NetworkConfig,
  Provider,
  StorageConfig,
  VMSpecification,
  VMType,
  VirtualMachineConfig,
} from "@vmforge/core";
import type { ProviderSpecDefaults } from "../interface/spec-defaults";
import { PROVIDER_SPEC_DEFAULTS } from "./provider-spec-defaults";
import { loadVmCatalog } from "./vm-catalog";
import type { VmCatalog, VmFlavor, VmTypeCatalogEntry } from "./vm-catalog";

const BASE_STORAGE_SIZE_GB: Record<VMType, number> = {
  standard: 50,
  memory_optimized: 100,
  compute_optimized: 30,
};

const COMPUTE_STORAGE_IOPS = 3000;
const STANDARD_STORAGE_IOPS = 1000;

export interface AvailableVmType {
  flavors: string[];
  defaultFlavor: string;
  configurations: Record<string, VmFlavor>;
}

export interface VmDirectorOptions {
  catalog?: VmCatalog;
  specDefaults?: Record<Provider, ProviderSpecDefaults>;
  logger?: Logger;
}

/**
 * Knows how to assemble a complete VMSpecification for every
 * (provider, vm type, flavor) combination in its catalog.
 */
export class VmDirector {
  private readonly catalog: VmCatalog;
  private readonly specDefaults: Record<Provider, ProviderSpecDefaults>;
  private readonly logger: Logger;

  constructor(options: VmDirectorOptions = {}) {
    this.catalog = options.catalog ?? loadVmCatalog();
    this.specDefaults = options.specDefaults ?? PROVIDER_SPEC_DEFAULTS;
    this.logger = options.logger ?? createLogger("vm-director");
  }

  /**
   * Overrides are applied to the VM config last and win over every catalog
   * or provider default. Unknown override keys are dropped.
   */
  getVmSpecification(
    providerName: string,
    vmTypeName: string,
    region: string,
    flavorName?: string,
    overrides: ConfigOverrides = {}
  ): VMSpecification {
    const provider = parseProvider(providerName);
    const providerCatalog = provider ? this.catalog[provider] : undefined;
    if (!provider || !providerCatalog) {
      throw new ValidationError(`Unsupported provider '${providerName}'`, [
        `Supported providers: ${this.getCatalogProviders().join(", ")}`,
      ]);
    }

    const vmType = parseVmType(vmTypeName);
    const entry = vmType ? providerCatalog[vmType] : undefined;
    if (!vmType || !entry) {
      throw new ValidationError(
        `VM type '${vmTypeName}' is not supported for provider '${provider}'`,
        [`Supported VM types for ${provider}: ${Object.keys(providerCatalog).join(", ")}`]
      );
    }

    // An empty flavor name selects the default, like an omitted one.
    const selectedFlavor = flavorName ? flavorName : entry.defaultFlavor;
    const flavor = Object.hasOwn(entry.flavors, selectedFlavor) ? entry.flavors[selectedFlavor] : undefined;
    if (!flavor) {
      throw new ValidationError(
        `Flavor '${selectedFlavor}' is not available for ${provider} ${vmType}`,
        [`Available flavors: ${Object.keys(entry.flavors).join(", ")}`]
      );
    }

    const defaults = this.specDefaults[provider];
    const specification: VMSpecification = {
      vmType,
      provider,
      region,
      vmConfig: this.buildVmConfig(provider, vmType, flavor, defaults, overrides),
      networkConfig: this.buildNetworkConfig(region, vmType, defaults),
      storageConfig: this.buildStorageConfig(region, vmType, defaults),
    };

    this.logger.debug(
      { provider, vmType, region, flavor: selectedFlavor },
      "Built VM specification"
    );
    return specification;
  }

  /** Read-only view of the catalog; empty for an unknown provider. */
  getAvailableVmTypes(providerName: string): Partial<Record<VMType, AvailableVmType>> {
    const provider = parseProvider(providerName);
    const providerCatalog = provider ? this.catalog[provider] : undefined;
    if (!providerCatalog) {
      return {};
    }

    const result: Partial<Record<VMType, AvailableVmType>> = {};
    for (const [vmType, entry] of catalogEntries(providerCatalog)) {
      result[vmType] = {
        flavors: Object.keys(entry.flavors),
        defaultFlavor: entry.defaultFlavor,
        configurations: copyFlavors(entry.flavors),
      };
    }
    return result;
  }

  getCatalogProviders(): Provider[] {
    return SUPPORTED_PROVIDERS.filter((provider) => this.catalog[provider] !== undefined);
  }

  private buildVmConfig(
    provider: Provider,
    vmType: VMType,
    flavor: VmFlavor,
    defaults: ProviderSpecDefaults,
    overrides: ConfigOverrides
  ): VirtualMachineConfig {
    const parsed = VirtualMachineConfigSchema.safeParse({
      provider,
      vcpus: flavor.vcpus,
      memoryGb: flavor.memoryGb,
      memoryOptimization: vmType === "memory_optimized",
      diskOptimization: vmType === "compute_optimized",
      keyPairName: DEFAULT_KEY_PAIR_NAME,
      ...defaults.vmFields(flavor),
      ...overrides,
    });
    if (!parsed.success) {
      throw new ValidationError(`Invalid VM configuration: ${formatSchemaError(parsed.error)}`);
    }
    return parsed.data;
  }

  private buildNetworkConfig(
    region: string,
    vmType: VMType,
    defaults: ProviderSpecDefaults
  ): NetworkConfig {
    return NetworkConfigSchema.parse({
      region,
      firewallRules: [...DIRECTOR_FIREWALL_RULES],
      publicIp: true,
      ...defaults.networkFields(region, vmType),
    });
  }

  private buildStorageConfig(
    region: string,
    vmType: VMType,
    defaults: ProviderSpecDefaults
  ): StorageConfig {
    return StorageConfigSchema.parse({
      region,
      sizeGb: BASE_STORAGE_SIZE_GB[vmType],
      iops: vmType === "compute_optimized" ? COMPUTE_STORAGE_IOPS : STANDARD_STORAGE_IOPS,
      ...defaults.storageFields(vmType),
    });
  }
}

function catalogEntries(
  providerCatalog: Partial<Record<VMType, VmTypeCatalogEntry>>
): Array<[VMType, VmTypeCatalogEntry]> {
  const entries: Array<[VMType, VmTypeCatalogEntry]> = [];
  for (const [key, entry] of Object.entries(providerCatalog)) {
    const vmType = parseVmType(key);
    if (vmType && entry) {
      entries.push([vmType, entry]);
    }
  }
  return entries;
}

function copyFlavors(flavors: Record<string, VmFlavor>): Record<string, VmFlavor> {
  const copy: Record<string, VmFlavor> = {};
  for (const [name, flavor] of Object.entries(flavors)) {
    copy[name] = { sku: flavor.sku, vcpus: flavor.vcpus, memoryGb: flavor.memoryGb };
  }
  return copy;
}
