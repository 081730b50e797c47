import { ConfigOverridesSchema } from "@vmforge/core";
import { estimateCost } from "@vmforge/cloud-providers";
import type { BuildVmResult, CostEstimate, ProvisioningContext } from "@vmforge/cloud-providers";
import type { IOutputService } from "../interfaces/output.interface";
import { parseOptionalJsonOption } from "../utils/json-option";

export interface BuildOptions {
  provider: string;
  type: string;
  region: string;
  flavor?: string;
  vmConfig?: string;
  networkConfig?: string;
  storageConfig?: string;
  json?: boolean;
}

export function build(context: ProvisioningContext, options: BuildOptions, output: IOutputService): number {
  const result = context.construction.buildVm({
    provider: options.provider,
    vmType: options.type,
    region: options.region,
    flavor: options.flavor,
    customVmConfig: parseOptionalJsonOption("vm-config", options.vmConfig, ConfigOverridesSchema),
    customNetworkConfig: parseOptionalJsonOption("network-config", options.networkConfig, ConfigOverridesSchema),
    customStorageConfig: parseOptionalJsonOption("storage-config", options.storageConfig, ConfigOverridesSchema),
  });
  return reportBuild(result, output, options.json === true);
}

/** Shared by `build` and `templates create`. */
export function reportBuild(result: BuildVmResult, output: IOutputService, asJson: boolean): number {
  if (!result.success) {
    output.error(result.error);
    return 1;
  }

  if (asJson) {
    output.json({ vmSpecification: result.vmSpecification, createdResources: result.createdResources });
    return 0;
  }

  const spec = result.vmSpecification;
  output.success(`Built ${spec.provider} ${spec.vmType} VM in ${spec.region}`);
  output.field("vCPUs", spec.vmConfig.vcpus);
  output.field("Memory (GB)", spec.vmConfig.memoryGb);
  output.field("Storage (GB)", spec.storageConfig.sizeGb);
  for (const resource of result.createdResources) {
    output.field(resource.resourceType, resource.resourceId);
  }
  output.field("Estimated monthly cost", formatCost(estimateCost(spec)));
  return 0;
}

export interface ValidateOptions {
  provider: string;
  type: string;
  region: string;
  flavor?: string;
}

export function validate(context: ProvisioningContext, options: ValidateOptions, output: IOutputService): number {
  const validation = context.construction.validateConfiguration(
    options.provider,
    options.type,
    options.region,
    options.flavor
  );

  if (!validation.valid) {
    output.error(validation.error);
    for (const suggestion of validation.suggestions) {
      output.dim(suggestion);
    }
    return 1;
  }

  const spec = validation.specification;
  output.success(`Configuration is valid: ${spec.provider} ${spec.vmType} in ${spec.region}`);
  output.field("vCPUs", spec.vmConfig.vcpus);
  output.field("Memory (GB)", spec.vmConfig.memoryGb);
  output.field("Estimated monthly cost", formatCost(validation.estimatedCost));
  for (const warning of validation.warnings) {
    output.warn(warning);
  }
  return 0;
}

export interface CatalogOptions {
  provider: string;
  json?: boolean;
}

export function catalog(context: ProvisioningContext, options: CatalogOptions, output: IOutputService): number {
  const configurations = context.construction.getAvailableConfigurations(options.provider);
  if (options.json === true) {
    output.json(configurations);
    return 0;
  }

  output.header(`VM catalog for ${configurations.provider}`);
  for (const [vmType, entry] of Object.entries(configurations.vmTypes)) {
    if (!entry) continue;
    output.newline();
    output.info(`${vmType} (default flavor: ${entry.defaultFlavor})`);
    for (const [flavor, config] of Object.entries(entry.configurations)) {
      output.field(flavor, `${config.sku}, ${config.vcpus} vCPU, ${config.memoryGb} GB`);
    }
  }
  output.newline();
  output.dim(`Regions: ${configurations.supportedRegions.join(", ")}`);
  return 0;
}

export function formatCost(estimate: CostEstimate): string {
  return `${estimate.estimatedMonthly.toFixed(2)} ${estimate.currency}`;
}
