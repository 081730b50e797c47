import type { ProvisioningContext } from "@vmforge/cloud-providers";
import type { IOutputService } from "../interfaces/output.interface";
import { JsonObjectSchema, parseJsonOption } from "../utils/json-option";

export interface ProvisionOptions {
  provider: string;
  vm: string;
  network: string;
  storage: string;
}

/** Provisions a network, storage and VM family from raw parameter maps. */
export function provision(
  context: ProvisioningContext,
  options: ProvisionOptions,
  output: IOutputService
): number {
  const vmParams = parseJsonOption("vm", options.vm, JsonObjectSchema);
  const networkParams = parseJsonOption("network", options.network, JsonObjectSchema);
  const storageParams = parseJsonOption("storage", options.storage, JsonObjectSchema);

  const result = context.provisioning.provisionFamily(
    options.provider,
    vmParams,
    networkParams,
    storageParams
  );
  if (!result.success) {
    output.error(result.error);
    return 1;
  }

  output.success(`Provisioned ${result.provider} resource family`);
  for (const resource of result.resources) {
    output.field(resource.resourceType, `${resource.resourceId} (${resource.status})`);
  }
  return 0;
}

export interface QuickProvisionOptions {
  provider: string;
  params: string;
}

export function quickProvision(
  context: ProvisioningContext,
  options: QuickProvisionOptions,
  output: IOutputService
): number {
  const params = parseJsonOption("params", options.params, JsonObjectSchema);

  const result = context.provisioning.provisionVm(options.provider, params);
  if (!result.success) {
    output.error(result.error);
    return 1;
  }

  output.success(`Provisioned VM ${result.vmId}`);
  return 0;
}
