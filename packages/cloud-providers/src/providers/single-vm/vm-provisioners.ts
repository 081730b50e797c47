import type { CreateResult, ResourceParams } from "../../interface/resources";
import { findMissingField, generateResourceId } from "../base/base-resource";

/** Factory Method product: provisions one VM from a flat parameter map. */
export interface VmProvisioner {
  readonly requiredFields: readonly string[];
  createVm(params: ResourceParams): CreateResult;
}

abstract class RequiredFieldsVmProvisioner implements VmProvisioner {
  abstract readonly requiredFields: readonly string[];
  protected abstract readonly providerLabel: string;
  protected abstract readonly idPrefix: string;

  createVm(params: ResourceParams): CreateResult {
    const missing = findMissingField(params, this.requiredFields);
    if (missing !== undefined) {
      return { ok: false, error: `Missing required ${this.providerLabel} parameter: ${missing}` };
    }
    return { ok: true, resourceId: generateResourceId(this.idPrefix, params) };
  }
}

export class AwsVmProvisioner extends RequiredFieldsVmProvisioner {
  readonly requiredFields = ["instance_type", "region", "vpc", "ami"];
  protected readonly providerLabel = "AWS";
  protected readonly idPrefix = "aws-vm";
}

export class AzureVmProvisioner extends RequiredFieldsVmProvisioner {
  readonly requiredFields = ["size", "resource_group", "image", "vnet"];
  protected readonly providerLabel = "Azure";
  protected readonly idPrefix = "azure-vm";
}

export class GcpVmProvisioner extends RequiredFieldsVmProvisioner {
  readonly requiredFields = ["machine_type", "zone", "disk", "project"];
  protected readonly providerLabel = "GCP";
  protected readonly idPrefix = "gcp-vm";
}

export class OnPremiseVmProvisioner extends RequiredFieldsVmProvisioner {
  readonly requiredFields = ["cpu", "ram", "disk", "network"];
  protected readonly providerLabel = "On-Premise";
  protected readonly idPrefix = "onprem-vm";
}
