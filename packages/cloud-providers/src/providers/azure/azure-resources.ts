import { BaseNetworkResource, BaseStorageResource, BaseVMResource } from "../base/base-resource";

const PROVIDER_LABEL = "Azure";

export class AzureNetwork extends BaseNetworkResource {
  protected readonly providerLabel = PROVIDER_LABEL;
  protected readonly idPrefix = "azure-net";
  protected readonly requiredFields = ["virtualNetwork", "subnetName", "networkSecurityGroup"];
}

export class AzureStorage extends BaseStorageResource {
  protected readonly providerLabel = PROVIDER_LABEL;
  protected readonly idPrefix = "azure-disk";
  protected readonly requiredFields = ["diskSku", "sizeGB", "managedDisk"];
}

export class AzureVm extends BaseVMResource {
  protected readonly providerLabel = PROVIDER_LABEL;
  protected readonly idPrefix = "azure-vm";
  protected readonly requiredFields = ["size", "resource_group", "image"];
}
