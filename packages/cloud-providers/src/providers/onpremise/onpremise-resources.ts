import { BaseNetworkResource, BaseStorageResource, BaseVMResource } from "../base/base-resource";

const PROVIDER_LABEL = "On-Premise";

export class OnPremiseNetwork extends BaseNetworkResource {
  protected readonly providerLabel = PROVIDER_LABEL;
  protected readonly idPrefix = "onprem-net";
  protected readonly requiredFields = ["physicalInterface", "vlanId", "firewallPolicy"];
}

export class OnPremiseStorage extends BaseStorageResource {
  protected readonly providerLabel = PROVIDER_LABEL;
  protected readonly idPrefix = "onprem-stor";
  protected readonly requiredFields = ["storagePool", "sizeGB", "raidLevel"];
}

export class OnPremiseVm extends BaseVMResource {
  protected readonly providerLabel = PROVIDER_LABEL;
  protected readonly idPrefix = "onprem-vm";
  protected readonly requiredFields = ["cpu", "ram"];
}
