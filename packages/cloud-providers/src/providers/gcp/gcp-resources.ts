import { BaseNetworkResource, BaseStorageResource, BaseVMResource } from "../base/base-resource";

const PROVIDER_LABEL = "GCP";

export class GcpNetwork extends BaseNetworkResource {
  protected readonly providerLabel = PROVIDER_LABEL;
  protected readonly idPrefix = "gcp-net";
  protected readonly requiredFields = ["networkName", "subnetworkName", "firewallTag"];
}

export class GcpStorage extends BaseStorageResource {
  protected readonly providerLabel = PROVIDER_LABEL;
  protected readonly idPrefix = "gcp-disk";
  protected readonly requiredFields = ["diskType", "sizeGB", "autoDelete"];
}

export class GcpVm extends BaseVMResource {
  protected readonly providerLabel = PROVIDER_LABEL;
  protected readonly idPrefix = "gcp-vm";
  protected readonly requiredFields = ["machine_type", "zone", "project"];
}
