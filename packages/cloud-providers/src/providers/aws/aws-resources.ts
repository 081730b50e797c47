import { BaseNetworkResource, BaseStorageResource, BaseVMResource } from "../base/base-resource";

const PROVIDER_LABEL = "AWS";

export class AwsNetwork extends BaseNetworkResource {
  protected readonly providerLabel = PROVIDER_LABEL;
  protected readonly idPrefix = "aws-net";
  protected readonly requiredFields = ["vpcId", "subnet", "securityGroup"];
}

export class AwsStorage extends BaseStorageResource {
  protected readonly providerLabel = PROVIDER_LABEL;
  protected readonly idPrefix = "aws-vol";
  protected readonly requiredFields = ["volumeType", "sizeGB", "encrypted"];
}

export class AwsVm extends BaseVMResource {
  protected readonly providerLabel = PROVIDER_LABEL;
  protected readonly idPrefix = "aws-vm";
  protected readonly requiredFields = ["instance_type", "region", "ami"];
}
