import type { ProviderSpecDefaults } from "../../interface/spec-defaults";
import { compactRegion } from "../base/base-param-adapter";

export const AWS_DEFAULT_AMI = "ami-0c02fb55956c7d316";

export const awsSpecDefaults: ProviderSpecDefaults = {
  vmFields: (flavor) => ({
    instanceType: flavor.sku,
    ami: AWS_DEFAULT_AMI,
  }),
  networkFields: (region, vmType) => ({
    vpcId: `vpc-${compactRegion(region)}`,
    subnet: `subnet-${compactRegion(region)}`,
    securityGroup: `sg-${vmType}`,
  }),
  storageFields: (vmType) => ({
    volumeType: vmType === "compute_optimized" ? "gp3" : "gp2",
    encrypted: true,
  }),
};
