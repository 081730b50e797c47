// Interfaces
export * from "./interface/resources";
export * from "./interface/spec-defaults";

// Abstract Factory: per-provider resource kits
export * from "./providers/base/base-resource";
export * from "./providers/base/base-param-adapter";
export * from "./providers/aws/aws-resources";
export { AwsParamAdapter, AwsResourceFactory } from "./providers/aws/aws-resource-factory";
export { AWS_DEFAULT_AMI } from "./providers/aws/aws-spec-defaults";
export * from "./providers/azure/azure-resources";
export { AzureParamAdapter, AzureResourceFactory } from "./providers/azure/azure-resource-factory";
export * from "./providers/gcp/gcp-resources";
export { GcpParamAdapter, GcpResourceFactory } from "./providers/gcp/gcp-resource-factory";
export * from "./providers/onpremise/onpremise-resources";
export {
  DEFAULT_HYPERVISOR,
  DEFAULT_VLAN_ID,
  OnPremiseParamAdapter,
  OnPremiseResourceFactory,
} from "./providers/onpremise/onpremise-resource-factory";
export { ResourceFactoryRegistry } from "./providers/factory-registry";

// Factory Method: single-VM provisioners
export * from "./providers/single-vm/vm-provisioners";
export * from "./providers/single-vm/vm-provisioner-factory";

// Director and Builder
export * from "./director/vm-catalog";
export * from "./director/vm-director";
export { PROVIDER_SPEC_DEFAULTS } from "./director/provider-spec-defaults";
export * from "./builder/vm-builder";

// Services
export * from "./provisioning/resource-provisioning-service";
export * from "./construction/cost-estimator";
export * from "./construction/configuration-warnings";
export * from "./construction/vm-construction-service";

// Prototype
export * from "./prototype/vm-prototype";
export * from "./prototype/prototype-registry";
export * from "./prototype/default-templates";
export * from "./prototype/vm-template-service";

export * from "./context";
