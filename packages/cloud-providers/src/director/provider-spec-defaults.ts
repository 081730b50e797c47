import type { Provider } from "@vmforge/core";
import type { ProviderSpecDefaults } from "../interface/spec-defaults";
import { awsSpecDefaults } from "../providers/aws/aws-spec-defaults";
import { azureSpecDefaults } from "../providers/azure/azure-spec-defaults";
import { gcpSpecDefaults } from "../providers/gcp/gcp-spec-defaults";
import { onPremiseSpecDefaults } from "../providers/onpremise/onpremise-spec-defaults";

export const PROVIDER_SPEC_DEFAULTS: Record<Provider, ProviderSpecDefaults> = {
  aws: awsSpecDefaults,
  azure: azureSpecDefaults,
  gcp: gcpSpecDefaults,
  onpremise: onPremiseSpecDefaults,
};
