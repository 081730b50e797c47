import type { Provider } from "../provider";

// Fixed region lists offered for discovery and validation
export const SUPPORTED_REGIONS: Record<Provider, readonly string[]> = {
  aws: ["us-east-1", "us-west-2", "eu-west-1", "ap-southeast-1"],
  azure: ["eastus", "westus2", "westeurope", "southeastasia"],
  gcp: ["us-central1", "us-west1", "europe-west1", "asia-southeast1"],
  onpremise: ["datacenter-1", "datacenter-2", "edge-location-1"],
};

export function getSupportedRegions(provider: Provider): string[] {
  return [...SUPPORTED_REGIONS[provider]];
}

export function isSupportedRegion(provider: Provider, region: string): boolean {
  return SUPPORTED_REGIONS[provider].includes(region);
}
