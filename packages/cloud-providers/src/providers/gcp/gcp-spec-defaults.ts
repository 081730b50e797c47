import type { ProviderSpecDefaults } from "../../interface/spec-defaults";

export const gcpSpecDefaults: ProviderSpecDefaults = {
  vmFields: (flavor) => ({
    machineType: flavor.sku,
    project: "default-project",
  }),
  networkFields: (region, vmType) => ({
    networkName: "default",
    subnetworkName: `subnet-${region}`,
    firewallTag: `allow-${vmType}`,
  }),
  storageFields: (vmType) => ({
    diskType: vmType === "compute_optimized" ? "pd-ssd" : "pd-standard",
    autoDelete: true,
  }),
};
