import type { ProviderSpecDefaults } from "../../interface/spec-defaults";

export const azureSpecDefaults: ProviderSpecDefaults = {
  vmFields: (flavor) => ({
    size: flavor.sku,
    resourceGroup: "rg-default",
    image: "UbuntuLTS",
  }),
  networkFields: (region, vmType) => ({
    virtualNetwork: `vnet-${region}`,
    subnetName: `subnet-${vmType}`,
    networkSecurityGroup: `nsg-${vmType}`,
  }),
  storageFields: (vmType) => ({
    diskSku: vmType === "memory_optimized" ? "Premium_LRS" : "Standard_LRS",
    managedDisk: true,
  }),
};
