import type { ProviderSpecDefaults } from "../../interface/spec-defaults";
import { DEFAULT_HYPERVISOR, DEFAULT_VLAN_ID } from "./onpremise-resource-factory";

export const onPremiseSpecDefaults: ProviderSpecDefaults = {
  vmFields: (flavor) => ({
    cpu: flavor.vcpus,
    ram: flavor.memoryGb,
    hypervisor: DEFAULT_HYPERVISOR,
  }),
  networkFields: (_region, vmType) => ({
    physicalInterface: "eth0",
    vlanId: DEFAULT_VLAN_ID,
    firewallPolicy: `policy-${vmType}`,
  }),
  storageFields: (vmType) => ({
    storagePool: `pool-${vmType}`,
    raidLevel: "raid1",
  }),
};
