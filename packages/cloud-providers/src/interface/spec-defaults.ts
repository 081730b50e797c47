import type {
  NetworkConfigInput,
  StorageConfigInput,
  VMType,
  VirtualMachineConfigInput,
} from "@vmforge/core";
import type { VmFlavor } from "../director/vm-catalog";

/**
 * Provider-specific naming the Director layers over the shared defaults.
 * One instance per provider replaces per-provider conditionals.
 */
export interface ProviderSpecDefaults {
  vmFields(flavor: VmFlavor): Partial<VirtualMachineConfigInput>;
  networkFields(region: string, vmType: VMType): Partial<NetworkConfigInput>;
  storageFields(vmType: VMType): Partial<StorageConfigInput>;
}
