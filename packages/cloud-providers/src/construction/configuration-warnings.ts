import {
  HIGH_MEMORY_WARNING_GB,
  LARGE_STORAGE_WARNING_GB,
  PROVIDER_DISPLAY_NAMES,
  isSupportedRegion,
} from "@vmforge/core";
import type { VMSpecification } from "@vmforge/core";

export const HIGH_MEMORY_WARNING = "High-memory configuration may increase costs significantly";
export const LARGE_STORAGE_WARNING = "Large storage volumes may lengthen backup times";
export const PUBLIC_IP_WARNING = "A public IP exposes the VM to the internet; review the firewall rules";

/** Heuristic warnings; none of them makes a configuration invalid. */
export function getConfigurationWarnings(specification: VMSpecification): string[] {
  const warnings: string[] = [];

  if (specification.vmConfig.memoryGb > HIGH_MEMORY_WARNING_GB) {
    warnings.push(HIGH_MEMORY_WARNING);
  }
  if (specification.storageConfig.sizeGb > LARGE_STORAGE_WARNING_GB) {
    warnings.push(LARGE_STORAGE_WARNING);
  }
  if (specification.networkConfig.publicIp) {
    warnings.push(PUBLIC_IP_WARNING);
  }
  if (!isSupportedRegion(specification.provider, specification.region)) {
    warnings.push(
      `Region '${specification.region}' is not a supported ${PROVIDER_DISPLAY_NAMES[specification.provider]} region`
    );
  }

  return warnings;
}
