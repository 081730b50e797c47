import { z } from "zod";

export const Provider = z.enum(["aws", "azure", "gcp", "onpremise"]);
export type Provider = z.infer<typeof Provider>;

export const VMType = z.enum(["standard", "memory_optimized", "compute_optimized"]);
export type VMType = z.infer<typeof VMType>;

export const SUPPORTED_PROVIDERS: readonly Provider[] = Provider.options;
export const SUPPORTED_VM_TYPES: readonly VMType[] = VMType.options;

/**
 * Human-readable provider names, as reported by provisioning results.
 */
export const PROVIDER_DISPLAY_NAMES: Record<Provider, string> = {
  aws: "AWS",
  azure: "Azure",
  gcp: "Google Cloud",
  onpremise: "On-Premise",
};

/**
 * Case-insensitive provider lookup. Returns undefined for unknown names.
 */
export function parseProvider(value: string): Provider | undefined {
  const result = Provider.safeParse(value.trim().toLowerCase());
  return result.success ? result.data : undefined;
}

export function parseVmType(value: string): VMType | undefined {
  const result = VMType.safeParse(value.trim().toLowerCase());
  return result.success ? result.data : undefined;
}
