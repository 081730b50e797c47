import { z } from "zod";

export const ResourceType = z.enum(["network", "storage", "vm"]);
export type ResourceType = z.infer<typeof ResourceType>;

export const ResourceStatus = z.enum(["available", "provisioned"]);
export type ResourceStatus = z.infer<typeof ResourceStatus>;

/**
 * A resource created by a provider kit. Only produced on success and never
 * mutated afterwards.
 */
export interface ResourceInfo {
  readonly resourceId: string;
  readonly resourceType: ResourceType;
  readonly status: ResourceStatus;
  readonly details: Readonly<Record<string, unknown>>;
}

export type ResourceFamilyResult =
  | { success: true; provider: string; resources: ResourceInfo[] }
  | { success: false; error: string };

export type SingleVmResult =
  | { success: true; vmId: string }
  | { success: false; error: string };
