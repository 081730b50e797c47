import type {
  NetworkConfig,
  ResourceInfo,
  StorageConfig,
  VirtualMachineConfig,
} from "@vmforge/core";

/**
 * Raw, provider-specific parameter map handed to a resource creator.
 * Keys follow each provider's own naming (vpcId, resource_group, sizeGB...).
 */
export type ResourceParams = Record<string, unknown>;

export type CreateResult =
  | { ok: true; resourceId: string }
  | { ok: false; error: string };

export interface NetworkResource {
  create(params: ResourceParams): CreateResult;
  /** Metadata of the created resource; undefined until create succeeds. */
  getInfo(): ResourceInfo | undefined;
}

export interface StorageResource {
  create(params: ResourceParams): CreateResult;
  getInfo(): ResourceInfo | undefined;
}

export interface VMResource {
  create(params: ResourceParams, networkId: string, storageId: string): CreateResult;
  getInfo(): ResourceInfo | undefined;
}

/**
 * Translates provider-agnostic configuration records into the raw parameter
 * maps a provider's creators expect, filling provider defaults on the way.
 */
export interface ParamAdapter {
  toNetworkParams(config: NetworkConfig): ResourceParams;
  toStorageParams(config: StorageConfig): ResourceParams;
  /** The VM inherits its region from the network it is attached to. */
  toVmParams(config: VirtualMachineConfig, network: NetworkConfig): ResourceParams;
}

/**
 * Abstract factory for one provider's resource family. Every creator returned
 * by a single factory belongs to the same provider.
 */
export interface CloudResourceFactory {
  readonly paramAdapter: ParamAdapter;
  getProviderName(): string;
  createNetwork(): NetworkResource;
  createStorage(): StorageResource;
  createVm(): VMResource;
}

export type CloudResourceFactoryClass = new () => CloudResourceFactory;
