import { createHash } from "node:crypto";
import type { ResourceInfo, ResourceStatus, ResourceType } from "@vmforge/core";
import type {
  CreateResult,
  NetworkResource,
  ResourceParams,
  StorageResource,
  VMResource,
} from "../../interface/resources";

const ID_HASH_LENGTH = 8;

/**
 * Deterministic opaque id: `<prefix>-<first 8 hex chars of sha256>`.
 * Collisions are possible and not defended against.
 */
export function generateResourceId(prefix: string, ...parts: unknown[]): string {
  const digest = createHash("sha256").update(JSON.stringify(parts)).digest("hex");
  return `${prefix}-${digest.slice(0, ID_HASH_LENGTH)}`;
}

/** First required field whose value is undefined, in declared order. */
export function findMissingField(
  params: ResourceParams,
  requiredFields: readonly string[]
): string | undefined {
  return requiredFields.find((field) => params[field] === undefined);
}

function pickFields(params: ResourceParams, fields: readonly string[]): Record<string, unknown> {
  const picked: Record<string, unknown> = {};
  for (const field of fields) {
    picked[field] = params[field];
  }
  return picked;
}

abstract class BaseResource {
  /** Label used in error messages, e.g. "AWS". */
  protected abstract readonly providerLabel: string;
  protected abstract readonly idPrefix: string;
  protected abstract readonly requiredFields: readonly string[];
  protected abstract readonly resourceLabel: string;
  protected abstract readonly resourceType: ResourceType;
  protected abstract readonly status: ResourceStatus;

  private info?: ResourceInfo;

  getInfo(): ResourceInfo | undefined {
    return this.info;
  }

  protected createWith(
    params: ResourceParams,
    idParts: unknown[],
    extraDetails: Record<string, unknown> = {}
  ): CreateResult {
    const missing = findMissingField(params, this.requiredFields);
    if (missing !== undefined) {
      return {
        ok: false,
        error: `Missing required ${this.providerLabel} ${this.resourceLabel} parameter: ${missing}`,
      };
    }

    const resourceId = generateResourceId(this.idPrefix, params, ...idParts);
    this.info = {
      resourceId,
      resourceType: this.resourceType,
      status: this.status,
      details: { ...pickFields(params, this.requiredFields), ...extraDetails },
    };
    return { ok: true, resourceId };
  }
}

export abstract class BaseNetworkResource extends BaseResource implements NetworkResource {
  protected readonly resourceLabel = "network";
  protected readonly resourceType = "network";
  protected readonly status = "available";

  create(params: ResourceParams): CreateResult {
    return this.createWith(params, []);
  }
}

export abstract class BaseStorageResource extends BaseResource implements StorageResource {
  protected readonly resourceLabel = "storage";
  protected readonly resourceType = "storage";
  protected readonly status = "available";

  create(params: ResourceParams): CreateResult {
    return this.createWith(params, []);
  }
}

export abstract class BaseVMResource extends BaseResource implements VMResource {
  protected readonly resourceLabel = "VM";
  protected readonly resourceType = "vm";
  protected readonly status = "provisioned";

  create(params: ResourceParams, networkId: string, storageId: string): CreateResult {
    return this.createWith(params, [networkId, storageId], { networkId, storageId });
  }
}
