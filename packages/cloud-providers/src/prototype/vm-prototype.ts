import { z } from "zod";
import {
  ConfigOverridesSchema,
  DEFAULT_TEMPLATE_CATEGORY,
  copySpecification,
  mergeNetworkConfig,
  mergeStorageConfig,
  mergeVirtualMachineConfig,
} from "@vmforge/core";
import type { Provider, VMSpecification, VMType } from "@vmforge/core";

export const TemplateTagsSchema = z.record(z.string());
export type TemplateTags = z.infer<typeof TemplateTagsSchema>;

/**
 * Patch applied to a cloned template. Each config section is merged field by
 * field onto the current values; tags are merged, never replaced.
 */
export const PrototypeCustomizationSchema = z.object({
  vmConfig: ConfigOverridesSchema.optional(),
  networkConfig: ConfigOverridesSchema.optional(),
  storageConfig: ConfigOverridesSchema.optional(),
  region: z.string().min(1).optional(),
  tags: TemplateTagsSchema.optional(),
});

export type PrototypeCustomization = z.infer<typeof PrototypeCustomizationSchema>;

export interface TemplateInfo {
  templateName: string;
  description: string;
  category: string;
  provider: Provider;
  vmType: VMType;
  region: string;
  tags: TemplateTags;
  creationCount: number;
  specifications: {
    vcpus: number;
    memoryGb: number;
    storageGb: number;
  };
}

export interface VmPrototype {
  readonly templateName: string;
  readonly category: string;
  /** Independent copy; bumps this prototype's creation count. */
  clone(): VmPrototype;
  customize(customization: PrototypeCustomization): VmPrototype;
  getVmSpecification(): VMSpecification;
  getTemplateInfo(): TemplateInfo;
}

/** What a registry lookup exposes: a stored template can be read, not changed. */
export type TemplateView = Pick<VmPrototype, "templateName" | "category" | "getVmSpecification" | "getTemplateInfo">;

export interface VmTemplatePrototypeInit {
  templateName: string;
  description: string;
  vmSpecification: VMSpecification;
  category?: string;
  tags?: TemplateTags;
}

export class VmTemplatePrototype implements VmPrototype {
  readonly templateName: string;
  readonly description: string;
  readonly category: string;
  private specification: VMSpecification;
  private tags: TemplateTags;
  private creationCount = 0;

  constructor(init: VmTemplatePrototypeInit) {
    this.templateName = init.templateName;
    this.description = init.description;
    this.category = init.category ?? DEFAULT_TEMPLATE_CATEGORY;
    this.specification = copySpecification(init.vmSpecification);
    this.tags = { ...init.tags };
  }

  clone(): VmTemplatePrototype {
    const cloned = new VmTemplatePrototype({
      templateName: this.templateName,
      description: this.description,
      vmSpecification: this.specification,
      category: this.category,
      tags: this.tags,
    });
    this.creationCount += 1;
    return cloned;
  }

  customize(customization: PrototypeCustomization): VmTemplatePrototype {
    const spec = this.specification;
    if (customization.vmConfig) {
      spec.vmConfig = mergeVirtualMachineConfig(spec.vmConfig, customization.vmConfig);
    }
    if (customization.networkConfig) {
      spec.networkConfig = mergeNetworkConfig(spec.networkConfig, customization.networkConfig);
    }
    if (customization.storageConfig) {
      spec.storageConfig = mergeStorageConfig(spec.storageConfig, customization.storageConfig);
    }
    if (customization.region !== undefined) {
      spec.region = customization.region;
    }
    if (customization.tags) {
      this.tags = { ...this.tags, ...customization.tags };
    }
    return this;
  }

  getVmSpecification(): VMSpecification {
    return copySpecification(this.specification);
  }

  getTemplateInfo(): TemplateInfo {
    const spec = this.specification;
    return {
      templateName: this.templateName,
      description: this.description,
      category: this.category,
      provider: spec.provider,
      vmType: spec.vmType,
      region: spec.region,
      tags: { ...this.tags },
      creationCount: this.creationCount,
      specifications: {
        vcpus: spec.vmConfig.vcpus,
        memoryGb: spec.vmConfig.memoryGb,
        storageGb: spec.storageConfig.sizeGb,
      },
    };
  }
}
