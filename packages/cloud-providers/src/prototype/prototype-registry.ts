import { createLogger } from "@vmforge/core";
import type { Logger } from "@vmforge/core";
import type { PrototypeCustomization, TemplateInfo, TemplateView, VmPrototype } from "./vm-prototype";

export interface TemplateListing {
  templates: TemplateInfo[];
  total: number;
  categories: string[];
}

export interface PrototypeRegistryOptions {
  logger?: Logger;
}

/**
 * Named templates plus a category index. Every registered name sits in
 * exactly one category bucket; empty buckets are removed.
 */
export class PrototypeRegistry {
  private prototypes: Map<string, VmPrototype> = new Map();
  private categories: Map<string, string[]> = new Map();
  private readonly logger: Logger;

  constructor(options: PrototypeRegistryOptions = {}) {
    this.logger = options.logger ?? createLogger("prototype-registry");
  }

  get size(): number {
    return this.prototypes.size;
  }

  /** Never overwrites: returns false when the name is taken. */
  register(name: string, prototype: VmPrototype): boolean {
    if (this.prototypes.has(name)) {
      this.logger.warn({ template: name }, "Template already registered");
      return false;
    }

    this.prototypes.set(name, prototype);
    const bucket = this.categories.get(prototype.category);
    if (bucket) {
      bucket.push(name);
    } else {
      this.categories.set(prototype.category, [name]);
    }

    this.logger.debug({ template: name, category: prototype.category }, "Template registered");
    return true;
  }

  /** Read-only view; use cloneAndCustomize to derive a modified copy. */
  getPrototype(name: string): TemplateView | undefined {
    const prototype = this.prototypes.get(name);
    if (!prototype) {
      return undefined;
    }
    return {
      templateName: prototype.templateName,
      category: prototype.category,
      getVmSpecification: () => prototype.getVmSpecification(),
      getTemplateInfo: () => prototype.getTemplateInfo(),
    };
  }

  cloneAndCustomize(
    name: string,
    customization?: PrototypeCustomization
  ): VmPrototype | undefined {
    const prototype = this.prototypes.get(name);
    if (!prototype) {
      this.logger.warn({ template: name }, "Template not found");
      return undefined;
    }

    const cloned = prototype.clone();
    if (customization) {
      cloned.customize(customization);
    }
    return cloned;
  }

  listTemplates(category?: string): TemplateListing {
    if (category !== undefined) {
      const names = this.categories.get(category) ?? [];
      const templates = this.describe(names);
      return { templates, total: templates.length, categories: names.length > 0 ? [category] : [] };
    }

    const templates = this.describe(Array.from(this.prototypes.keys()));
    return { templates, total: templates.length, categories: this.getCategories() };
  }

  removeTemplate(name: string): boolean {
    const prototype = this.prototypes.get(name);
    if (!prototype) {
      return false;
    }

    this.prototypes.delete(name);
    const bucket = this.categories.get(prototype.category);
    if (bucket) {
      const remaining = bucket.filter((entry) => entry !== name);
      if (remaining.length > 0) {
        this.categories.set(prototype.category, remaining);
      } else {
        this.categories.delete(prototype.category);
      }
    }

    this.logger.debug({ template: name }, "Template removed");
    return true;
  }

  getCategories(): string[] {
    return Array.from(this.categories.keys());
  }

  private describe(names: string[]): TemplateInfo[] {
    const infos: TemplateInfo[] = [];
    for (const name of names) {
      const prototype = this.prototypes.get(name);
      if (prototype) {
        infos.push(prototype.getTemplateInfo());
      }
    }
    return infos;
  }
}
