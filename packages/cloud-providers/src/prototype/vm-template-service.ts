import {
  CUSTOM_TEMPLATE_CATEGORY,
  DERIVED_TEMPLATE_CATEGORY,
  ValidationError,
  checkSpecificationConsistency,
  createLogger,
  getSupportedRegions,
  isExpectedError,
  isSupportedRegion,
  parseProvider,
  toErrorMessage,
} from "@vmforge/core";
import type { Logger, VMSpecification } from "@vmforge/core";
import { BUILD_INTERNAL_ERROR_MESSAGE } from "../builder/vm-builder";
import { getConfigurationWarnings } from "../construction/configuration-warnings";
import { estimateCost } from "../construction/cost-estimator";
import type { CostEstimate } from "../construction/cost-estimator";
import type { BuildVmResult, VmConstructionService } from "../construction/vm-construction-service";
import type { VmDirector } from "../director/vm-director";
import type { PrototypeRegistry, TemplateListing } from "./prototype-registry";
import { VmTemplatePrototype } from "./vm-prototype";
import type { PrototypeCustomization, TemplateInfo, TemplateTags } from "./vm-prototype";

const MOST_USED_LIMIT = 5;

export interface CreateFromTemplateOptions {
  provider?: string;
  region?: string;
  customizations?: PrototypeCustomization;
}

export interface RegisterTemplateInput {
  templateName: string;
  vmSpecification: VMSpecification;
  description: string;
  category?: string;
  tags?: TemplateTags;
}

export type TemplateRegistrationResult =
  | { success: true; message: string; templateInfo: TemplateInfo }
  | { success: false; error: string };

export type TemplateDeletionResult =
  | { success: true; message: string }
  | { success: false; error: string };

export type TemplateDetailsResult =
  | {
      success: true;
      templateInfo: TemplateInfo;
      vmSpecification: VMSpecification;
      costEstimate: CostEstimate;
      compatibleProviders: string[];
    }
  | { success: false; error: string };

export interface TemplateStatistics {
  totalTemplates: number;
  categories: number;
  providerDistribution: Record<string, number>;
  vmTypeDistribution: Record<string, number>;
  mostUsedTemplates: Array<{ name: string; usageCount: number; category: string }>;
}

export interface TemplateCatalog extends TemplateListing {
  statistics: TemplateStatistics;
}

export interface TemplateValidation {
  valid: boolean;
  templateName: string;
  issues: string[];
  warnings: string[];
  suggestions: string[];
  estimatedCost?: CostEstimate;
}

export interface VmTemplateServiceOptions {
  logger?: Logger;
}

/**
 * Template workflows over the prototype registry: instantiate, register,
 * inspect and delete templates, retargeting them to another provider or
 * region through the Director when asked.
 */
export class VmTemplateService {
  private readonly logger: Logger;

  constructor(
    private readonly registry: PrototypeRegistry,
    private readonly director: VmDirector,
    private readonly construction: VmConstructionService,
    options: VmTemplateServiceOptions = {}
  ) {
    this.logger = options.logger ?? createLogger("vm-template-service");
  }

  createFromTemplate(templateName: string, options: CreateFromTemplateOptions = {}): BuildVmResult {
    this.logger.info(
      {
        template: templateName,
        provider: options.provider,
        region: options.region,
        hasCustomizations: options.customizations !== undefined,
      },
      "Creating VM from template"
    );

    try {
      const cloned = this.registry.cloneAndCustomize(templateName, options.customizations);
      if (!cloned) {
        return { success: false, error: templateNotFound(templateName) };
      }

      const specification = this.retarget(
        cloned.getVmSpecification(),
        options.provider,
        options.region
      );

      const issues = checkSpecificationConsistency(specification);
      if (issues.length > 0) {
        return { success: false, error: issues.join("; ") };
      }

      return this.construction.buildSpecification(specification);
    } catch (error) {
      if (isExpectedError(error)) {
        return { success: false, error: error.message };
      }
      this.logger.error({ err: error, template: templateName }, "Unexpected error creating VM from template");
      return { success: false, error: BUILD_INTERNAL_ERROR_MESSAGE };
    }
  }

  registerTemplate(input: RegisterTemplateInput): TemplateRegistrationResult {
    const prototype = new VmTemplatePrototype({
      templateName: input.templateName,
      description: input.description,
      vmSpecification: input.vmSpecification,
      category: input.category ?? CUSTOM_TEMPLATE_CATEGORY,
      tags: input.tags,
    });

    if (!this.registry.register(input.templateName, prototype)) {
      return { success: false, error: `Template '${input.templateName}' already exists` };
    }

    this.logger.info(
      { template: input.templateName, category: prototype.category },
      "Template registered"
    );
    return {
      success: true,
      message: `Template '${input.templateName}' registered`,
      templateInfo: prototype.getTemplateInfo(),
    };
  }

  /** Captures an existing VM specification as a reusable template. */
  createTemplateFromExistingVm(input: RegisterTemplateInput): TemplateRegistrationResult {
    const tags: TemplateTags = {
      source: "existing_vm",
      provider: input.vmSpecification.provider,
      vm_type: input.vmSpecification.vmType,
      created_from: "production_vm",
      ...input.tags,
    };
    return this.registerTemplate({
      ...input,
      category: input.category ?? DERIVED_TEMPLATE_CATEGORY,
      tags,
    });
  }

  getTemplateDetails(templateName: string): TemplateDetailsResult {
    const prototype = this.registry.getPrototype(templateName);
    if (!prototype) {
      return { success: false, error: templateNotFound(templateName) };
    }

    const vmSpecification = prototype.getVmSpecification();
    return {
      success: true,
      templateInfo: prototype.getTemplateInfo(),
      vmSpecification,
      costEstimate: estimateCost(vmSpecification),
      compatibleProviders: this.getCompatibleProviders(vmSpecification),
    };
  }

  listTemplates(category?: string): TemplateCatalog {
    return { ...this.registry.listTemplates(category), statistics: this.generateStatistics() };
  }

  deleteTemplate(templateName: string): TemplateDeletionResult {
    if (!this.registry.removeTemplate(templateName)) {
      return { success: false, error: templateNotFound(templateName) };
    }
    this.logger.info({ template: templateName }, "Template deleted");
    return { success: true, message: `Template '${templateName}' deleted` };
  }

  /**
   * Dry run of createFromTemplate: retargets a copy of the template and
   * reports what would block it. Does not count as a use of the template.
   */
  validateTemplate(templateName: string, targetProvider?: string, targetRegion?: string): TemplateValidation {
    const prototype = this.registry.getPrototype(templateName);
    if (!prototype) {
      return {
        valid: false,
        templateName,
        issues: [templateNotFound(templateName)],
        warnings: [],
        suggestions: [`Available templates: ${this.registry.listTemplates().templates.map((t) => t.templateName).join(", ")}`],
      };
    }

    let specification: VMSpecification;
    try {
      specification = this.retarget(prototype.getVmSpecification(), targetProvider, targetRegion);
    } catch (error) {
      return {
        valid: false,
        templateName,
        issues: [toErrorMessage(error)],
        warnings: [],
        suggestions: [`Supported providers: ${this.director.getCatalogProviders().join(", ")}`],
      };
    }

    const issues = checkSpecificationConsistency(specification);
    const suggestions: string[] = [];
    if (!isSupportedRegion(specification.provider, specification.region)) {
      suggestions.push(
        `Supported regions for ${specification.provider}: ${getSupportedRegions(specification.provider).join(", ")}`
      );
    }

    return {
      valid: issues.length === 0,
      templateName,
      issues,
      warnings: getConfigurationWarnings(specification),
      suggestions,
      estimatedCost: estimateCost(specification),
    };
  }

  /**
   * A provider change re-derives the specification through the Director,
   * keeping vCPU and memory; a region change is applied to the top level
   * and both nested configs.
   */
  private retarget(
    specification: VMSpecification,
    providerName: string | undefined,
    region: string | undefined
  ): VMSpecification {
    let result = specification;

    if (providerName !== undefined && parseProvider(providerName) !== result.provider) {
      result = this.adaptToProvider(result, providerName);
    }

    if (region !== undefined && region !== result.region) {
      result.region = region;
      result.networkConfig.region = region;
      result.storageConfig.region = region;
    }

    return result;
  }

  private adaptToProvider(specification: VMSpecification, providerName: string): VMSpecification {
    this.logger.debug(
      { from: specification.provider, to: providerName },
      "Adapting template to provider"
    );
    try {
      return this.director.getVmSpecification(
        providerName,
        specification.vmType,
        specification.region,
        undefined,
        { vcpus: specification.vmConfig.vcpus, memoryGb: specification.vmConfig.memoryGb }
      );
    } catch (error) {
      throw new ValidationError(
        `Cannot adapt template to provider '${providerName}': ${toErrorMessage(error)}`
      );
    }
  }

  private getCompatibleProviders(specification: VMSpecification): string[] {
    return this.director.getCatalogProviders().filter((provider) => {
      try {
        this.adaptToProvider(specification, provider);
        return true;
      } catch (error) {
        this.logger.debug({ provider, reason: toErrorMessage(error) }, "Provider not compatible");
        return false;
      }
    });
  }

  private generateStatistics(): TemplateStatistics {
    const all = this.registry.listTemplates();
    const providerDistribution: Record<string, number> = {};
    const vmTypeDistribution: Record<string, number> = {};

    for (const template of all.templates) {
      providerDistribution[template.provider] = (providerDistribution[template.provider] ?? 0) + 1;
      vmTypeDistribution[template.vmType] = (vmTypeDistribution[template.vmType] ?? 0) + 1;
    }

    const mostUsedTemplates = all.templates
      .map((template) => ({
        name: template.templateName,
        usageCount: template.creationCount,
        category: template.category,
      }))
      .sort((a, b) => b.usageCount - a.usageCount)
      .slice(0, MOST_USED_LIMIT);

    return {
      totalTemplates: all.total,
      categories: all.categories.length,
      providerDistribution,
      vmTypeDistribution,
      mostUsedTemplates,
    };
  }
}

function templateNotFound(templateName: string): string {
  return `Template '${templateName}' not found`;
}
