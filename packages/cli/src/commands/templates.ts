import { PrototypeCustomizationSchema } from "@vmforge/cloud-providers";
import type { ProvisioningContext } from "@vmforge/cloud-providers";
import type { IOutputService } from "../interfaces/output.interface";
import { parseOptionalJsonOption } from "../utils/json-option";
import { formatCost, reportBuild } from "./build";

export interface ListTemplatesOptions {
  category?: string;
}

export function listTemplates(
  context: ProvisioningContext,
  options: ListTemplatesOptions,
  output: IOutputService
): number {
  const listing = context.templates.listTemplates(options.category);

  output.header("VM templates", "📦");
  output.newline();
  if (listing.total === 0) {
    output.dim(options.category ? `No templates in category '${options.category}'` : "No templates registered");
    return 0;
  }

  for (const template of listing.templates) {
    output.field(
      template.templateName,
      `${template.provider} ${template.vmType} [${template.category}], used ${template.creationCount} time(s)`
    );
    output.dim(`    ${template.description}`);
  }
  output.newline();
  output.dim(`${listing.total} template(s) in ${listing.categories.length} categor${listing.categories.length === 1 ? "y" : "ies"}`);
  return 0;
}

export interface ShowTemplateOptions {
  json?: boolean;
}

export function showTemplate(
  context: ProvisioningContext,
  templateName: string,
  options: ShowTemplateOptions,
  output: IOutputService
): number {
  const details = context.templates.getTemplateDetails(templateName);
  if (!details.success) {
    output.error(details.error);
    return 1;
  }

  if (options.json === true) {
    output.json({
      templateInfo: details.templateInfo,
      vmSpecification: details.vmSpecification,
      costEstimate: details.costEstimate,
      compatibleProviders: details.compatibleProviders,
    });
    return 0;
  }

  const info = details.templateInfo;
  output.header(info.templateName);
  output.dim(info.description);
  output.newline();
  output.field("Category", info.category);
  output.field("Provider", info.provider);
  output.field("VM type", info.vmType);
  output.field("Region", info.region);
  output.field("vCPUs", info.specifications.vcpus);
  output.field("Memory (GB)", info.specifications.memoryGb);
  output.field("Storage (GB)", info.specifications.storageGb);
  output.field("Estimated monthly cost", formatCost(details.costEstimate));
  output.field("Compatible providers", details.compatibleProviders.join(", "));
  for (const [tag, value] of Object.entries(info.tags)) {
    output.field(`tag ${tag}`, value);
  }
  return 0;
}

export interface CreateFromTemplateCommandOptions {
  provider?: string;
  region?: string;
  customizations?: string;
  json?: boolean;
}

export function createFromTemplate(
  context: ProvisioningContext,
  templateName: string,
  options: CreateFromTemplateCommandOptions,
  output: IOutputService
): number {
  const result = context.templates.createFromTemplate(templateName, {
    provider: options.provider,
    region: options.region,
    customizations: parseOptionalJsonOption(
      "customizations",
      options.customizations,
      PrototypeCustomizationSchema
    ),
  });
  return reportBuild(result, output, options.json === true);
}

export interface ValidateTemplateOptions {
  provider?: string;
  region?: string;
}

export function validateTemplate(
  context: ProvisioningContext,
  templateName: string,
  options: ValidateTemplateOptions,
  output: IOutputService
): number {
  const validation = context.templates.validateTemplate(templateName, options.provider, options.region);

  if (validation.valid) {
    output.success(`Template '${templateName}' is valid`);
  } else {
    output.error(`Template '${templateName}' is not valid`);
  }
  for (const issue of validation.issues) {
    output.info(`- ${issue}`);
  }
  for (const warning of validation.warnings) {
    output.warn(warning);
  }
  for (const suggestion of validation.suggestions) {
    output.dim(suggestion);
  }
  if (validation.estimatedCost) {
    output.field("Estimated monthly cost", formatCost(validation.estimatedCost));
  }
  return validation.valid ? 0 : 1;
}
