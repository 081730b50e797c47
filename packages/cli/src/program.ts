import { Command } from "commander";
import { VMFORGE_VERSION, isExpectedError } from "@vmforge/core";
import type { ProvisioningContext } from "@vmforge/cloud-providers";
import type { IOutputService } from "./interfaces/output.interface";
import { build, catalog, validate } from "./commands/build";
import type { BuildOptions, CatalogOptions, ValidateOptions } from "./commands/build";
import { listProviders } from "./commands/providers";
import { provision, quickProvision } from "./commands/provision";
import type { ProvisionOptions, QuickProvisionOptions } from "./commands/provision";
import { createFromTemplate, listTemplates, showTemplate, validateTemplate } from "./commands/templates";
import type {
  CreateFromTemplateCommandOptions,
  ListTemplatesOptions,
  ShowTemplateOptions,
  ValidateTemplateOptions,
} from "./commands/templates";

export interface ProgramOptions {
  /** Receives each handler's exit code. Defaults to setting process.exitCode. */
  onExitCode?: (code: number) => void;
}

/**
 * Runs a handler, turning expected provisioning errors (bad options, unknown
 * provider) into an error line and exit code 1. Anything else propagates.
 */
export function runHandler(output: IOutputService, handler: () => number): number {
  try {
    return handler();
  } catch (error) {
    if (!isExpectedError(error)) {
      throw error;
    }
    output.error(error.message);
    for (const suggestion of error.suggestions) {
      output.dim(suggestion);
    }
    return 1;
  }
}

export function createProgram(
  context: ProvisioningContext,
  output: IOutputService,
  options: ProgramOptions = {}
): Command {
  const onExitCode =
    options.onExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const run = (handler: () => number): void => {
    onExitCode(runHandler(output, handler));
  };

  const program = new Command();
  // Set before any subcommand is added so they inherit it.
  program.exitOverride();

  program
    .name("vmforge")
    .description("vmforge CLI - simulated multi-cloud VM provisioning")
    .version(VMFORGE_VERSION);

  program
    .command("providers")
    .description("List providers with a registered resource factory")
    .action(() => run(() => listProviders(context, output)));

  // Raw provisioning
  program
    .command("provision")
    .description("Provision a network, storage and VM family from parameter maps")
    .requiredOption("-p, --provider <provider>", "Cloud provider (aws, azure, gcp, onpremise)")
    .option("--vm <json>", "VM parameters as a JSON object", "{}")
    .option("--network <json>", "Network parameters as a JSON object", "{}")
    .option("--storage <json>", "Storage parameters as a JSON object", "{}")
    .action((opts: ProvisionOptions) => run(() => provision(context, opts, output)));

  program
    .command("quick-provision")
    .description("Provision a single VM through the provider's provisioner")
    .requiredOption("-p, --provider <provider>", "Cloud provider")
    .option("--params <json>", "VM parameters as a JSON object", "{}")
    .action((opts: QuickProvisionOptions) => run(() => quickProvision(context, opts, output)));

  // Catalog-driven construction
  program
    .command("build")
    .description("Build a VM from the catalog, optionally overriding each section")
    .requiredOption("-p, --provider <provider>", "Cloud provider")
    .requiredOption("-t, --type <vmType>", "VM type (standard, memory_optimized, compute_optimized)")
    .requiredOption("-r, --region <region>", "Region")
    .option("-f, --flavor <flavor>", "Flavor (small, medium, large)")
    .option("--vm-config <json>", "VM config overrides as a JSON object")
    .option("--network-config <json>", "Network config overrides as a JSON object")
    .option("--storage-config <json>", "Storage config overrides as a JSON object")
    .option("--json", "Print the result as JSON")
    .action((opts: BuildOptions) => run(() => build(context, opts, output)));

  program
    .command("validate")
    .description("Check a provider, VM type, region and flavor combination without building")
    .requiredOption("-p, --provider <provider>", "Cloud provider")
    .requiredOption("-t, --type <vmType>", "VM type")
    .requiredOption("-r, --region <region>", "Region")
    .option("-f, --flavor <flavor>", "Flavor")
    .action((opts: ValidateOptions) => run(() => validate(context, opts, output)));

  program
    .command("catalog")
    .description("Show the VM types, flavors and regions of a provider")
    .requiredOption("-p, --provider <provider>", "Cloud provider")
    .option("--json", "Print the catalog as JSON")
    .action((opts: CatalogOptions) => run(() => catalog(context, opts, output)));

  // Templates
  const templates = program
    .command("templates")
    .description("VM template management");

  templates
    .command("list")
    .description("List registered templates")
    .option("-c, --category <category>", "Only templates in this category")
    .action((opts: ListTemplatesOptions) => run(() => listTemplates(context, opts, output)));

  templates
    .command("show <name>")
    .description("Show a template with its cost estimate and compatible providers")
    .option("--json", "Print the details as JSON")
    .action((name: string, opts: ShowTemplateOptions) => run(() => showTemplate(context, name, opts, output)));

  templates
    .command("create <name>")
    .description("Build a VM from a template")
    .option("-p, --provider <provider>", "Retarget the template to another provider")
    .option("-r, --region <region>", "Retarget the template to another region")
    .option("--customizations <json>", "Section overrides, region and tags as a JSON object")
    .option("--json", "Print the result as JSON")
    .action((name: string, opts: CreateFromTemplateCommandOptions) =>
      run(() => createFromTemplate(context, name, opts, output))
    );

  templates
    .command("validate <name>")
    .description("Dry-run a template against an optional provider and region")
    .option("-p, --provider <provider>", "Target provider")
    .option("-r, --region <region>", "Target region")
    .action((name: string, opts: ValidateTemplateOptions) =>
      run(() => validateTemplate(context, name, opts, output))
    );

  return program;
}
