import { createLogger, loadRuntimeConfig } from "@vmforge/core";
import type { Logger, RuntimeConfig } from "@vmforge/core";
import { VmConstructionService } from "./construction/vm-construction-service";
import { VmDirector } from "./director/vm-director";
import { ResourceFactoryRegistry } from "./providers/factory-registry";
import { VmProvisionerFactory } from "./providers/single-vm/vm-provisioner-factory";
import { ResourceProvisioningService } from "./provisioning/resource-provisioning-service";
import { registerDefaultTemplates } from "./prototype/default-templates";
import { PrototypeRegistry } from "./prototype/prototype-registry";
import { VmTemplateService } from "./prototype/vm-template-service";

export interface ProvisioningContext {
  config: RuntimeConfig;
  factories: ResourceFactoryRegistry;
  director: VmDirector;
  prototypes: PrototypeRegistry;
  provisioning: ResourceProvisioningService;
  construction: VmConstructionService;
  templates: VmTemplateService;
}

export interface ProvisioningContextOptions {
  config?: RuntimeConfig;
  /** Shared by every component; otherwise each gets its own named logger. */
  logger?: Logger;
}

/**
 * Wires one set of registries and services together. Callers own the
 * returned context; nothing here is cached between calls.
 */
export function createProvisioningContext(options: ProvisioningContextOptions = {}): ProvisioningContext {
  const config = options.config ?? loadRuntimeConfig();
  const loggerFor = (component: string): Logger =>
    options.logger ?? createLogger(component, { level: config.logLevel });

  const factories = ResourceFactoryRegistry.withBuiltinFactories();
  const director = new VmDirector({ logger: loggerFor("vm-director") });
  const prototypes = new PrototypeRegistry({ logger: loggerFor("prototype-registry") });
  if (config.seedDefaultTemplates) {
    registerDefaultTemplates(prototypes);
  }

  const provisioning = new ResourceProvisioningService(factories, {
    provisioners: VmProvisionerFactory.withBuiltinProvisioners(),
    logger: loggerFor("resource-provisioning"),
  });
  const construction = new VmConstructionService(director, factories, {
    logger: loggerFor("vm-construction"),
  });
  const templates = new VmTemplateService(prototypes, director, construction, {
    logger: loggerFor("vm-template-service"),
  });

  return { config, factories, director, prototypes, provisioning, construction, templates };
}
