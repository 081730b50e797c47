import { NotFoundError } from "@vmforge/core";
import type { CloudResourceFactory, CloudResourceFactoryClass } from "../interface/resources";
import { AwsResourceFactory } from "./aws/aws-resource-factory";
import { AzureResourceFactory } from "./azure/azure-resource-factory";
import { GcpResourceFactory } from "./gcp/gcp-resource-factory";
import { OnPremiseResourceFactory } from "./onpremise/onpremise-resource-factory";

/**
 * Maps provider names to resource-family factories. Lookups are
 * case-insensitive; new providers can be registered at runtime.
 */
export class ResourceFactoryRegistry {
  private factories: Map<string, CloudResourceFactoryClass> = new Map();

  static withBuiltinFactories(): ResourceFactoryRegistry {
    const registry = new ResourceFactoryRegistry();
    registry.registerFactory("aws", AwsResourceFactory);
    registry.registerFactory("azure", AzureResourceFactory);
    registry.registerFactory("gcp", GcpResourceFactory);
    registry.registerFactory("onpremise", OnPremiseResourceFactory);
    return registry;
  }

  getFactory(providerName: string): CloudResourceFactory {
    const factoryClass = this.factories.get(providerName.toLowerCase());
    if (!factoryClass) {
      throw new NotFoundError(`Unsupported provider '${providerName}'`, [
        `Supported providers: ${this.getSupportedProviders().join(", ")}`,
      ]);
    }
    return new factoryClass();
  }

  registerFactory(providerName: string, factoryClass: CloudResourceFactoryClass): void {
    this.factories.set(providerName.toLowerCase(), factoryClass);
  }

  hasFactory(providerName: string): boolean {
    return this.factories.has(providerName.toLowerCase());
  }

  getSupportedProviders(): string[] {
    return Array.from(this.factories.keys());
  }
}
