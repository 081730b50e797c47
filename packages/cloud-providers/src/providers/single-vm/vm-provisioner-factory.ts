import { NotFoundError } from "@vmforge/core";
import {
  AwsVmProvisioner,
  AzureVmProvisioner,
  GcpVmProvisioner,
  OnPremiseVmProvisioner,
} from "./vm-provisioners";
import type { VmProvisioner } from "./vm-provisioners";

export type VmProvisionerCreator = () => VmProvisioner;

/**
 * Factory Method entry point: picks the single-VM provisioner for a provider
 * name without the caller naming a concrete class.
 */
export class VmProvisionerFactory {
  private creators: Map<string, VmProvisionerCreator> = new Map();

  static withBuiltinProvisioners(): VmProvisionerFactory {
    const factory = new VmProvisionerFactory();
    factory.registerProvisioner("aws", () => new AwsVmProvisioner());
    factory.registerProvisioner("azure", () => new AzureVmProvisioner());
    factory.registerProvisioner("gcp", () => new GcpVmProvisioner());
    factory.registerProvisioner("onpremise", () => new OnPremiseVmProvisioner());
    return factory;
  }

  createProvisioner(providerName: string): VmProvisioner {
    const create = this.creators.get(providerName.toLowerCase());
    if (!create) {
      throw new NotFoundError(`Unsupported provider '${providerName}'`);
    }
    return create();
  }

  registerProvisioner(providerName: string, create: VmProvisionerCreator): void {
    this.creators.set(providerName.toLowerCase(), create);
  }

  getSupportedProviders(): string[] {
    return Array.from(this.creators.keys());
  }
}
