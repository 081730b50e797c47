import type { ProvisioningContext } from "@vmforge/cloud-providers";
import type { IOutputService } from "../interfaces/output.interface";

export function listProviders(context: ProvisioningContext, output: IOutputService): number {
  output.header("Supported providers", "☁");
  output.newline();

  const catalogProviders: string[] = context.director.getCatalogProviders();
  for (const name of context.factories.getSupportedProviders()) {
    const displayName = context.factories.getFactory(name).getProviderName();
    const suffix = catalogProviders.includes(name) ? "" : " (no catalog)";
    output.field(name, `${displayName}${suffix}`);
  }
  return 0;
}
