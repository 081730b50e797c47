import { z } from "zod";
import { Provider, VMType } from "@vmforge/core";
import bundledCatalog from "./vm-catalog.json";

export const VmFlavorSchema = z.object({
  sku: z.string().min(1),
  vcpus: z.number().int().positive(),
  memoryGb: z.number().int().positive(),
});

export type VmFlavor = z.infer<typeof VmFlavorSchema>;

export const VmTypeCatalogEntrySchema = z
  .object({
    defaultFlavor: z.string().min(1),
    flavors: z.record(VmFlavorSchema),
  })
  .refine((entry) => Object.hasOwn(entry.flavors, entry.defaultFlavor), {
    message: "defaultFlavor must name one of the entry's flavors",
    path: ["defaultFlavor"],
  });

export type VmTypeCatalogEntry = z.infer<typeof VmTypeCatalogEntrySchema>;

/** provider -> vm type -> flavors. Read-only once loaded. */
export const VmCatalogSchema = z.record(Provider, z.record(VMType, VmTypeCatalogEntrySchema));

export type VmCatalog = z.infer<typeof VmCatalogSchema>;

export function loadVmCatalog(data: unknown = bundledCatalog): VmCatalog {
  return VmCatalogSchema.parse(data);
}
