import { z } from "zod";
import { VMSpecificationSchema } from "@vmforge/core";
import type { PrototypeRegistry } from "./prototype-registry";
import { TemplateTagsSchema, VmTemplatePrototype } from "./vm-prototype";
import defaultTemplates from "./default-templates.json";

export const TemplateDefinitionSchema = z.object({
  templateName: z.string().min(1),
  description: z.string(),
  category: z.string().min(1),
  tags: TemplateTagsSchema.default({}),
  vmSpecification: VMSpecificationSchema,
});

export type TemplateDefinition = z.infer<typeof TemplateDefinitionSchema>;

export function loadTemplateDefinitions(data: unknown = defaultTemplates): TemplateDefinition[] {
  return z.array(TemplateDefinitionSchema).parse(data);
}

/** Seeds the bundled templates. Returns how many were newly registered. */
export function registerDefaultTemplates(registry: PrototypeRegistry): number {
  let registered = 0;
  for (const definition of loadTemplateDefinitions()) {
    const prototype = new VmTemplatePrototype(definition);
    if (registry.register(definition.templateName, prototype)) {
      registered += 1;
    }
  }
  return registered;
}
