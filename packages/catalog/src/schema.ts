import { z } from 'zod';

export const TemplateSchema = z.object({
  provider: z.string().min(1),
  defaults: z.record(z.string(), z.unknown()).default({}),
  required_fields: z.array(z.string()).default([]),
  popular: z.boolean().default(false),
  description: z.string().default(''),
});

export const CatalogSchema = z.record(z.string(), TemplateSchema);

export type CatalogFile = z.infer<typeof CatalogSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
