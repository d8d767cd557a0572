import { z } from 'zod';

const OutputFormatSchema = z.enum(['console', 'csv', 'table']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const ProcessesOptionsSchema = z.object({
  served: z.boolean().default(false),
  format: OutputFormatSchema.default('console'),
  outputDir: z.string().min(1).default('reports'),
});

export const ComponentsOptionsSchema = z.object({
  format: OutputFormatSchema.default('console'),
  outputDir: z.string().min(1).default('reports'),
});

export const ReportOptionsSchema = z.object({
  report: z.enum(['1', '2'], 'Report must be 1 (process status) or 2 (component services)').default('1'),
  file: z.string().min(1),
  served: z.boolean().default(false),
  format: OutputFormatSchema.default('console'),
  outputDir: z.string().min(1).default('reports'),
});
