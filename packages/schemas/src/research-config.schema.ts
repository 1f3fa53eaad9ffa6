import { z } from 'zod';

const ReportTypeSchema = z.enum(['research_report', 'resource_report', 'outline_report']);

export const ResearchConfigSchema = z.object({
  $schema: z.string().optional(),
  maxQueries: z.number().int().min(1).max(5).default(3),
  concurrency: z.number().int().min(1).max(10).default(3),
  maxSourceChars: z.number().int().min(200).default(2000),
  maxSummaryChars: z.number().int().min(500).default(6000),
  requestTimeoutMs: z.number().int().min(1000).default(30000),
  reportType: ReportTypeSchema.default('research_report'),
});

export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;
