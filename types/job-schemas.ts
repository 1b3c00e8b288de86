/**
 * Batch Option Schemas with Zod Validation
 *
 * Handlers validate their options with these schemas before touching the
 * filesystem, so a bad CLI flag fails fast instead of per file.
 */

import { z } from 'zod'
import { InvalidOptionsError } from '../lib/errors.js'

/** 0 means "use available hardware parallelism" */
const ThreadsSchema = z.number().int().min(0).default(0)

const ScriptsSchema = z.array(z.string().min(1)).default(['latin', 'greek'])

/**
 * Used in: handlers/batch-clean.ts
 */
export const BatchCleanOptionsSchema = z.object({
  inputDir: z.string().min(1),
  outputDir: z.string().min(1),
  scripts: ScriptsSchema,
  threads: ThreadsSchema,
})

export type BatchCleanOptions = z.input<typeof BatchCleanOptionsSchema>

/**
 * Used in: handlers/analysis-report.ts
 * At least one of reportCsv / outputDir must be set, otherwise there is nothing to do.
 */
export const AnalysisReportOptionsSchema = z.object({
  inputDir: z.string().min(1),
  reportCsv: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  scripts: ScriptsSchema,
  threads: ThreadsSchema,
}).refine(
  options => options.reportCsv !== undefined || options.outputDir !== undefined,
  { message: 'reportCsv or outputDir is required' }
)

export type AnalysisReportOptions = z.input<typeof AnalysisReportOptionsSchema>

/**
 * Used in: handlers/table-report.ts (summary and detailed variants)
 */
export const TableReportOptionsSchema = z.object({
  inputDir: z.string().min(1),
  outputCsv: z.string().min(1),
  threads: ThreadsSchema,
})

export type TableReportOptions = z.input<typeof TableReportOptionsSchema>

/**
 * Used in: handlers/full-pipeline.ts
 */
export const FullPipelineOptionsSchema = z.object({
  inputDir: z.string().min(1),
  finalOutputDir: z.string().min(1),
  reportCsv: z.string().min(1),
  tableReportCsv: z.string().min(1).optional(),
  scripts: ScriptsSchema,
  threads: ThreadsSchema,
})

export type FullPipelineOptions = z.input<typeof FullPipelineOptionsSchema>

/**
 * Outcome of one batch run.
 */
export const BatchSummarySchema = z.object({
  status: z.enum(['completed', 'empty']),
  message: z.string(),
  totalFilesFound: z.number().int().min(0),
  filesProcessed: z.number().int().min(0),
  filesWithErrors: z.number().int().min(0),
  errors: z.array(z.object({
    file: z.string(),
    errorType: z.enum(['read', 'write', 'processing']),
    message: z.string(),
  })),
})

export type BatchSummary = z.infer<typeof BatchSummarySchema>

/**
 * Parses options with `schema`, turning zod issues into InvalidOptionsError.
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input)
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    )
  }
  return parsed.data
}
