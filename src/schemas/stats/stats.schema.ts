import { ErrorSchema } from '@schemas/common/error.schema.js'
import { z } from 'zod'

export const DatasetStatsSchema = z.object({
  processed: z.number().int(),
  inserted: z.number().int(),
  skippedMalformed: z.number().int(),
  skippedMissingReference: z.number().int(),
  failed: z.number().int(),
})

export const ImportSummarySchema = z.object({
  people: DatasetStatsSchema,
  movies: DatasetStatsSchema,
  ratings: DatasetStatsSchema,
  principals: DatasetStatsSchema,
})

export const ImportRunSchema = z.object({
  id: z.number().int(),
  directory: z.string(),
  status: z.enum(['running', 'completed', 'failed']),
  startedAt: z.string(),
  finishedAt: z.string().nullable(),
  summary: ImportSummarySchema.nullable(),
  error: z.string().nullable(),
})

export const DatasetStatsResponseSchema = z.object({
  success: z.boolean(),
  stats: z.object({
    counts: z.object({
      people: z.number().int(),
      movies: z.number().int(),
      ratings: z.number().int(),
      principals: z.number().int(),
    }),
    lastImport: ImportRunSchema.nullable(),
  }),
})

export type DatasetStatsResponse = z.infer<typeof DatasetStatsResponseSchema>

export { ErrorSchema }
