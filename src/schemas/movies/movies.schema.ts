import { ErrorSchema } from '@schemas/common/error.schema.js'
import { z } from 'zod'

const TCONST_PATTERN = /^tt\d+$/
const NCONST_PATTERN = /^nm\d+$/

export const MovieSearchQuerySchema = z.object({
  q: z.string().max(200).default(''),
  limit: z.coerce.number().int().min(1).max(200).optional(),
})

export const MovieParamsSchema = z.object({
  tconst: z
    .string()
    .regex(TCONST_PATTERN, 'Expected an IMDb title id such as tt0000001'),
})

export const RatingSchema = z.object({
  averageRating: z.number().nullable(),
  numVotes: z.number().int().nullable(),
})

export const MovieSummarySchema = z.object({
  tconst: z.string().regex(TCONST_PATTERN),
  titleType: z.string(),
  primaryTitle: z.string(),
  originalTitle: z.string(),
  startYear: z.number().int().nullable(),
  runtimeMinutes: z.number().int().nullable(),
  genres: z.array(z.string()),
  rating: RatingSchema.nullable(),
})

export const MovieCreditSchema = z.object({
  nconst: z.string().regex(NCONST_PATTERN),
  name: z.string(),
  ordering: z.number().int(),
  category: z.string(),
  job: z.string().nullable(),
  characters: z.array(z.string()),
})

export const MovieDetailSchema = MovieSummarySchema.extend({
  isAdult: z.boolean(),
  endYear: z.number().int().nullable(),
  directors: z.array(MovieCreditSchema),
  actors: z.array(MovieCreditSchema),
})

export const MovieSearchResponseSchema = z.object({
  success: z.boolean(),
  query: z.string(),
  count: z.number().int(),
  movies: z.array(MovieSummarySchema),
})

export const MovieDetailResponseSchema = z.object({
  success: z.boolean(),
  movie: MovieDetailSchema,
})

export type MovieSearchQuery = z.infer<typeof MovieSearchQuerySchema>
export type MovieParams = z.infer<typeof MovieParamsSchema>
export type MovieSearchResponse = z.infer<typeof MovieSearchResponseSchema>
export type MovieDetailResponse = z.infer<typeof MovieDetailResponseSchema>

export { ErrorSchema }
