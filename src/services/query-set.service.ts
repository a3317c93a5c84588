/**
 * Query Set Service
 *
 * Produces a file of movie titles for load-testing title search. Titles are
 * drawn with replacement, each rated movie weighted by its vote count, so
 * popular titles appear about as often as people would search for them.
 */
import { mkdir, writeFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { QuerySetError } from '@root/types/errors.js'
import type { DatabaseService } from '@services/database.service.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export const DEFAULT_QUERY_COUNT = 10_000
export const DEFAULT_QUERY_SET_PATH = 'queries.txt'

/**
 * Uniform random number in [0, 1), like Math.random
 */
export type RandomSource = () => number

export interface QuerySetOptions {
  output?: string
  count?: number
}

export interface QuerySetResult {
  outputPath: string
  count: number
  /** Distinct rated movies that could be drawn */
  candidates: number
}

/**
 * Draws `count` items with replacement, each with probability proportional
 * to its weight.
 */
export function sampleWeighted<T>(
  items: readonly T[],
  weights: readonly number[],
  count: number,
  random: RandomSource = Math.random,
): T[] {
  if (items.length !== weights.length) {
    throw new QuerySetError('Items and weights must have the same length')
  }

  const cumulative: number[] = []
  let total = 0
  for (const weight of weights) {
    total += weight > 0 ? weight : 0
    cumulative.push(total)
  }
  if (total <= 0) {
    throw new QuerySetError('Cannot sample without a positive weight')
  }

  const picks: T[] = []
  for (let i = 0; i < count; i++) {
    const target = random() * total
    // first index whose running total exceeds the target
    let low = 0
    let high = cumulative.length - 1
    while (low < high) {
      const mid = (low + high) >>> 1
      if (cumulative[mid] > target) {
        high = mid
      } else {
        low = mid + 1
      }
    }
    picks.push(items[low])
  }
  return picks
}

export class QuerySetService {
  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'QUERY_SET')
  }

  constructor(
    private readonly db: DatabaseService,
    private readonly baseLog: FastifyBaseLogger,
    private readonly random: RandomSource = Math.random,
  ) {}

  /**
   * Samples titles weighted by votes and writes them one per line.
   *
   * @throws {QuerySetError} When no movie has a rating with votes
   */
  async generate(options: QuerySetOptions = {}): Promise<QuerySetResult> {
    const count = options.count ?? DEFAULT_QUERY_COUNT
    if (!Number.isInteger(count) || count < 1) {
      throw new QuerySetError(
        `Query count must be a positive integer, got ${count}`,
      )
    }
    const outputPath = resolve(options.output ?? DEFAULT_QUERY_SET_PATH)

    const rows = (await this.db.getVoteWeightedTitles()).filter(
      (row) => row.primary_title.trim() !== '',
    )
    if (rows.length === 0) {
      throw new QuerySetError(
        'No rated movies with votes found. Import the IMDb datasets first.',
      )
    }
    this.log.info(`Sampling ${count} queries from ${rows.length} rated movies`)

    const titles = sampleWeighted(
      rows.map((row) => row.primary_title),
      rows.map((row) => row.num_votes),
      count,
      this.random,
    )

    await mkdir(dirname(outputPath), { recursive: true })
    await writeFile(
      outputPath,
      titles.map((title) => `${title}\n`).join(''),
      'utf8',
    )
    this.log.info(`Wrote ${titles.length} queries to ${outputPath}`)

    return { outputPath, count: titles.length, candidates: rows.length }
  }
}
