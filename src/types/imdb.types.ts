/**
 * Sentinel IMDb uses in its TSV datasets for a missing value
 */
export const IMDB_NULL = '\\N'

/**
 * Type-safe IMDb title constant (e.g., "tt1234567")
 */
export type Tconst = `tt${string}`

/**
 * Type-safe IMDb name constant (e.g., "nm0000001")
 */
export type Nconst = `nm${string}`

export function isTconst(value: string): value is Tconst {
  return /^tt\d+$/.test(value)
}

export function isNconst(value: string): value is Nconst {
  return /^nm\d+$/.test(value)
}

/**
 * Principal categories rendered as cast on the detail view
 */
export const ACTOR_CATEGORIES = ['actor', 'actress', 'self'] as const

export const DIRECTOR_CATEGORY = 'director'

//=============================================================================
// INSERT SHAPES
//=============================================================================

/**
 * Insert type for the people table (name.basics)
 */
export interface InsertPerson {
  nconst: Nconst
  primary_name: string
  birth_year: number | null
  death_year: number | null
  primary_professions: string[]
}

/**
 * Insert type for the movies table (title.basics)
 */
export interface InsertMovie {
  tconst: Tconst
  title_type: string
  primary_title: string
  original_title: string
  is_adult: boolean
  start_year: number | null
  end_year: number | null
  runtime_minutes: number | null
  genres: string[]
}

/**
 * Insert type for the ratings table (title.ratings)
 */
export interface InsertRating {
  tconst: Tconst
  average_rating: number | null
  num_votes: number | null
}

/**
 * Insert type for the principals table (title.principals)
 */
export interface InsertPrincipal {
  tconst: Tconst
  nconst: Nconst
  ordering: number
  category: string
  job: string | null
  characters: string[] | null
}

//=============================================================================
// LOOKUP SHAPES
//=============================================================================

export interface RatingLookup {
  averageRating: number | null
  numVotes: number | null
}

export interface MovieSummary {
  tconst: Tconst
  titleType: string
  primaryTitle: string
  originalTitle: string
  startYear: number | null
  runtimeMinutes: number | null
  genres: string[]
  rating: RatingLookup | null
}

export interface MovieCredit {
  nconst: Nconst
  name: string
  ordering: number
  category: string
  job: string | null
  characters: string[]
}

export interface MovieDetail extends MovieSummary {
  isAdult: boolean
  endYear: number | null
  directors: MovieCredit[]
  actors: MovieCredit[]
}

export interface PersonLookup {
  nconst: Nconst
  primaryName: string
  birthYear: number | null
  deathYear: number | null
  primaryProfessions: string[]
}

export interface DatasetCounts {
  people: number
  movies: number
  ratings: number
  principals: number
}
