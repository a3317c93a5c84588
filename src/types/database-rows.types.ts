/**
 * Raw row shapes as returned by the database driver.
 *
 * SQLite stores booleans as 0/1; JSON columns arrive as strings on both
 * SQLite and PostgreSQL (see configurePgTypes).
 */

export interface PersonRow {
  nconst: string
  primary_name: string
  birth_year: number | null
  death_year: number | null
  primary_professions: string | null
}

export interface MovieRow {
  tconst: string
  title_type: string
  primary_title: string
  original_title: string
  is_adult: boolean | number
  start_year: number | null
  end_year: number | null
  runtime_minutes: number | null
  genres: string | null
}

export interface RatingRow {
  tconst: string
  average_rating: number | null
  num_votes: number | null
}

export interface PrincipalRow {
  id: number
  tconst: string
  nconst: string
  ordering: number
  category: string
  job: string | null
  characters: string | null
}

/**
 * Movie joined with its optional rating. `rating_tconst` is null when no
 * rating row exists.
 */
export interface MovieWithRatingRow extends MovieRow {
  rating_tconst: string | null
  average_rating: number | null
  num_votes: number | null
}

export interface CreditRow {
  nconst: string
  primary_name: string
  ordering: number
  category: string
  job: string | null
  characters: string | null
}

export interface WeightedTitleRow {
  primary_title: string
  num_votes: number
}
