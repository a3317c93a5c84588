import type {
  InsertMovie,
  InsertPerson,
  InsertPrincipal,
  InsertRating,
} from '@root/types/imdb.types.js'
import { isNconst, isTconst } from '@root/types/imdb.types.js'
import {
  getField,
  parseCharacters,
  parseDecimal,
  parseInteger,
  parseList,
  type TsvHeader,
} from '@utils/tsv.js'

/**
 * Outcome of mapping one data line: either an insertable row or the reason
 * the line was rejected.
 */
export type RowResult<T> = { row: T } | { skip: string }

export type RowMapper<T> = (
  fields: readonly string[],
  header: TsvHeader,
) => RowResult<T>

const MAX_RATING = 10

// Trailing optional columns may be absent; getField reads them as null
function checkWidth(
  fields: readonly string[],
  header: TsvHeader,
): string | null {
  return fields.length < header.requiredWidth
    ? `expected at least ${header.requiredWidth} fields, found ${fields.length}`
    : null
}

/**
 * name.basics → people
 */
export const mapPersonRow: RowMapper<InsertPerson> = (fields, header) => {
  const widthProblem = checkWidth(fields, header)
  if (widthProblem) return { skip: widthProblem }

  const nconst = getField(fields, header, 'nconst')
  if (nconst === null || !isNconst(nconst)) {
    return { skip: `invalid nconst ${JSON.stringify(nconst)}` }
  }

  const primaryName = getField(fields, header, 'primaryName')
  if (!primaryName) return { skip: 'missing primaryName' }

  return {
    row: {
      nconst,
      primary_name: primaryName,
      birth_year: parseInteger(getField(fields, header, 'birthYear')),
      death_year: parseInteger(getField(fields, header, 'deathYear')),
      primary_professions: parseList(
        getField(fields, header, 'primaryProfession'),
      ),
    },
  }
}

/**
 * title.basics → movies
 */
export const mapMovieRow: RowMapper<InsertMovie> = (fields, header) => {
  const widthProblem = checkWidth(fields, header)
  if (widthProblem) return { skip: widthProblem }

  const tconst = getField(fields, header, 'tconst')
  if (tconst === null || !isTconst(tconst)) {
    return { skip: `invalid tconst ${JSON.stringify(tconst)}` }
  }

  const titleType = getField(fields, header, 'titleType')
  if (!titleType) return { skip: 'missing titleType' }

  const primaryTitle = getField(fields, header, 'primaryTitle')
  if (!primaryTitle) return { skip: 'missing primaryTitle' }

  return {
    row: {
      tconst,
      title_type: titleType,
      primary_title: primaryTitle,
      original_title: getField(fields, header, 'originalTitle') || primaryTitle,
      is_adult: getField(fields, header, 'isAdult') === '1',
      start_year: parseInteger(getField(fields, header, 'startYear')),
      end_year: parseInteger(getField(fields, header, 'endYear')),
      runtime_minutes: parseInteger(getField(fields, header, 'runtimeMinutes')),
      genres: parseList(getField(fields, header, 'genres')),
    },
  }
}

/**
 * title.ratings → ratings
 */
export const mapRatingRow: RowMapper<InsertRating> = (fields, header) => {
  const widthProblem = checkWidth(fields, header)
  if (widthProblem) return { skip: widthProblem }

  const tconst = getField(fields, header, 'tconst')
  if (tconst === null || !isTconst(tconst)) {
    return { skip: `invalid tconst ${JSON.stringify(tconst)}` }
  }

  const rating = parseDecimal(getField(fields, header, 'averageRating'))
  const votes = parseInteger(getField(fields, header, 'numVotes'))

  return {
    row: {
      tconst,
      average_rating:
        rating !== null && rating >= 0 && rating <= MAX_RATING ? rating : null,
      num_votes: votes !== null && votes >= 0 ? votes : null,
    },
  }
}

/**
 * title.principals → principals
 */
export const mapPrincipalRow: RowMapper<InsertPrincipal> = (
  fields,
  header,
) => {
  const widthProblem = checkWidth(fields, header)
  if (widthProblem) return { skip: widthProblem }

  const tconst = getField(fields, header, 'tconst')
  if (tconst === null || !isTconst(tconst)) {
    return { skip: `invalid tconst ${JSON.stringify(tconst)}` }
  }

  const nconst = getField(fields, header, 'nconst')
  if (nconst === null || !isNconst(nconst)) {
    return { skip: `invalid nconst ${JSON.stringify(nconst)}` }
  }

  const ordering = parseInteger(getField(fields, header, 'ordering'))
  if (ordering === null) return { skip: 'missing ordering' }

  const category = getField(fields, header, 'category')
  if (!category) return { skip: 'missing category' }

  return {
    row: {
      tconst,
      nconst,
      ordering,
      category,
      job: getField(fields, header, 'job'),
      characters: parseCharacters(getField(fields, header, 'characters')),
    },
  }
}
