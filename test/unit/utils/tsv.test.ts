import {
  getField,
  MissingColumnsError,
  parseCharacters,
  parseDecimal,
  parseHeader,
  parseInteger,
  parseList,
  splitTsvLine,
} from '@utils/tsv.js'
import { describe, expect, it } from 'vitest'

describe('tsv', () => {
  describe('splitTsvLine', () => {
    it('should split on tabs and keep empty fields', () => {
      expect(splitTsvLine('a\t\tc')).toEqual(['a', '', 'c'])
    })

    it('should drop a trailing carriage return', () => {
      expect(splitTsvLine('tt0000001\t5.6\t1645\r')).toEqual([
        'tt0000001',
        '5.6',
        '1645',
      ])
    })
  })

  describe('parseHeader', () => {
    it('should index columns by name', () => {
      const header = parseHeader('tconst\taverageRating\tnumVotes', [
        'tconst',
        'numVotes',
      ])

      expect(header.width).toBe(3)
      expect(header.requiredWidth).toBe(3)
      expect(header.positions.get('tconst')).toBe(0)
      expect(header.positions.get('numVotes')).toBe(2)
    })

    it('should size the required width by the last required column', () => {
      const header = parseHeader('tconst\ttitleType\tprimaryTitle\tgenres', [
        'tconst',
        'primaryTitle',
      ])

      expect(header.width).toBe(4)
      expect(header.requiredWidth).toBe(3)
    })

    it('should throw listing every missing required column', () => {
      expect(() =>
        parseHeader('tconst\ttitleType', ['tconst', 'primaryTitle', 'genres']),
      ).toThrow(
        new MissingColumnsError(['primaryTitle', 'genres']),
      )
    })

    it('should expose the missing columns on the error', () => {
      try {
        parseHeader('nconst', ['nconst', 'primaryName'])
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(MissingColumnsError)
        if (error instanceof MissingColumnsError) {
          expect(error.columns).toEqual(['primaryName'])
          expect(error.message).toBe(
            'Header is missing required column(s): primaryName',
          )
        }
      }
    })
  })

  describe('getField', () => {
    const header = parseHeader('tconst\truntimeMinutes', [])

    it('should return the value at the column position', () => {
      expect(getField(['tt0000001', '90'], header, 'runtimeMinutes')).toBe('90')
    })

    it('should treat \\N as missing', () => {
      expect(getField(['tt0000001', '\\N'], header, 'runtimeMinutes')).toBe(
        null,
      )
    })

    it('should return null for unknown columns and short rows', () => {
      expect(getField(['tt0000001', '90'], header, 'genres')).toBeNull()
      expect(getField(['tt0000001'], header, 'runtimeMinutes')).toBeNull()
    })
  })

  describe('parseInteger', () => {
    it('should parse base-10 integers', () => {
      expect(parseInteger('1856')).toBe(1856)
      expect(parseInteger(' -12 ')).toBe(-12)
    })

    it('should reject non-integers', () => {
      expect(parseInteger(null)).toBeNull()
      expect(parseInteger('12.5')).toBeNull()
      expect(parseInteger('abc')).toBeNull()
      expect(parseInteger('')).toBeNull()
      expect(parseInteger('99999999999999999999')).toBeNull()
    })
  })

  describe('parseDecimal', () => {
    it('should parse decimals', () => {
      expect(parseDecimal('7.5')).toBe(7.5)
      expect(parseDecimal('10')).toBe(10)
      expect(parseDecimal('.5')).toBe(0.5)
    })

    it('should reject anything else', () => {
      expect(parseDecimal(null)).toBeNull()
      expect(parseDecimal('7,5')).toBeNull()
      expect(parseDecimal('high')).toBeNull()
    })
  })

  describe('parseList', () => {
    it('should split, trim and dedupe in first-seen order', () => {
      expect(parseList('Drama, Comedy,,Drama')).toEqual(['Drama', 'Comedy'])
    })

    it('should return an empty list for null', () => {
      expect(parseList(null)).toEqual([])
    })
  })

  describe('parseCharacters', () => {
    it('should parse a JSON array', () => {
      expect(parseCharacters('["Self","Host"]')).toEqual(['Self', 'Host'])
    })

    it('should stringify non-string members', () => {
      expect(parseCharacters('["Agent", 47]')).toEqual(['Agent', '47'])
    })

    it('should keep text that is not a JSON array as a single entry', () => {
      expect(parseCharacters('The Stranger')).toEqual(['The Stranger'])
      expect(parseCharacters('{"name":"x"}')).toEqual(['{"name":"x"}'])
    })

    it('should return null for missing values', () => {
      expect(parseCharacters(null)).toBeNull()
      expect(parseCharacters('')).toBeNull()
    })
  })
})
