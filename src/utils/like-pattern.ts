/**
 * Escape character used in every LIKE clause built from user input
 */
export const LIKE_ESCAPE = '!'

/**
 * Builds a `%term%` LIKE pattern in which `%`, `_` and the escape character
 * itself match literally. Pair with `ESCAPE '!'`.
 */
export function containsPattern(term: string): string {
  return `%${term.replace(/[!%_]/g, (match) => `${LIKE_ESCAPE}${match}`)}%`
}
