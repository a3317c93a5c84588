import { InvalidArgumentError } from 'commander'

/**
 * Commander argument parser for options that take a count or size.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (
    !/^\d+$/.test(value.trim()) ||
    !Number.isSafeInteger(parsed) ||
    parsed < 1
  ) {
    throw new InvalidArgumentError('Must be a positive integer')
  }
  return parsed
}
