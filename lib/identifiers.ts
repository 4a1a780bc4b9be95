import { InvalidIdentifierError } from './errors.js'

/**
 * Remote-assigned id (note, deck or model id).
 *
 * AnkiConnect ids are millisecond timestamps, well inside the safe integer
 * range, so they travel as plain JSON numbers.
 */
export type AnkiId = number

export type IdentifierInput = number | bigint | string

const DECIMAL = /^\d+$/

/**
 * Normalizes an id to a non-negative safe integer.
 *
 * @throws {InvalidIdentifierError} for fractions, negatives, NaN, values past
 * `Number.MAX_SAFE_INTEGER`, or strings that are not plain decimal digits
 *
 * @example
 * toAnkiId('1483959289817') // 1483959289817
 * toAnkiId(12n) // 12
 * toAnkiId(-1) // throws
 */
export function toAnkiId(raw: IdentifierInput): AnkiId {
  let value: number

  if (typeof raw === 'number') {
    value = raw
  } else if (typeof raw === 'bigint') {
    if (raw < 0n || raw > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new InvalidIdentifierError(raw)
    }
    value = Number(raw)
  } else {
    const trimmed = raw.trim()
    if (!DECIMAL.test(trimmed)) {
      throw new InvalidIdentifierError(raw)
    }
    value = Number(trimmed)
  }

  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidIdentifierError(raw)
  }
  return value
}

export function toAnkiIds(raws: Iterable<IdentifierInput>): AnkiId[] {
  return Array.from(raws, toAnkiId)
}
