import { toAnkiId, toAnkiIds } from '../identifiers'
import { InvalidIdentifierError } from '../errors'

describe('toAnkiId', () => {
  it('accepts non-negative safe integers', () => {
    expect(toAnkiId(0)).toBe(0)
    expect(toAnkiId(1483959289817)).toBe(1483959289817)
  })

  it('accepts bigint inside the safe range', () => {
    expect(toAnkiId(1483959291695n)).toBe(1483959291695)
  })

  it('accepts decimal strings, ignoring surrounding whitespace', () => {
    expect(toAnkiId('1483959289817')).toBe(1483959289817)
    expect(toAnkiId(' 42 ')).toBe(42)
  })

  it.each([
    ['negative number', -1],
    ['fraction', 1.5],
    ['NaN', Number.NaN],
    ['past MAX_SAFE_INTEGER', Number.MAX_SAFE_INTEGER + 1],
    ['negative bigint', -1n],
    ['huge bigint', 2n ** 63n],
    ['empty string', ''],
    ['signed string', '-5'],
    ['hex string', '0x10'],
    ['exponent string', '1e3']
  ])('rejects %s', (_label, raw) => {
    expect(() => toAnkiId(raw)).toThrow(InvalidIdentifierError)
  })

  it('keeps the raw input on the error', () => {
    try {
      toAnkiId('abc')
      throw new Error('expected toAnkiId to throw')
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidIdentifierError)
      if (error instanceof InvalidIdentifierError) {
        expect(error.raw).toBe('abc')
      }
    }
  })
})

describe('toAnkiIds', () => {
  it('normalizes every element in order', () => {
    expect(toAnkiIds([3, '2', 1n])).toEqual([3, 2, 1])
  })

  it('fails on the first bad element', () => {
    expect(() => toAnkiIds([1, 'x', 3])).toThrow('Invalid identifier: "x"')
  })
})
