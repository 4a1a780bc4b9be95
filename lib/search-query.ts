/**
 * Helpers for Anki search strings.
 * Syntax reference: https://docs.ankiweb.net/searching.html
 */

export type CardState = 'isDue' | 'isNew' | 'isLearn' | 'isReview' | 'isSuspended'

export interface SearchQuery {
  toString(): string
}

/**
 * Renders a card state the way Anki spells it: camelCase split on the
 * capital, lowercased and joined with a colon.
 *
 * @example
 * cardStateQuery('isNew') // 'is:new'
 * cardStateQuery('isSuspended') // 'is:suspended'
 */
export function cardStateQuery(state: CardState): string {
  const [left, right] = state.split(/(?=[A-Z])/)
  return `${left.toLowerCase()}:${right.toLowerCase()}`
}

function quote(value: string): string {
  const escaped = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')
  return /[\s()"]/.test(value) ? `"${escaped}"` : escaped
}

/**
 * @example
 * deckQuery('Japanese::Vocab') // 'deck:Japanese::Vocab'
 * deckQuery('My Deck') // 'deck:"My Deck"'
 */
export function deckQuery(deckName: string): string {
  return `deck:${quote(deckName)}`
}

export function tagQuery(tag: string): string {
  return `tag:${quote(tag)}`
}

export function modelQuery(modelName: string): string {
  return `note:${quote(modelName)}`
}

/**
 * Joins terms with a space (Anki's implicit AND), skipping empty ones.
 *
 * @example
 * combineQueries(deckQuery('Default'), cardStateQuery('isDue')) // 'deck:Default is:due'
 */
export function combineQueries(...terms: Array<string | SearchQuery>): string {
  return terms
    .map(term => term.toString().trim())
    .filter(term => term.length > 0)
    .join(' ')
}

/**
 * Terms joined with `or`, wrapped in parentheses.
 *
 * @example
 * anyOf(tagQuery('a'), tagQuery('b')) // '(tag:a or tag:b)'
 */
export function anyOf(...terms: Array<string | SearchQuery>): string {
  const parts = terms.map(term => term.toString().trim()).filter(term => term.length > 0)
  if (parts.length <= 1) return parts.join('')
  return `(${parts.join(' or ')})`
}
