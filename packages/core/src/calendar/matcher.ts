/**
 * Fuzzy event lookup by title.
 *
 * Candidates are titles containing the search text (case-insensitive).
 * Token overlap only orders candidates; it never picks one on its own.
 */

import { ValidationError } from './errors.js'
import type { CanonicalEvent } from './types.js'

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0)
}

/** Share of search tokens that appear as whole tokens of the title */
export function tokenOverlap(searchText: string, title: string): number {
  const wanted = tokenize(searchText)
  if (wanted.length === 0) return 0
  const have = new Set(tokenize(title))
  return wanted.filter((token) => have.has(token)).length / wanted.length
}

export function normalizeTitle(text: string): string {
  return text.trim().replace(/\s+/g, ' ').toLowerCase()
}

/**
 * Events whose title contains `searchText`, best token overlap first.
 * Occurrences of one recurring event collapse to the earliest.
 */
export function matchEvents(events: CanonicalEvent[], searchText: string): CanonicalEvent[] {
  const needle = normalizeTitle(searchText)
  if (!needle) {
    throw new ValidationError('Search text is required to find an event')
  }

  const seen = new Set<string>()
  const matches: Array<{ event: CanonicalEvent; score: number; index: number }> = []

  events.forEach((event, index) => {
    if (!normalizeTitle(event.title).includes(needle)) return
    const key = `${event.sourceId}\u0000${event.recurringEventId ?? event.externalEventId}`
    if (seen.has(key)) return
    seen.add(key)
    matches.push({ event, score: tokenOverlap(needle, event.title), index })
  })

  return matches
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map((match) => match.event)
}
