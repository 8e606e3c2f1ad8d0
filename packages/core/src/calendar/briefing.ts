/**
 * Briefing Composer
 *
 * Assembles a bounded-length digest: header, source warnings, today,
 * tomorrow preview, conflicts and a closing focus line. When the text is
 * over budget, whole lines are dropped from the lowest-priority section
 * first; nothing is cut mid-line.
 */

import type { LocalDate, TimeNormalizer } from './time.js'
import type { CanonicalEvent, ConflictPair } from './types.js'
import {
  formatConflictLine,
  formatEventLine,
  formatSourceWarnings,
  plural,
  type SourceLookup,
} from './format.js'

const DEFAULT_MAX_CHARS = 1200
const DEFAULT_MAX_TODAY = 10
const DEFAULT_MAX_TOMORROW = 3

export interface BriefingOptions {
  /** Local date the briefing is for */
  date: LocalDate
  maxChars?: number
  maxToday?: number
  maxTomorrow?: number
  sourceErrors?: Record<string, Error>
}

interface Layout {
  warnings: number
  today: number
  tomorrow: number
  showTomorrow: boolean
  conflicts: number
  showClosing: boolean
}

export class BriefingComposer {
  constructor(
    private time: TimeNormalizer,
    private lookup?: SourceLookup,
  ) {}

  compose(
    today: CanonicalEvent[],
    tomorrowPreview: CanonicalEvent[],
    conflicts: ConflictPair[],
    options: BriefingOptions,
  ): string {
    const maxChars = options.maxChars ?? DEFAULT_MAX_CHARS
    const warnings = formatSourceWarnings(options.sourceErrors ?? {}, this.lookup)
    const todayLines = today.map((event) => formatEventLine(event, this.time, this.lookup))
    const tomorrowLines = tomorrowPreview.map((event) => formatEventLine(event, this.time, this.lookup))
    const conflictLines = conflicts.map((pair) => formatConflictLine(pair, this.time, this.lookup))
    const tomorrowDate = this.time.addDays(options.date, 1)

    const layout: Layout = {
      warnings: warnings.length,
      today: Math.min(todayLines.length, options.maxToday ?? DEFAULT_MAX_TODAY),
      tomorrow: Math.min(tomorrowLines.length, options.maxTomorrow ?? DEFAULT_MAX_TOMORROW),
      showTomorrow: true,
      conflicts: conflictLines.length,
      showClosing: true,
    }

    const render = (): string => {
      const sections: string[][] = []

      sections.push([
        `Briefing for ${this.time.formatDayHeading(options.date)}`,
        ...warnings.slice(0, layout.warnings),
      ])

      sections.push(
        todayLines.length === 0
          ? ['Today: no events.']
          : [
              `Today (${plural(todayLines.length, 'event')}):`,
              ...bounded(todayLines, layout.today),
            ],
      )

      if (layout.showTomorrow) {
        const heading = `Tomorrow (${this.time.formatDayHeading(tomorrowDate)})`
        sections.push(
          tomorrowLines.length === 0
            ? [`${heading}: clear.`]
            : [`${heading}:`, ...bounded(tomorrowLines, layout.tomorrow)],
        )
      }

      if (conflictLines.length > 0) {
        sections.push([`Conflicts (${conflictLines.length}):`, ...bounded(conflictLines, layout.conflicts)])
      }

      if (layout.showClosing) {
        sections.push([this.closingLine(today, conflicts)])
      }

      return sections.map((lines) => lines.join('\n')).join('\n\n')
    }

    let text = render()
    while (text.length > maxChars && shrink(layout)) {
      text = render()
    }

    return text.length <= maxChars ? text : cutAtLine(text, maxChars)
  }

  private closingLine(today: CanonicalEvent[], conflicts: ConflictPair[]): string {
    if (conflicts.length > 0) {
      return `Focus: resolve ${plural(conflicts.length, 'conflict')} before the day gets going.`
    }
    if (today.length === 0) {
      return 'Focus: open day, good for deep work and planning.'
    }
    const firstTimed = today.find((event) => !event.allDay)
    return firstTimed
      ? `Focus: ${plural(today.length, 'commitment')} today, first at ${this.time.formatTime(firstTimed.start)}.`
      : `Focus: ${plural(today.length, 'commitment')} today.`
  }
}

function bounded(lines: string[], shown: number): string[] {
  const hidden = lines.length - shown
  return hidden > 0 ? [...lines.slice(0, shown), `…and ${hidden} more`] : lines
}

/** Drop one line from the lowest-priority section that still has one */
function shrink(layout: Layout): boolean {
  if (layout.showTomorrow && layout.tomorrow > 0) {
    layout.tomorrow--
  } else if (layout.showTomorrow) {
    layout.showTomorrow = false
  } else if (layout.showClosing) {
    layout.showClosing = false
  } else if (layout.conflicts > 0) {
    layout.conflicts--
  } else if (layout.today > 0) {
    layout.today--
  } else if (layout.warnings > 0) {
    layout.warnings--
  } else {
    return false
  }
  return true
}

/** Last resort for tiny budgets: keep the whole lines that fit */
function cutAtLine(text: string, maxChars: number): string {
  const kept: string[] = []
  let length = 0
  for (const line of text.split('\n')) {
    const next = length + (kept.length > 0 ? 1 : 0) + line.length
    if (next > maxChars) break
    kept.push(line)
    length = next
  }
  if (kept.length > 0) {
    return kept.join('\n').trimEnd()
  }
  return `${text.slice(0, Math.max(0, maxChars - 1))}…`
}
