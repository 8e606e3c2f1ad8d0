/**
 * Command-line surface: one-shot commands mapped onto calendar requests.
 */

export const USAGE = `Usage:
  daybook briefing [date]
  daybook schedule [date]
  daybook upcoming [days]
  daybook free <minutes> [date]
  daybook conflicts [date]
  daybook sources
  daybook                      (REPL: one JSON request per line, e.g. {"action":"GetSchedule","args":{}})`

/**
 * Map a one-shot command line to an `{action, args}` request
 */
export function commandToRequest(args: string[]): unknown {
  const [command, first, second] = args
  switch (command) {
    case 'briefing':
      return { action: 'GetBriefing', args: first ? { date: first } : {} }
    case 'schedule':
      return { action: 'GetSchedule', args: first ? { date: first } : {} }
    case 'upcoming':
      return { action: 'GetUpcoming', args: first ? { days: Number(first) } : {} }
    case 'free':
      return {
        action: 'FindFreeTime',
        args: second ? { durationMinutes: Number(first), date: second } : { durationMinutes: Number(first) },
      }
    case 'conflicts':
      return { action: 'GetConflicts', args: first ? { date: first } : {} }
    case 'sources':
      return { action: 'ListSources', args: {} }
    default:
      return null
  }
}
