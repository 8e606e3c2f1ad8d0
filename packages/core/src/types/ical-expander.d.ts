// ical-expander ships no type declarations and has no @types package.
// Only the surface the CalDAV adapter uses is declared.

declare module 'ical-expander' {
  interface ICalTime {
    year: number
    month: number
    day: number
    hour: number
    minute: number
    second: number
    isDate: boolean
    zone?: { tzid: string }
    toJSDate(): Date
  }

  interface ICalProperty {
    getFirstValue(): unknown
  }

  interface ICalComponent {
    getFirstPropertyValue(name: string): unknown
    getAllProperties(name: string): ICalProperty[]
  }

  interface ICalEvent {
    startDate: ICalTime
    endDate: ICalTime
    /** Set on RECURRENCE-ID overrides of a series occurrence */
    recurrenceId?: ICalTime | null
    component: ICalComponent
  }

  interface ICalOccurrence {
    recurrenceId: ICalTime
    startDate: ICalTime
    endDate: ICalTime
    item: ICalEvent
  }

  interface IcalExpanderOptions {
    ics: string
    maxIterations?: number
    skipInvalidDates?: boolean
  }

  class IcalExpander {
    constructor(options: IcalExpanderOptions)
    between(after?: Date, before?: Date): { events: ICalEvent[]; occurrences: ICalOccurrence[] }
    all(): { events: ICalEvent[]; occurrences: ICalOccurrence[] }
  }

  namespace IcalExpander {
    export type Time = ICalTime
    export type Component = ICalComponent
    export type Event = ICalEvent
    export type Occurrence = ICalOccurrence
  }

  export = IcalExpander
}
