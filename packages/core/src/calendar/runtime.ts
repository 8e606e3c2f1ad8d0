import { resolveDataDir } from '../config.js'
import { loadCalendarConfig, loadCalendarCredentials } from './config.js'
import { ScheduleCoordinator } from './coordinator.js'
import { createSourceAdapters } from './registry.js'
import { TimeNormalizer } from './time.js'
import type { CalendarConfig, SourceAdapter } from './types.js'

export interface CalendarRuntime {
  dataDir: string
  config: CalendarConfig
  adapters: SourceAdapter[]
  time: TimeNormalizer
  coordinator: ScheduleCoordinator
}

/**
 * Load configuration and wire adapters into a coordinator
 */
export function createCalendarRuntime(options?: { dataDir?: string; now?: () => Date }): CalendarRuntime {
  const dataDir = resolveDataDir(options?.dataDir)
  const config = loadCalendarConfig(dataDir)
  const credentials = loadCalendarCredentials(dataDir)
  const adapters = createSourceAdapters(config, { dataDir, credentials })
  const time = new TimeNormalizer(config.timezone)
  const coordinator = new ScheduleCoordinator({ adapters, time, config, now: options?.now })
  return { dataDir, config, adapters, time, coordinator }
}
