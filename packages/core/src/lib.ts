// Public API for consumption by other packages (server)

export { findDataDir, resolveDataDir, DATA_DIR_NAME } from './config.js'

// Calendar system
export * from './calendar/index.js'
