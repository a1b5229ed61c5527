/**
 * Utilities Module
 */

export { logger, createLogger, setLogLevel, LogLevels } from './logger'
export { issuesOf, parseOptions } from './options'
