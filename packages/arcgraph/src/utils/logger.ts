import type { ConsolaInstance } from 'consola'
import { createConsola, LogLevels } from 'consola'

// Root instance; tagged children copy its options when created
export const logger: ConsolaInstance = createConsola({ level: LogLevels.info })

const scoped = new Map<string, ConsolaInstance>()

// Scoped logger with [tag] prefix, one per tag
export function createLogger(tag: string): ConsolaInstance {
  let child = scoped.get(tag)
  if (!child) {
    child = logger.withTag(tag)
    scoped.set(tag, child)
  }
  return child
}

// Set global log level (root and every scoped logger)
export function setLogLevel(level: number): void {
  logger.level = level
  for (const child of scoped.values()) {
    child.level = level
  }
}

export { LogLevels } from 'consola'
