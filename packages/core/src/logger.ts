import type { ConsolaInstance } from 'consola'
import { createConsola, LogLevels } from 'consola'

// Root instance, level defaults to info so debug traces stay silent
export const logger: ConsolaInstance = createConsola({ level: LogLevels.info })

// withTag() copies options, so children are tracked to follow setLogLevel
const tagged: ConsolaInstance[] = []

// Scoped logger with [tag] prefix
export function createLogger(tag: string): ConsolaInstance {
  const child = logger.withTag(tag)
  tagged.push(child)
  return child
}

// Set global log level (root and every createLogger child)
export function setLogLevel(level: number): void {
  logger.level = level
  for (const child of tagged) {
    child.level = level
  }
}

export { LogLevels } from 'consola'
