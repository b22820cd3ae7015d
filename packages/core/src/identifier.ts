/**
 * Identifiers
 *
 * Node and edge identifiers, their generation and their total order.
 */

import { randomUUID } from 'node:crypto'
import { z } from 'zod'

/**
 * Node or edge identifier. Usable as a `Map` key; `1` and `'1'` are distinct.
 */
export type Identifier = string | number

/**
 * Runtime check for an identifier (finite numbers only).
 */
export const IdentifierSchema = z.union([z.string(), z.number().finite()])

/**
 * What an identifier is being generated for.
 */
export type IdentifierKind = 'node' | 'edge'

/**
 * Pluggable identifier generator.
 */
export interface IdGenerator {
  /** Generate a unique identifier for a node or edge */
  generate(kind: IdentifierKind): Identifier
}

/**
 * Generate a random UUID, unique across the process with overwhelming probability.
 */
export function generateIdentifier(): string {
  return randomUUID()
}

/**
 * Default ID generator using crypto.randomUUID.
 */
export const defaultIdGenerator: IdGenerator = {
  generate: () => generateIdentifier(),
}

export function isIdentifier(value: unknown): value is Identifier {
  return IdentifierSchema.safeParse(value).success
}

/**
 * Total order on identifiers: numbers before strings, then natural order.
 */
export function compareIdentifiers(a: Identifier, b: Identifier): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b
  if (typeof a === 'number') return -1
  if (typeof b === 'number') return 1
  if (a === b) return 0
  return a < b ? -1 : 1
}
