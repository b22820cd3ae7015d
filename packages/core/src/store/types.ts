/**
 * Graph Store Types
 *
 * Core data structures for nodes, edges and couples.
 */

import { z } from 'zod'
import type { Identifier } from '../identifier'

/**
 * Attribute record of a node or edge.
 */
export type Attributes = Record<string, unknown>

/**
 * Runtime check for an attribute record (plain objects only).
 */
export const AttributesSchema = z.custom<Attributes>(isPlainObject)

/**
 * Canonical endpoint pair used as the edge-store key.
 * Directed graphs keep the order given; undirected graphs sort it.
 */
export type Couple = readonly [Identifier, Identifier]

/**
 * Parallel edges of one couple: edge identifier -> attributes.
 */
export type Multiples = ReadonlyMap<Identifier, Readonly<Attributes>>

/**
 * Stored couple with its parallel edges.
 */
export interface StoredCouple {
  couple: Couple
  multiples: Map<Identifier, Attributes>
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Store key of a couple. JSON keeps `1` and `'1'` apart.
 */
export function coupleKey(couple: Couple): string {
  return JSON.stringify(couple)
}

/**
 * Copy an attribute record. Plain objects and arrays are copied all the way
 * down; any other value (functions, class instances, maps) is shared.
 */
export function cloneAttributes(attributes: Readonly<Attributes>): Attributes {
  return copyRecord(attributes, new WeakMap())
}

function copyRecord(record: Readonly<Attributes>, seen: WeakMap<object, unknown>): Attributes {
  const copy: Attributes = {}
  seen.set(record, copy)
  for (const [key, value] of Object.entries(record)) {
    copy[key] = copyValue(value, seen)
  }
  return copy
}

function copyValue(value: unknown, seen: WeakMap<object, unknown>): unknown {
  if (typeof value !== 'object' || value === null) return value
  if (seen.has(value)) return seen.get(value)

  if (Array.isArray(value)) {
    const copy: unknown[] = []
    seen.set(value, copy)
    for (const item of value) {
      copy.push(copyValue(item, seen))
    }
    return copy
  }
  return isPlainObject(value) ? copyRecord(value, seen) : value
}
