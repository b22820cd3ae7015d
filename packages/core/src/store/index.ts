export { NodeStore } from './node-store'
export { EdgeStore } from './edge-store'
export { AttributesSchema, coupleKey, cloneAttributes, isPlainObject } from './types'
export type { Attributes, Couple, Multiples, StoredCouple } from './types'
