/**
 * Errors Module
 */

export {
  GraphErrorKind,
  GraphError,
  NodesValidationError,
  EdgesValidationError,
  DuplicationInEdgeIdentifiersError,
  ObjectAlreadyExistsError,
  NodeAlreadyExistsError,
  EdgeAlreadyExistsError,
  ObjectNotFoundError,
  NodeNotFoundError,
  CoupleNotFoundError,
  EdgeNotFoundError,
  isGraphError,
} from './errors'
export type { NodesValidationKind, EdgesValidationKind } from './errors'
