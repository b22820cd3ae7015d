export { Graph } from './graph'
export { EdgesView } from './edges-view'
export { CalculatedAttributes } from './calculated'
export type { CalculatedAttribute } from './calculated'
export { validateNodes, validateEdges } from './validation'
export type { NodesInput, EdgesInput, MultiplesInput, NodeEntry, EdgeEntry } from './validation'
export { NOT_AVAILABLE } from './types'
export type {
  GraphConfig,
  GraphInit,
  RecalculateOptions,
  AddNodeInput,
  AddEdgeInput,
  DeleteEdgeOptions,
  SubgraphOptions,
  GraphDescription,
  NotAvailable,
} from './types'
