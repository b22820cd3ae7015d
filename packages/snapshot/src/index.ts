/**
 * Multigraph Snapshots
 *
 * Dump and load graphs as JSON-safe snapshots, JSON text or .json files.
 *
 * @example
 * ```typescript
 * import { undirectedGraph } from '@multigraph/core';
 * import { serializeGraph, parseGraph, writeGraphFile, readGraphFile } from '@multigraph/snapshot';
 *
 * const graph = undirectedGraph({ edges: [['a', 'b'], ['b', 'c']] });
 *
 * const copy = parseGraph(serializeGraph(graph));
 * copy.equals(graph); // true
 *
 * await writeGraphFile('graph.json', graph);
 * const loaded = await readGraphFile('graph.json');
 * ```
 *
 * @packageDocumentation
 */

export { toSnapshot, fromSnapshot, serializeGraph, parseGraph, GraphSnapshotSchema, SNAPSHOT_VERSION } from './snapshot'
export type { GraphSnapshot } from './snapshot'

export { writeGraphFile, readGraphFile } from './files'

export { SnapshotError, InvalidSnapshotError, WrongFileExtensionError } from './errors'
export type { SnapshotErrorKind } from './errors'
