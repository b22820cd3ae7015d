/**
 * Snapshot Files
 */

import { readFile, writeFile } from 'node:fs/promises'
import { extname } from 'node:path'
import { type Graph, type GraphConfig, createLogger } from '@multigraph/core'
import { WrongFileExtensionError } from './errors'
import { parseGraph, serializeGraph } from './snapshot'

const log = createLogger('snapshot')

function assertJsonPath(filePath: string): void {
  if (extname(filePath).toLowerCase() !== '.json') {
    throw new WrongFileExtensionError(filePath)
  }
}

/**
 * Write a graph snapshot to a .json file.
 * @throws WrongFileExtensionError
 */
export async function writeGraphFile(filePath: string, graph: Graph): Promise<void> {
  assertJsonPath(filePath)
  await writeFile(filePath, serializeGraph(graph, 2), 'utf8')
  log.debug(`Wrote ${graph.size} nodes to ${filePath}`)
}

/**
 * Read a graph snapshot from a .json file.
 * @throws WrongFileExtensionError
 * @throws InvalidSnapshotError
 */
export async function readGraphFile(filePath: string, config?: GraphConfig): Promise<Graph> {
  assertJsonPath(filePath)
  const graph = parseGraph(await readFile(filePath, 'utf8'), config)
  log.debug(`Read ${graph.size} nodes from ${filePath}`)
  return graph
}
