import { DependencyGraph, ReadonlySymbolIndex } from '../types/index.js';

/**
 * Derive symbol-to-symbol edges from an index.
 *
 * A node exists for every symbol with at least one definition and is anchored
 * at its first definition's file. For each of the symbol's own import, call
 * and reference usages in that file, any other node whose name occurs as a
 * substring of the usage's source line becomes a dependency. This is textual
 * co-occurrence, not binding resolution: `run` depends on `Runner` whenever
 * both names share a line.
 */
export function buildDependencyGraph(index: ReadonlySymbolIndex): DependencyGraph {
  const graph: DependencyGraph = new Map();

  for (const [symbol, usages] of index) {
    const definition = usages.find((usage) => usage.kind === 'definition');
    if (definition) {
      graph.set(symbol, {
        symbol,
        filePath: definition.filePath,
        dependencies: new Set(),
        dependents: new Set(),
      });
    }
  }

  for (const [symbol, node] of graph) {
    const usages = index.get(symbol) ?? [];

    for (const usage of usages) {
      if (usage.filePath !== node.filePath || usage.kind === 'definition') {
        continue;
      }

      for (const [other, otherNode] of graph) {
        if (other !== symbol && usage.context.includes(other)) {
          node.dependencies.add(other);
          otherNode.dependents.add(symbol);
        }
      }
    }
  }

  return graph;
}
