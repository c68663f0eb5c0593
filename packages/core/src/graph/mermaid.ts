import { WireDependencyNode } from '../types/index.js';

export interface MermaidOptions {
  maxNodes?: number;
  showFiles?: boolean;
}

export const EMPTY_GRAPH_MESSAGE = 'No dependency graph data found. Try scanning the directory first.';

const SOURCE_FILL = '#90EE90';
const LEAF_FILL = '#FFB6C1';
const HUB_FILL = '#FFD700';

/**
 * Render a dependency graph as a Mermaid `graph TD` block followed by a
 * legend and statistics. Isolated symbols are hidden; past `maxNodes` the
 * most connected nodes are kept.
 */
export function renderMermaid(nodes: readonly WireDependencyNode[], options: MermaidOptions = {}): string {
  const maxNodes = options.maxNodes ?? 50;
  const showFiles = options.showFiles ?? false;

  if (nodes.length === 0) {
    return EMPTY_GRAPH_MESSAGE;
  }

  let shown = nodes.filter((node) => node.dependencies.length > 0 || node.dependents.length > 0);
  if (shown.length > maxNodes) {
    shown = [...shown].sort((a, b) => connections(b) - connections(a)).slice(0, maxNodes);
  }

  const ids = new Map<string, string>();
  const lines = ['```mermaid', 'graph TD'];

  shown.forEach((node, idx) => {
    const id = `N${idx}`;
    ids.set(node.symbol, id);
    lines.push(...nodeLines(id, node, label(node, showFiles)));
  });

  let edges = 0;
  for (const node of shown) {
    const sourceId = ids.get(node.symbol);
    for (const dependency of node.dependencies) {
      const targetId = ids.get(dependency);
      if (sourceId && targetId) {
        lines.push(`    ${sourceId} --> ${targetId}`);
        edges++;
      }
    }
  }

  lines.push(
    '```',
    '',
    '**Legend:**',
    '- 🟢 Green rectangles: Source nodes (no dependencies, others depend on them)',
    '- 🔴 Pink rounded: Leaf nodes (have dependencies, nothing depends on them)',
    '- 🟡 Yellow diamonds: Hub nodes (highly connected, 3+ connections)',
    '- ⬜ White rectangles: Regular nodes',
    '',
    '**Statistics:**',
    `- Total symbols shown: ${shown.length}`,
    `- Total dependencies: ${edges}`
  );

  if (nodes.length > shown.length) {
    lines.push(`- Note: ${nodes.length - shown.length} isolated symbols hidden`);
  }

  return lines.join('\n');
}

function connections(node: WireDependencyNode): number {
  return node.dependencies.length + node.dependents.length;
}

function label(node: WireDependencyNode, showFiles: boolean): string {
  if (!showFiles) {
    return node.symbol;
  }
  const fileName = node.filePath.split('/').pop() ?? node.filePath;
  return `${node.symbol}<br/><small>${fileName}</small>`;
}

function nodeLines(id: string, node: WireDependencyNode, text: string): string[] {
  const deps = node.dependencies.length;
  const dependents = node.dependents.length;

  if (deps === 0 && dependents > 0) {
    return [`    ${id}["${text}"]`, `    style ${id} fill:${SOURCE_FILL}`];
  }
  if (deps > 0 && dependents === 0) {
    return [`    ${id}("${text}")`, `    style ${id} fill:${LEAF_FILL}`];
  }
  if (deps > 2 || dependents > 2) {
    return [`    ${id}{"${text}"}`, `    style ${id} fill:${HUB_FILL}`];
  }
  return [`    ${id}["${text}"]`];
}
