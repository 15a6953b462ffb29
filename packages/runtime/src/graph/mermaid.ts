// Mermaid rendering of entity graphs

import type { EntityGraph, GraphEdge, Id } from '@lineage/protocol';

function escapeLabel(text: string): string {
  return text.replace(/"/g, '#quot;');
}

function edgeLabel(edge: GraphEdge): string {
  return edge.containerKey === undefined ? edge.fieldName : `${edge.fieldName}[${edge.containerKey}]`;
}

/**
 * Render a graph as a Mermaid flowchart.
 * Nodes are numbered in topological order; non-primary edges are dotted.
 */
export function renderGraphMermaid(graph: EntityGraph): string {
  const names = new Map<Id, string>();
  graph.topologicalOrder.forEach((id, index) => names.set(id, `n${index}`));

  const lines = ['graph TD'];
  for (const id of graph.topologicalOrder) {
    const node = graph.nodes.get(id);
    if (!node) continue;
    lines.push(`  ${names.get(id)}["${escapeLabel(`${node.type} ${id.slice(0, 8)}`)}"]`);
  }
  for (const edge of graph.edges.values()) {
    const arrow = edge.isPrimary ? '-->' : '-.->';
    lines.push(
      `  ${names.get(edge.sourceId)} ${arrow}|"${escapeLabel(edgeLabel(edge))}"| ${names.get(edge.targetId)}`
    );
  }
  return lines.join('\n');
}
