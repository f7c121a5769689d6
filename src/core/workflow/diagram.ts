/**
 * Renders the workflow graph as a Mermaid flowchart.
 *
 * Dependency direction: diagram.ts → engine
 * Used by: CLI diagram command
 */

import { WORKFLOW_EDGES, type WorkflowEdge } from './engine.js';

function nodeLabel(id: WorkflowEdge['from'] | WorkflowEdge['to']): string {
    if (id === '__start__') return '__start__([start])';
    if (id === '__end__') return '__end__([end])';
    return id;
}

/**
 * Mermaid source for the workflow; conditional edges are dotted and labelled.
 */
export function renderMermaid(edges: readonly WorkflowEdge[] = WORKFLOW_EDGES): string {
    const lines = ['flowchart TD'];

    for (const edge of edges) {
        const arrow = edge.condition ? `-. ${edge.condition} .->` : '-->';
        lines.push(`    ${nodeLabel(edge.from)} ${arrow} ${nodeLabel(edge.to)}`);
    }

    return lines.join('\n') + '\n';
}
