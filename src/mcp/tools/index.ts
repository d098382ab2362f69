/**
 * @fileoverview MCP Tools registration.
 * @module mcp/tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { AugmentError, Graph, RepresentativeStrategy } from '../../types/graph.js';
import type { Logger } from '../../types/config.js';
import { fromArcs } from '../../core/graph/builders.js';
import { isStronglyConnected } from '../../core/graph/algorithms.js';
import { augment, applyAugmentation } from '../../core/graph/augment.js';
import { condense } from '../../core/graph/condensation.js';
import { classifyCondensation, augmentationBound } from '../../core/graph/classify.js';

// ============================================================
// Input Schemas
// ============================================================

export const graphInputShape = {
  kind: z
    .enum(['directed', 'undirected', 'multi-directed', 'multi-undirected'])
    .default('directed')
    .describe('Graph category. Only "directed" graphs can be augmented.'),
  nodes: z
    .array(z.string())
    .default([])
    .describe('Vertex IDs. Arc endpoints are declared automatically; list vertices without arcs here.'),
  edges: z
    .array(z.tuple([z.string(), z.string()]))
    .default([])
    .describe('Arcs as [from, to] pairs'),
};

export const augmentInputShape = {
  ...graphInputShape,
  assumeIsCondensation: z
    .boolean()
    .default(false)
    .describe('Treat the graph as already condensed and only check it is acyclic'),
};

const graphInput = z.object(graphInputShape);
const augmentInput = z.object(augmentInputShape);

export type GraphInput = z.infer<typeof graphInput>;
export type AugmentInput = z.infer<typeof augmentInput>;

// ============================================================
// Types
// ============================================================

/**
 * Settings shared by every tool call.
 */
export interface ToolContext {
  readonly representative: RepresentativeStrategy;
  readonly logger: Logger;
}

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

// ============================================================
// Helper Functions
// ============================================================

function toGraph(input: GraphInput): Graph<null> {
  return fromArcs(input.edges, { vertices: input.nodes, kind: input.kind });
}

function respond(payload: unknown): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
  };
}

function respondError(error: AugmentError): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify({ error: error.type, ...error }, null, 2) }],
    isError: true,
  };
}

// ============================================================
// Tool Handlers
// ============================================================

export function handleAugmentGraph(input: AugmentInput, context: ToolContext): ToolResponse {
  const graph = toGraph(input);
  const result = augment(graph, {
    assumeIsCondensation: input.assumeIsCondensation,
    representative: context.representative,
    logger: context.logger,
  });
  if (!result.ok) {
    context.logger.warn(`augment_graph rejected input: ${result.error.message}`);
    return respondError(result.error);
  }

  const { arcs, bound, condensation, classification } = result.value;
  return respond({
    arcs: arcs.map((arc) => [arc.from, arc.to]),
    bound,
    counts: classification.counts,
    components: condensation.nodes.length,
    stronglyConnected: isStronglyConnected(applyAugmentation(graph, arcs)),
  });
}

export function handleCondenseGraph(input: GraphInput, context: ToolContext): ToolResponse {
  const result = condense(toGraph(input), {
    representative: context.representative,
    logger: context.logger,
  });
  if (!result.ok) {
    return respondError(result.error);
  }

  const condensation = result.value;
  return respond({
    components: condensation.nodes.map((node) => ({
      index: node.index,
      representative: node.representative,
      members: node.members,
    })),
    arcs: condensation.arcs.map((arc) => [arc.from, arc.to]),
  });
}

export function handleClassifyGraph(input: GraphInput, context: ToolContext): ToolResponse {
  const result = condense(toGraph(input), {
    representative: context.representative,
    logger: context.logger,
  });
  if (!result.ok) {
    return respondError(result.error);
  }

  const condensation = result.value;
  const classification = classifyCondensation(condensation);
  return respond({
    counts: classification.counts,
    bound: augmentationBound(classification, condensation.nodes.length),
    roles: condensation.nodes.map((node) => ({
      representative: node.representative,
      size: node.size,
      role: classification.roles[node.index],
    })),
  });
}

// ============================================================
// Tool Registration
// ============================================================

export function registerTools(server: McpServer, context: ToolContext): void {
  // --------------------------------------------------------
  // augment_graph
  // --------------------------------------------------------
  server.tool(
    'augment_graph',
    'Compute a minimum set of new arcs that makes a directed graph strongly connected. Returns the arcs, the lower bound they meet and the source/sink/isolated counts.',
    augmentInputShape,
    async (args) => handleAugmentGraph(args, context)
  );

  // --------------------------------------------------------
  // condense_graph
  // --------------------------------------------------------
  server.tool(
    'condense_graph',
    'Contract each strongly connected component of a directed graph to one node. Returns the components with their representatives and the arcs between them.',
    graphInputShape,
    async (args) => handleCondenseGraph(args, context)
  );

  // --------------------------------------------------------
  // classify_graph
  // --------------------------------------------------------
  server.tool(
    'classify_graph',
    'Classify the components of a directed graph as source, sink, isolated or interior, with the counts s, t, q and the augmentation bound.',
    graphInputShape,
    async (args) => handleClassifyGraph(args, context)
  );
}
