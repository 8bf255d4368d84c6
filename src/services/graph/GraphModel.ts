/**
 * Graph item model
 *
 * Validating constructors for nodes, edges and whole descriptions. Input comes
 * from untyped JSON, so every item is checked against its schema and frozen.
 */

import {
  GraphDescription,
  GraphEdge,
  GraphItemKind,
  GraphNode,
  GraphProperties,
} from '../../types/GraphTypes';
import {
  GraphDescriptionInputSchema,
  GraphItemInputSchema,
  formatIssues,
} from '../../types/GraphDescriptionSchema';
import { InvalidGraphDescriptionError } from '../../types/UploadErrors';

function createItem<K extends GraphItemKind>(kind: K, id: string, data: unknown): { kind: K; label: string; properties: GraphProperties } {
  const result = GraphItemInputSchema.safeParse(data);
  if (!result.success) {
    const issues = formatIssues(result.error, [`${kind}s`, id]);
    throw new InvalidGraphDescriptionError(`Invalid ${kind} '${id}': ${issues.join('; ')}`, issues);
  }

  return Object.freeze({
    kind,
    label: result.data.label,
    properties: Object.freeze({ ...result.data.properties }),
  });
}

/**
 * @throws InvalidGraphDescriptionError on a missing label, unknown fields or unsupported values
 */
export function createNode(id: string, data: unknown): GraphNode {
  return createItem('node', id, data);
}

export function createEdge(id: string, data: unknown): GraphEdge {
  return createItem('edge', id, data);
}

/**
 * Build a description from a parsed JSON document.
 *
 * Missing `nodes` or `edges` are treated as empty. Edge ids are not checked here;
 * dangling references are the uploader's concern.
 */
export function parseGraphDescription(document: unknown): GraphDescription {
  const result = GraphDescriptionInputSchema.safeParse(document);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new InvalidGraphDescriptionError(`Invalid graph description: ${issues.join('; ')}`, issues);
  }

  const nodes = new Map<string, GraphNode>();
  for (const [id, data] of Object.entries(result.data.nodes)) {
    nodes.set(id, createNode(id, data));
  }

  const edges = new Map<string, GraphEdge>();
  for (const [id, data] of Object.entries(result.data.edges)) {
    edges.set(id, createEdge(id, data));
  }

  return { nodes, edges };
}
