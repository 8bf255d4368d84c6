/**
 * Cypher Query Builder
 *
 * Builds parameterized statements for node creation, edge creation and clearing.
 * Values are always bound as parameters; labels and keys are validated identifiers.
 */

import {
  CypherStatement,
  EdgeDirection,
  GraphEdge,
  GraphItem,
  GraphItemKind,
  GraphNode,
} from '../../types/GraphTypes';
import { assertIdentifier, serializeProperties } from './PropertySerializer';

/**
 * Pattern delimiters per item kind: `(n: Label {...})` and `[e: TYPE {...}]`
 */
const PATTERN_DELIMITERS: Record<GraphItemKind, readonly [string, string]> = {
  node: ['(', ')'],
  edge: ['[', ']'],
};

export const NODE_ROLE = 'n';
export const LEFT_NODE_ROLE = 'n1';
export const RIGHT_NODE_ROLE = 'n2';
export const EDGE_ROLE = 'e';

export const CLEAR_RELATIONSHIPS_STATEMENT = 'MATCH (a)-[e]-(b) DELETE e';
export const CLEAR_NODES_STATEMENT = 'MATCH (n) DELETE n';

/**
 * Pattern fragment for one item under a role identifier
 */
export function toPattern(item: GraphItem, role: string): CypherStatement {
  assertIdentifier(item.label, `${item.kind} label`);
  const { text, params } = serializeProperties(item.properties, role);
  const [open, close] = PATTERN_DELIMITERS[item.kind];
  return { text: `${open}${role}: ${item.label} ${text}${close}`, params };
}

/**
 * `CREATE (n: Label {key: $n_key})`
 */
export function buildCreateNode(node: GraphNode, role: string = NODE_ROLE): CypherStatement {
  const pattern = toPattern(node, role);
  return { text: `CREATE ${pattern.text}`, params: pattern.params };
}

/**
 * Match both endpoints by label and (null-filtered) properties, then connect them.
 *
 * RIGHT: `(n1)-[e]->(n2)`, LEFT: `(n1)<-[e]-(n2)`. If the properties match zero or
 * several nodes, the store's MATCH semantics apply unchanged.
 */
export function buildCreateEdge(
  leftNode: GraphNode,
  rightNode: GraphNode,
  edge: GraphEdge,
  direction: EdgeDirection
): CypherStatement {
  const left = toPattern(leftNode, LEFT_NODE_ROLE);
  const right = toPattern(rightNode, RIGHT_NODE_ROLE);
  const relationship = toPattern(edge, EDGE_ROLE);

  const leftArrow = direction === EdgeDirection.LEFT ? '<-' : '-';
  const rightArrow = direction === EdgeDirection.RIGHT ? '->' : '-';

  const text = [
    `MATCH ${left.text}`,
    `MATCH ${right.text}`,
    `CREATE (${LEFT_NODE_ROLE})${leftArrow}${relationship.text}${rightArrow}(${RIGHT_NODE_ROLE})`,
  ].join('\n');

  return {
    text,
    params: { ...left.params, ...right.params, ...relationship.params },
  };
}

/**
 * Relationships first: Neo4j refuses to delete a node that still has relationships.
 */
export function buildClearStatements(): CypherStatement[] {
  return [
    { text: CLEAR_RELATIONSHIPS_STATEMENT, params: {} },
    { text: CLEAR_NODES_STATEMENT, params: {} },
  ];
}
