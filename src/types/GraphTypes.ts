/**
 * Graph Types - Graph description model
 *
 * Nodes and edges of a declarative graph description, as they are uploaded into
 * a Cypher property-graph store. Items are tagged by `kind` so the query builder
 * can pick pattern delimiters without an inheritance chain.
 */

/**
 * Values a property may carry. Neo4j stores scalars and homogeneous lists of
 * scalars; null means "no property" and is dropped before any statement is built.
 */
export type PropertyScalar = string | number | boolean;
export type PropertyValue = PropertyScalar | PropertyScalar[] | null;

export type GraphProperties = Readonly<Record<string, PropertyValue>>;

export type GraphItemKind = 'node' | 'edge';

interface GraphItemBase<K extends GraphItemKind> {
  readonly kind: K;
  readonly label: string;
  readonly properties: GraphProperties;
}

export type GraphNode = GraphItemBase<'node'>;
export type GraphEdge = GraphItemBase<'edge'>;
export type GraphItem = GraphNode | GraphEdge;

/**
 * Edge orientation encoded in the edge id.
 * RIGHT: `left->right`, left is the source. LEFT: `left<-right`, right is the source.
 */
export enum EdgeDirection {
  LEFT = 'LEFT',
  RIGHT = 'RIGHT',
}

/**
 * Parsed edge id
 */
export interface EdgeEndpoints {
  leftId: string;
  direction: EdgeDirection;
  rightId: string;
}

/**
 * Full description of one graph. Map order is document order.
 * Edge ids may reference nodes that do not exist; the uploader rejects them.
 */
export interface GraphDescription {
  nodes: ReadonlyMap<string, GraphNode>;
  edges: ReadonlyMap<string, GraphEdge>;
}

/**
 * Statement text plus named parameter bindings
 */
export type QueryParams = Record<string, PropertyValue>;

export interface CypherStatement {
  text: string;
  params: QueryParams;
}
