/**
 * Graph description uploader
 *
 * Library entry point. The command line tool lives in scripts/upload-graph.ts.
 */

export * from './types/GraphTypes';
export * from './types/UploadErrors';
export { IDENTIFIER_TOKEN } from './types/GraphDescriptionSchema';
export { Logger } from './services/core/Logger';
export { EDGE_ID_PATTERN, NODE_ID_PATTERN, parseEdgeId, safeParseEdgeId } from './services/graph/EdgeIdentifier';
export type { EdgeIdParseResult } from './services/graph/EdgeIdentifier';
export { serializeProperties } from './services/graph/PropertySerializer';
export type { SerializedProperties } from './services/graph/PropertySerializer';
export { createEdge, createNode, parseGraphDescription } from './services/graph/GraphModel';
export { buildClearStatements, buildCreateEdge, buildCreateNode } from './services/graph/CypherQueryBuilder';
export { GraphUploader } from './services/graph/GraphUploader';
export type { UploadOptions, UploadSummary } from './services/graph/GraphUploader';
export type { GraphStore, GraphTransaction } from './services/graph/IGraphStore';
export { Neo4jGraphStore, buildConnectionUri } from './services/graph/Neo4jConnection';
export type { Neo4jConnectionConfig } from './services/graph/Neo4jConnection';
export { ConsoleProgressReporter } from './services/graph/ProgressReporter';
export type { ProgressObserver, ProgressPhase } from './services/graph/ProgressReporter';
export { loadGraphDescription } from './services/graph/GraphDescriptionLoader';
export { loadUploadConfig } from './config/uploadConfig';
