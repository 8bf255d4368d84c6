/**
 * Graph Uploader
 *
 * Materializes a graph description inside one store transaction:
 * optional clear, then every node, then every edge. Any failure rolls the whole
 * transaction back, clear included, and the triggering error is rethrown.
 *
 * Statements are awaited one at a time; edges are only issued after every node
 * create has been executed, since edge statements MATCH their endpoints.
 */

import { Logger } from '../core/Logger';
import { TraceService } from '../core/TraceService';
import { CypherStatement, GraphDescription, GraphNode } from '../../types/GraphTypes';
import { GraphUploadError, StoreError, UnknownNodeReferenceError, UploadPhase } from '../../types/UploadErrors';
import { buildClearStatements, buildCreateEdge, buildCreateNode } from './CypherQueryBuilder';
import { safeParseEdgeId } from './EdgeIdentifier';
import { GraphStore, GraphTransaction } from './IGraphStore';
import { ProgressObserver } from './ProgressReporter';

export interface UploadOptions {
  /** Delete all relationships and nodes before creating anything (default: true) */
  clearFirst?: boolean;
  progress?: ProgressObserver;
  /** Reuse a run ID assigned by the caller */
  runId?: string;
}

export interface UploadSummary {
  runId: string;
  cleared: boolean;
  nodesCreated: number;
  edgesCreated: number;
  statementsExecuted: number;
}

export type UploadState = 'START' | UploadPhase | 'DONE' | 'FAILED';

/**
 * Graph Uploader Service
 */
export class GraphUploader {
  private logger: Logger;
  private traceService: TraceService;

  constructor(logger: Logger = new Logger('GraphUploader')) {
    this.logger = logger;
    this.traceService = new TraceService(logger);
  }

  async upload(description: GraphDescription, store: GraphStore, options: UploadOptions = {}): Promise<UploadSummary> {
    const clearFirst = options.clearFirst ?? true;
    const context = this.traceService.createContext(undefined, options.runId);
    const logger = this.logger.child(context);

    const summary: UploadSummary = {
      runId: context.runId,
      cleared: false,
      nodesCreated: 0,
      edgesCreated: 0,
      statementsExecuted: 0,
    };

    logger.info('Starting graph upload', {
      nodes: description.nodes.size,
      edges: description.edges.size,
      clearFirst,
    });

    let state: UploadState = 'START';
    const tx = await this.open(store);

    const execute = async (statement: CypherStatement, itemId?: string): Promise<void> => {
      logger.debug('Executing statement', { state, itemId, statement: statement.text, params: statement.params });
      try {
        await tx.execute(statement.text, statement.params);
      } catch (error) {
        throw StoreError.wrap(error, { phase: toPhase(state), itemId, statement: statement.text });
      }
      summary.statementsExecuted++;
    };

    try {
      if (clearFirst) {
        state = 'CLEARING';
        for (const statement of buildClearStatements()) {
          await execute(statement);
        }
        summary.cleared = true;
      }

      state = 'CREATING_NODES';
      let completed = 0;
      for (const [nodeId, node] of description.nodes) {
        await execute(buildCreateNode(node), nodeId);
        summary.nodesCreated++;
        options.progress?.onProgress('Nodes', ++completed, description.nodes.size);
      }

      state = 'CREATING_EDGES';
      completed = 0;
      for (const [edgeId, edge] of description.edges) {
        const parsed = safeParseEdgeId(edgeId);
        if (!parsed.success) {
          throw parsed.error;
        }

        const { leftId, rightId, direction } = parsed.data;
        const leftNode = this.resolveNode(description, edgeId, leftId);
        const rightNode = this.resolveNode(description, edgeId, rightId);

        await execute(buildCreateEdge(leftNode, rightNode, edge, direction), edgeId);
        summary.edgesCreated++;
        options.progress?.onProgress('Edges', ++completed, description.edges.size);
      }

      state = 'COMMITTING';
      try {
        await tx.commit();
      } catch (error) {
        throw StoreError.wrap(error, { phase: 'COMMITTING' });
      }

      state = 'DONE';
      logger.info('Graph upload committed', { ...summary });
      return summary;
    } catch (error) {
      const failedIn = state;
      state = 'FAILED';
      logger.error('Graph upload failed, rolling back', {
        state: failedIn,
        kind: error instanceof GraphUploadError ? error.kind : undefined,
        error,
      });
      await this.rollback(tx, logger);
      throw error;
    } finally {
      await this.release(tx, logger);
    }
  }

  private async open(store: GraphStore): Promise<GraphTransaction> {
    try {
      return await store.beginTransaction();
    } catch (error) {
      throw StoreError.wrap(error, { phase: 'OPENING' });
    }
  }

  private resolveNode(description: GraphDescription, edgeId: string, nodeId: string): GraphNode {
    const node = description.nodes.get(nodeId);
    if (!node) {
      throw new UnknownNodeReferenceError(edgeId, nodeId);
    }
    return node;
  }

  /**
   * A rollback failure is logged; the error that triggered it is the one reported.
   */
  private async rollback(tx: GraphTransaction, logger: Logger): Promise<void> {
    try {
      await tx.rollback();
      logger.info('Transaction rolled back');
    } catch (rollbackError) {
      logger.error('Rollback failed', { error: rollbackError });
    }
  }

  private async release(tx: GraphTransaction, logger: Logger): Promise<void> {
    try {
      await tx.close();
    } catch (closeError) {
      logger.warn('Failed to close store session', { error: closeError });
    }
  }
}

function toPhase(state: UploadState): UploadPhase {
  switch (state) {
    case 'OPENING':
    case 'CLEARING':
    case 'CREATING_NODES':
    case 'CREATING_EDGES':
    case 'COMMITTING':
      return state;
    default:
      return 'OPENING';
  }
}
