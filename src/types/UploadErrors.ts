/**
 * Upload Errors - Typed errors for the graph upload run
 *
 * Every failure carries a `kind` the CLI and callers can branch on. None of them
 * are retryable: a failed run is rolled back and reported.
 */

export type UploadErrorKind =
  | 'MALFORMED_EDGE_ID'
  | 'UNKNOWN_NODE_REFERENCE'
  | 'STORE'
  | 'INVALID_DESCRIPTION'
  | 'CONFIGURATION';

export type UploadPhase = 'OPENING' | 'CLEARING' | 'CREATING_NODES' | 'CREATING_EDGES' | 'COMMITTING';

/**
 * Base upload error
 */
export class GraphUploadError extends Error {
  constructor(
    message: string,
    public readonly kind: UploadErrorKind,
    public readonly code: string
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Edge id does not match `<nodeId>(->|<-)<nodeId>`
 */
export class EdgeIdParseError extends GraphUploadError {
  constructor(
    public readonly edgeId: string,
    public readonly pattern: string
  ) {
    super(`Edge '${edgeId}' does not seem to conform to '${pattern}'`, 'MALFORMED_EDGE_ID', 'EDGE_ID_MALFORMED');
  }
}

export class UnknownNodeReferenceError extends GraphUploadError {
  constructor(
    public readonly edgeId: string,
    public readonly nodeId: string
  ) {
    super(
      `Edge '${edgeId}' uses node '${nodeId}' which cannot be found in the nodes`,
      'UNKNOWN_NODE_REFERENCE',
      'NODE_NOT_FOUND'
    );
  }
}

/**
 * Where in the run a store call failed
 */
export interface StoreErrorContext {
  phase: UploadPhase;
  /** node id or edge id the statement was built for */
  itemId?: string;
  statement?: string;
}

/**
 * Failure reported by the store. The original error is kept as `cause`.
 */
export class StoreError extends GraphUploadError {
  constructor(
    message: string,
    public readonly context: StoreErrorContext,
    originalError?: unknown
  ) {
    super(message, 'STORE', 'STORE_FAILURE');
    if (originalError !== undefined) {
      this.cause = originalError;
    }
  }

  static wrap(error: unknown, context: StoreErrorContext): StoreError {
    if (error instanceof StoreError) {
      return error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    const target = context.itemId ? ` for '${context.itemId}'` : '';
    return new StoreError(`Store failed during ${context.phase}${target}: ${reason}`, context, error);
  }
}

export class InvalidGraphDescriptionError extends GraphUploadError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'INVALID_DESCRIPTION', 'DESCRIPTION_INVALID');
  }
}

/**
 * Label, property key or role that cannot be spliced into a Cypher pattern
 */
export class InvalidGraphItemError extends GraphUploadError {
  constructor(message: string) {
    super(message, 'INVALID_DESCRIPTION', 'ITEM_INVALID');
  }
}

export class UploadConfigError extends GraphUploadError {
  constructor(message: string) {
    super(message, 'CONFIGURATION', 'CONFIG_INVALID');
  }
}
