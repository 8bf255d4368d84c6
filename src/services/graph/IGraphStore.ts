/**
 * Graph Store Interface
 *
 * The narrow contract the uploader needs from a property-graph database.
 * One transaction per upload run; statements use named `$param` placeholders.
 */

import { QueryParams } from '../../types/GraphTypes';

export interface GraphTransaction {
  /**
   * Execute one statement inside the transaction. Rejects with the store's error.
   */
  execute(statement: string, params: QueryParams): Promise<void>;

  commit(): Promise<void>;

  rollback(): Promise<void>;

  /**
   * Release the underlying session. Called once, after commit or rollback.
   */
  close(): Promise<void>;
}

export interface GraphStore {
  beginTransaction(): Promise<GraphTransaction>;
}
