import { v4 as uuidv4 } from 'uuid';
import { RunContext } from '../../types/CommonTypes';
import { Logger } from './Logger';

/**
 * TraceService - Run ID generation
 *
 * Each upload run gets its own ID so every log line of the run can be correlated.
 */
export class TraceService {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Generate a new run ID
   */
  generateRunId(): string {
    return `upload-${Date.now()}-${uuidv4()}`;
  }

  /**
   * Create run context, reusing an existing run ID when the caller has one
   */
  createContext(database?: string, existingRunId?: string): RunContext {
    const context: RunContext = {
      runId: existingRunId || this.generateRunId(),
      ...(database ? { database } : {}),
    };
    this.logger.debug('Run context created', { runId: context.runId, database });
    return context;
  }
}
