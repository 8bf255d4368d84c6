/**
 * Common types used across the uploader
 */

export interface RunContext {
  runId: string;
  database?: string;
}
