/**
 * Upload progress observers
 */

export type ProgressPhase = 'Nodes' | 'Edges';

export interface ProgressObserver {
  onProgress(phase: ProgressPhase, completed: number, total: number): void;
}

/**
 * Writes `Nodes - 50% (1/2)` lines to stderr, one per completed item.
 */
export class ConsoleProgressReporter implements ProgressObserver {
  constructor(private readonly write: (line: string) => void = (line) => console.error(line)) {}

  onProgress(phase: ProgressPhase, completed: number, total: number): void {
    const percent = total === 0 ? 100 : Math.round((completed / total) * 100);
    this.write(`${phase} - ${percent}% (${completed}/${total})`);
  }
}
