/**
 * States of one streaming ingestion run
 */
export enum IngestState {
  Filling = 'FILLING',        // Pulling rows into the current batch
  Submitting = 'SUBMITTING',  // Handing a filled batch to the writer
  Draining = 'DRAINING',      // Source exhausted, waiting for outstanding acks
  Finished = 'FINISHED',
  Errored = 'ERRORED',
}

const TRANSITIONS: Readonly<Record<IngestState, readonly IngestState[]>> = {
  [IngestState.Filling]: [IngestState.Submitting, IngestState.Draining, IngestState.Errored],
  [IngestState.Submitting]: [IngestState.Filling, IngestState.Errored],
  [IngestState.Draining]: [IngestState.Finished, IngestState.Errored],
  [IngestState.Finished]: [],
  [IngestState.Errored]: [],
};

/**
 * Tracks the run's state and the path it took
 * Rejects any move the state machine does not allow
 */
export class IngestStateTracker {
  private current = IngestState.Filling;
  private readonly visited: IngestState[] = [IngestState.Filling];
  private failure?: Error;

  get state(): IngestState {
    return this.current;
  }

  get history(): readonly IngestState[] {
    return this.visited;
  }

  /**
   * The error that moved the run to Errored
   */
  get error(): Error | undefined {
    return this.failure;
  }

  isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(next: IngestState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid ingest state transition: ${this.current} -> ${next}`);
    }
    this.current = next;
    this.visited.push(next);
  }

  /**
   * Move to Errored, keeping the triggering error
   */
  fail(error: unknown): Error {
    const failure = error instanceof Error ? error : new Error(String(error));
    this.transition(IngestState.Errored);
    this.failure = failure;
    return failure;
  }
}
