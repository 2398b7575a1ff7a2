import { IngestState, IngestStateTracker } from './ingest-state';

describe('IngestStateTracker', () => {
  let tracker: IngestStateTracker;

  beforeEach(() => {
    tracker = new IngestStateTracker();
  });

  it('should start in Filling', () => {
    expect(tracker.state).toBe(IngestState.Filling);
    expect(tracker.history).toEqual([IngestState.Filling]);
    expect(tracker.isTerminal()).toBe(false);
  });

  it('should follow the fill, submit, drain, finish cycle', () => {
    tracker.transition(IngestState.Submitting);
    tracker.transition(IngestState.Filling);
    tracker.transition(IngestState.Draining);
    tracker.transition(IngestState.Finished);

    expect(tracker.history).toEqual([
      IngestState.Filling,
      IngestState.Submitting,
      IngestState.Filling,
      IngestState.Draining,
      IngestState.Finished,
    ]);
    expect(tracker.isTerminal()).toBe(true);
  });

  it('should reject transitions the state machine does not allow', () => {
    expect(() => tracker.transition(IngestState.Finished)).toThrow(
      'Invalid ingest state transition: FILLING -> FINISHED',
    );

    tracker.transition(IngestState.Submitting);
    expect(() => tracker.transition(IngestState.Draining)).toThrow(
      'Invalid ingest state transition: SUBMITTING -> DRAINING',
    );
  });

  it.each([IngestState.Filling, IngestState.Submitting, IngestState.Draining])(
    'should reach Errored from %s',
    state => {
      if (state !== IngestState.Filling) {
        tracker.transition(state);
      }
      const error = new Error('boom');

      expect(tracker.fail(error)).toBe(error);
      expect(tracker.state).toBe(IngestState.Errored);
      expect(tracker.error).toBe(error);
    },
  );

  it('should wrap a non-error failure', () => {
    expect(tracker.fail('broken').message).toBe('broken');
  });

  it('should not leave a terminal state', () => {
    tracker.transition(IngestState.Draining);
    tracker.transition(IngestState.Finished);

    expect(() => tracker.fail(new Error('late'))).toThrow('Invalid ingest state transition: FINISHED -> ERRORED');
    expect(tracker.error).toBeUndefined();
  });
});
