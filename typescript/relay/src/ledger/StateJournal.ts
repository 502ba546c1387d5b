type Step = () => void;

interface Frame {
  undo: Step[];
  onCommit: Step[];
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Undo log backing the atomic execution of ledger operations.
 *
 * Every state write made inside `atomic` records how to revert itself.
 * When the operation throws, the writes of its frame are reverted in
 * reverse order; when it returns, they are handed to the enclosing frame
 * so that an outer failure still reverts them. Writes made outside any
 * frame are permanent.
 */
export class StateJournal {
  private readonly frames: Frame[] = [];

  get depth(): number {
    return this.frames.length;
  }

  record(undo: Step): void {
    this.currentFrame()?.undo.push(undo);
  }

  /**
   * Schedules `fn` to run once the outermost operation commits.
   * Discarded if any enclosing frame fails. Runs immediately outside a frame.
   */
  afterCommit(fn: Step): void {
    const frame = this.currentFrame();
    if (frame) frame.onCommit.push(fn);
    else fn();
  }

  atomic<T>(fn: () => T): T {
    const frame: Frame = { undo: [], onCommit: [] };
    this.frames.push(frame);
    let result: T;
    try {
      result = fn();
      if (isPromiseLike(result)) {
        throw new Error('Atomic operations must not suspend');
      }
    } catch (error) {
      this.frames.pop();
      for (let i = frame.undo.length - 1; i >= 0; i--) frame.undo[i]();
      throw error;
    }
    this.frames.pop();

    const parent = this.currentFrame();
    if (parent) {
      parent.undo.push(...frame.undo);
      parent.onCommit.push(...frame.onCommit);
    } else {
      for (const commit of frame.onCommit) commit();
    }
    return result;
  }

  private currentFrame(): Frame | undefined {
    return this.frames[this.frames.length - 1];
  }
}
