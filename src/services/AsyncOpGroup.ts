import { ErrorHandler, TransferError } from '../utils/errorHandler.js';

type Outcome = { ok: true } | { ok: false; error: unknown };

type Continuation = () => void | Promise<void>;

interface TrackedOperation {
  label: string;
  outcome: Promise<Outcome>;
  onComplete: Continuation;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Tracks outstanding asynchronous operations and drains them in the order
 * they were registered, whatever order they settle in.
 */
export class AsyncOpGroup {
  private queue: TrackedOperation[] = [];

  constructor(protected readonly kind: string = 'async') {}

  get pending(): number {
    return this.queue.length;
  }

  /**
   * Registers a pending operation. `onComplete` runs during `finish()`, after
   * every operation registered before this one, even if this one failed.
   */
  addOperation(future: Promise<unknown>, label: string, onComplete: Continuation = () => {}): void {
    // Observe the promise now so a rejection is never reported as unhandled
    // before finish() gets to it.
    const outcome = future.then(
      (): Outcome => ({ ok: true }),
      (error: unknown): Outcome => ({ ok: false, error })
    );
    this.queue.push({ label, outcome, onComplete });
  }

  /**
   * Same as addOperation, but hands the resolved value to `onComplete`.
   * A failed operation has no value, so its continuation is skipped.
   */
  addOperationWithResult<T>(
    future: Promise<T>,
    label: string,
    onComplete: (value: T) => void | Promise<void>
  ): void {
    let result: { value: T } | undefined;
    const captured = future.then((value) => {
      result = { value };
    });
    this.addOperation(captured, label, () => {
      if (result) {
        return onComplete(result.value);
      }
    });
  }

  /**
   * Waits for every registered operation in FIFO order and runs its
   * continuation. Rejects with the first failure once the whole queue has
   * drained.
   */
  async finish(): Promise<void> {
    const operations = this.queue;
    this.queue = [];

    const errors: TransferError[] = [];
    const record = (op: TrackedOperation, error: unknown, stage: string) => {
      console.error(`${this.kind} operation "${op.label}" ${stage}:`, describe(error));
      errors.push(
        new TransferError(
          `${this.kind} operation "${op.label}" ${stage}: ${describe(error)}`,
          ErrorHandler.codeOf(error),
          error,
          op.label
        )
      );
    };

    for (const op of operations) {
      const outcome = await op.outcome;
      if (!outcome.ok) {
        record(op, outcome.error, 'failed');
      }
      try {
        await op.onComplete();
      } catch (error) {
        record(op, error, 'completion failed');
      }
    }

    if (errors.length > 0) {
      console.error(`${errors.length} failures draining ${operations.length} ${this.kind} operations`);
      throw errors[0];
    }
  }
}
