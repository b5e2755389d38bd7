import { TransferError, ValidationError } from '../utils/errorHandler.js';

/**
 * Goal-counted semaphore: set a goal, count it down from any number of
 * completions, and wait for it to reach zero.
 */
export class CountingSemaphore {
  private goalValue: number | undefined;
  private remainingValue = 0;
  private waiters: Array<() => void> = [];

  get goal(): number | undefined {
    return this.goalValue;
  }

  get remaining(): number {
    return this.remainingValue;
  }

  /**
   * Starts a cycle. Fails while the previous cycle still has outstanding
   * completions.
   */
  setGoal(goal: number): void {
    if (!Number.isSafeInteger(goal) || goal < 0) {
      throw new ValidationError(`Semaphore goal must be a non-negative integer, got ${goal}`);
    }
    if (this.remainingValue > 0) {
      throw new TransferError(
        `Semaphore goal set to ${goal} while ${this.remainingValue} of ${this.goalValue} completions are outstanding`,
        'Fatal'
      );
    }

    this.goalValue = goal;
    this.remainingValue = goal;
    if (goal === 0) {
      this.release();
    }
  }

  decrementOne(): void {
    if (this.remainingValue <= 0) {
      throw new TransferError(
        `Semaphore decremented past zero (goal ${this.goalValue ?? 'never set'})`,
        'Fatal'
      );
    }

    this.remainingValue--;
    if (this.remainingValue === 0) {
      this.release();
    }
  }

  waitUntilZero(): Promise<void> {
    if (this.remainingValue === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }
}
