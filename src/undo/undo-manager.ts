import type { ContactActionPerforming, Effect } from '../types/index.js';
import { errorMessage, logger } from '../utils/index.js';
import { effectOperations, type UndoOperation } from './effects.js';

export interface Transaction {
  readonly description: string;
  readonly undo: UndoOperation;
  readonly redo: UndoOperation;
  readonly effect?: Effect;
}

export type HistoryStepStatus = 'completed' | 'failed' | 'noop';

export interface HistoryStepResult {
  status: HistoryStepStatus;
  /** The transaction that was attempted; absent for `noop`. */
  description?: string;
}

export interface UndoHistory {
  /** Most recent first. */
  undo: string[];
  redo: string[];
}

/**
 * Undo/redo history for mutations that were already applied to the store.
 *
 * Registration, undo and redo requests run one at a time in submission order
 * on a single promise chain; the two stacks are only touched from inside that
 * chain. A step that fails (returns `false` or throws) goes back on top of the
 * stack it came from so it can be retried. There is no timeout: a step that
 * never settles stalls every request queued after it.
 */
export class UndoManager {
  private undoStack: Transaction[] = [];
  private redoStack: Transaction[] = [];
  private chain: Promise<void> = Promise.resolve();
  private executing = false;

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get isExecuting(): boolean {
    return this.executing;
  }

  get undoActionTitle(): string | undefined {
    return this.undoStack.at(-1)?.description;
  }

  get redoActionTitle(): string | undefined {
    return this.redoStack.at(-1)?.description;
  }

  history(): UndoHistory {
    return {
      undo: this.undoStack.map(t => t.description).reverse(),
      redo: this.redoStack.map(t => t.description).reverse(),
    };
  }

  /** Record a reversible action. Clears the redo history. */
  register(description: string, undo: UndoOperation, redo: UndoOperation): Promise<void> {
    return this.push({ description, undo, redo });
  }

  /** Record an effect; the store calls that reverse it come from {@link effectOperations}. */
  registerEffect(effect: Effect, actionTitle: string, performer: ContactActionPerforming): Promise<void> {
    const { undo, redo } = effectOperations(effect, performer);
    return this.push({ description: actionTitle, undo, redo, effect });
  }

  undo(): Promise<HistoryStepResult> {
    return this.enqueue(() => this.step(this.undoStack, this.redoStack, 'undo'));
  }

  redo(): Promise<HistoryStepResult> {
    return this.enqueue(() => this.step(this.redoStack, this.undoStack, 'redo'));
  }

  /** Drop both histories once everything queued before this call has run. */
  clear(): Promise<void> {
    return this.enqueue(async () => {
      this.undoStack = [];
      this.redoStack = [];
    });
  }

  /** Resolves once the queue is empty, including requests submitted while waiting. */
  async waitForIdle(): Promise<void> {
    let tail: Promise<void>;
    do {
      tail = this.chain;
      await tail;
    } while (tail !== this.chain);
  }

  private push(transaction: Transaction): Promise<void> {
    return this.enqueue(async () => {
      this.undoStack.push(transaction);
      this.redoStack = [];
      logger.debug('Registered undoable action:', transaction.description);
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.chain.then(task);
    // Tasks handle their own failures; the chain itself never rejects
    this.chain = run.then(() => undefined, () => undefined);
    return run;
  }

  private async step(
    source: Transaction[],
    target: Transaction[],
    direction: 'undo' | 'redo',
  ): Promise<HistoryStepResult> {
    const transaction = source.pop();
    if (!transaction) return { status: 'noop' };

    this.executing = true;
    let succeeded: boolean;
    try {
      succeeded = await transaction[direction]();
    } catch (err) {
      logger.warn(`${direction} of "${transaction.description}" threw:`, errorMessage(err));
      succeeded = false;
    } finally {
      this.executing = false;
    }

    if (succeeded) {
      target.push(transaction);
      logger.debug(`${direction} completed:`, transaction.description);
      return { status: 'completed', description: transaction.description };
    }

    source.push(transaction);
    logger.warn(`${direction} failed, kept in history for retry:`, transaction.description);
    return { status: 'failed', description: transaction.description };
  }
}
