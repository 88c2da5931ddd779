import type { Logger } from '../utils/log';
import { errorMessage } from '../utils/log';

export type PlaybackTask = () => Promise<void>;

/**
 * Strict FIFO chain of whole-trigger animations. A task starts only after
 * the previous one settled; a failing task is logged and the chain moves on.
 */
export class PlaybackQueue {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  constructor(private readonly logger: Logger) {}

  /** Tasks enqueued but not yet settled, the running one included. */
  get pending(): number {
    return this.waiting;
  }

  enqueue(task: PlaybackTask): Promise<void> {
    this.waiting += 1;
    this.tail = this.tail
      .then(task)
      .catch((err: unknown) => {
        this.logger.error('Animation failed', errorMessage(err));
      })
      .finally(() => {
        this.waiting -= 1;
      });
    return this.tail;
  }

  /** Resolves once every task enqueued so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }
}
