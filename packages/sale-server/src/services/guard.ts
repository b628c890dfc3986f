import { ChainError } from './errors';

/**
 * Component whose state can be rolled back to an earlier point
 */
export interface Revertible {
  /**
   * Capture the current state and return a function that restores it
   */
  checkpoint(): () => void;
}

/**
 * Run `fn` as a single transaction over `parts`.
 * If `fn` throws, every part is restored (in reverse order) and the error rethrown.
 */
export function atomically<T>(parts: Revertible[], fn: () => T): T {
  const restores = parts.map((part) => part.checkpoint());

  try {
    return fn();
  } catch (error) {
    for (const restore of restores.reverse()) {
      restore();
    }
    throw error;
  }
}

/**
 * Call-level busy flag. Any nested entry while a guarded call is running fails.
 */
export class ReentrancyGuard {
  private entered = false;

  run<T>(fn: () => T): T {
    if (this.entered) {
      throw new ChainError('ReentrantCall', 'Reentrant call rejected');
    }

    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }
}
