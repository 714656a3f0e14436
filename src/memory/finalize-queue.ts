/**
 * Single-slot background queue per session for consolidation work.
 * The next turn's Recall waits on whenClear(); work for different sessions runs independently.
 */

import { logger, errorMessage } from "../logging";

export class FinalizeQueue {
  private readonly slots = new Map<string, Promise<void>>();

  /**
   * Occupy the session's slot with `task`. If a task is still outstanding the new one runs after
   * it. The slot clears when the task settles, whether it succeeded or not.
   */
  schedule(sessionId: string, task: () => Promise<void>): void {
    const previous = this.slots.get(sessionId) ?? Promise.resolve();
    const slot: Promise<void> = previous
      .then(task)
      .catch((err: unknown) => {
        logger.error({ event: "FINALIZE_TASK_CRASHED", sessionId, err: errorMessage(err) }, "Finalize task threw");
      })
      .finally(() => {
        if (this.slots.get(sessionId) === slot) this.slots.delete(sessionId);
      });
    this.slots.set(sessionId, slot);
  }

  /** Resolves once no finalize work is outstanding for the session. */
  async whenClear(sessionId: string): Promise<void> {
    let slot = this.slots.get(sessionId);
    while (slot) {
      await slot;
      slot = this.slots.get(sessionId);
    }
  }

  isPending(sessionId: string): boolean {
    return this.slots.has(sessionId);
  }

  pending(): number {
    return this.slots.size;
  }

  /** Wait for every session's outstanding work (shutdown, tests). */
  async drain(): Promise<void> {
    while (this.slots.size > 0) {
      await Promise.all([...this.slots.values()]);
    }
  }
}
