import { ProtocolViolationError } from "../errors";

export type GuardState = "idle" | "transitioning";

export class TransitionGuard {
  #state: GuardState = "idle";

  get state(): GuardState {
    return this.#state;
  }

  /**
   * Runs `task` holding the guard. A second acquisition while the first is
   * held is rejected without touching the guard, so the outer holder still
   * releases it.
   */
  async run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    if (this.#state === "transitioning") {
      throw new ProtocolViolationError(
        `Cannot ${operation} while a transition is already in progress`,
      );
    }
    this.#state = "transitioning";
    try {
      return await task();
    } finally {
      this.#state = "idle";
    }
  }
}
