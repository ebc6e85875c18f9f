import type { Logger } from "pino";
import {
  ConfigurationError,
  HandlerContractError,
  ProtocolViolationError,
} from "../errors";
import { createModuleLogger } from "../logging/logger";
import { describeMessage } from "../serde";
import { newId } from "../utils/id";
import {
  Activate,
  Become,
  Deactivate,
  isTransitionSignal,
  Unbecome,
  Unhandled,
} from "./signals";
import { createState, type Receive, type State, type StateOptions } from "./state";
import { TransitionGuard } from "./TransitionGuard";

/** A registered state name, or a handler to switch to as an anonymous state. */
export type Target = string | Receive;

/** Transition operations take at most one argument; none means no argument at all. */
export type TransitionArgs<T> = [] | [argument: T];

export interface BehaviorSnapshot {
  readonly current: string;
  readonly stack: readonly string[];
  readonly etag: string;
}

export interface BehaviorOptions {
  logger?: Logger;
}

/**
 * Switchable message handling for a single actor. Owns the current state,
 * the registry of named states, the stack used by stacked transitions and
 * the etag that changes on every committed transition.
 *
 * Not synchronized: callers must wait for each returned promise to settle
 * before issuing the next operation. Transitions started from inside a
 * lifecycle hook of an in-flight transition are rejected.
 */
export class Behavior {
  readonly #registry = new Map<string, State>();
  readonly #stack: string[] = [];
  readonly #guard = new TransitionGuard();
  readonly #log: Logger;
  #current: State | null = null;
  #etag: string | null = null;
  #anonymous = 0;

  constructor(options: BehaviorOptions = {}) {
    this.#log = options.logger ?? createModuleLogger("behavior");
  }

  get current(): State | null {
    return this.#current;
  }

  get etag(): string | null {
    return this.#etag;
  }

  get stack(): readonly string[] {
    return [...this.#stack];
  }

  get isTransitioning(): boolean {
    return this.#guard.state === "transitioning";
  }

  registerState(name: string, receive: Receive, options?: StateOptions): this {
    if (this.#registry.has(name)) {
      throw new ConfigurationError(`State "${name}" is already registered`);
    }
    this.#registry.set(name, createState(name, receive, options));
    return this;
  }

  /** Sets the starting state without running any lifecycle hook. */
  initial(target: Target): void {
    this.#requireUnset();
    this.#current = this.#resolve(target);
    this.#etag = newId();
  }

  /** Silent baseline from a previously taken snapshot, etag included. */
  restore(snapshot: BehaviorSnapshot): void {
    this.#requireUnset();
    const current = this.#lookup(snapshot.current);
    for (const name of snapshot.stack) this.#lookup(name);

    this.#current = current;
    this.#stack.splice(0, this.#stack.length, ...snapshot.stack);
    this.#etag = snapshot.etag;
  }

  snapshot(): BehaviorSnapshot {
    const current = this.#requireCurrent("snapshot");
    const etag = this.#etag;
    if (etag === null) {
      throw new ConfigurationError("Behavior has no etag before initial");
    }
    return { current: current.name, stack: [...this.#stack], etag };
  }

  become<T>(target: Target, ...args: TransitionArgs<T>): Promise<void> {
    return this.#transition("become", target, false, args);
  }

  becomeStacked<T>(target: Target, ...args: TransitionArgs<T>): Promise<void> {
    return this.#transition("becomeStacked", target, true, args);
  }

  async unbecome<T>(...args: TransitionArgs<T>): Promise<void> {
    this.#requireCurrent("unbecome");
    await this.#guard.run("unbecome", async () => {
      const previous = this.#stack.pop();
      if (previous === undefined) {
        throw new ProtocolViolationError(
          "Behavior stack is empty, there is no previous behavior to return to",
        );
      }
      const leaving = args.length === 1 ? Unbecome.with(args[0]) : Unbecome.message;
      const arriving = args.length === 1 ? Become.with(args[0]) : Become.message;
      await this.#switch(this.#lookup(previous), leaving, arriving, false);
    });
  }

  async receive(message: unknown): Promise<unknown> {
    const current = this.#requireCurrent("receive");
    if (isTransitionSignal(message)) {
      throw new ProtocolViolationError(
        `'${describeMessage(message)}' is delivered by transitions only and cannot be received directly`,
      );
    }
    return this.#dispatch(current, message);
  }

  async #transition<T>(
    operation: string,
    target: Target,
    stacked: boolean,
    args: TransitionArgs<T>,
  ): Promise<void> {
    this.#requireCurrent(operation);
    await this.#guard.run(operation, async () => {
      const next = this.#resolve(target);
      const arriving = args.length === 1 ? Become.with(args[0]) : Become.message;
      await this.#switch(next, Unbecome.message, arriving, stacked);
    });
  }

  // Failures leave current and stack where they stood; the etag only moves on success.
  async #switch(
    next: State,
    leaving: Unbecome<unknown>,
    arriving: Become<unknown>,
    stacked: boolean,
  ): Promise<void> {
    const previous = this.#requireCurrent("switch");

    await this.#dispatch(previous, Deactivate.message);
    await this.#dispatch(previous, leaving);

    if (stacked) this.#stack.push(previous.name);
    this.#current = next;

    await this.#dispatch(next, arriving);
    await this.#dispatch(next, Activate.message);

    this.#etag = newId();
    this.#log.trace(
      { from: previous.name, to: next.name, depth: this.#stack.length },
      "behavior switched",
    );
  }

  async #dispatch(state: State, message: unknown): Promise<unknown> {
    let result = await this.#invoke(state.receive, message);
    for (const trait of state.traits) {
      if (result !== Unhandled) break;
      result = await this.#invoke(trait, message);
    }
    return result;
  }

  #invoke(receive: Receive, message: unknown): Promise<unknown> {
    const pending: Promise<unknown> | null | undefined = receive(message);
    if (pending === null || pending === undefined) {
      throw new HandlerContractError(
        `Behavior returns null task on handling '${describeMessage(message)}' message`,
      );
    }
    return pending;
  }

  #resolve(target: Target): State {
    if (typeof target === "string") return this.#lookup(target);

    for (const state of this.#registry.values()) {
      if (state.receive === target) return state;
    }
    const name =
      target.name && !this.#registry.has(target.name)
        ? target.name
        : `anonymous#${++this.#anonymous}`;
    this.registerState(name, target);
    return this.#lookup(name);
  }

  #lookup(name: string): State {
    const state = this.#registry.get(name);
    if (!state) {
      throw new ConfigurationError(`State "${name}" is not registered`);
    }
    return state;
  }

  #requireCurrent(operation: string): State {
    if (!this.#current) {
      throw new ConfigurationError(
        `Initial behavior should be set before calling ${operation}`,
      );
    }
    return this.#current;
  }

  #requireUnset(): void {
    if (this.#current) {
      throw new ConfigurationError("Initial behavior has been already set");
    }
  }
}
