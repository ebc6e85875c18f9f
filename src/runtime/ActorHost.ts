import type { Logger } from "pino";
import { Behavior, type BehaviorSnapshot } from "../behavior/Behavior";
import { Activate, Deactivate } from "../behavior/signals";
import type { Receive } from "../behavior/state";
import { CommitError, ResetError, StoppedActorError } from "../errors";
import { createModuleLogger } from "../logging/logger";
import type { BehaviorStore } from "../persistence/types";
import { _initial, _name, _states } from "../types/internal";
import type {
  ActorContext,
  ActorMetrics,
  AnyActorDefinition,
  StateHandler,
  Supervisor,
} from "../types/public";
import { type Clock, WallClock } from "../utils/clock";
import { Mailbox } from "./Mailbox";

type HostStatus = "pending" | "active" | "failed" | "stopped";

/**
 * Hosts one actor: builds its behavior from the definition, activates it on
 * first use and serializes every call into it through a mailbox.
 */
export class ActorHost {
  private behavior: Behavior | null = null;
  private status: HostStatus = "pending";
  private mailbox = new Mailbox();
  private lastTouch: number;
  private committedEtag: string | null = null;
  private readonly log: Logger;

  constructor(
    public readonly id: string,
    private readonly def: AnyActorDefinition,
    private readonly store?: BehaviorStore,
    private readonly supervisor?: Supervisor,
    private readonly metrics?: ActorMetrics,
    private readonly clock: Clock = WallClock,
  ) {
    this.lastTouch = this.clock.now();
    this.log = createModuleLogger("host").child({
      actor: id,
      definition: def[_name],
    });
  }

  get isFailed(): boolean {
    return this.status === "failed";
  }

  get isShutdown(): boolean {
    return this.status === "stopped";
  }

  get lastActivity(): number {
    return this.lastTouch;
  }

  public tell = (message: unknown): Promise<unknown> => {
    return this.mailbox.enqueue(async () => {
      const behavior = await this.ensureActive();
      const from = behavior.current?.name ?? null;

      let result: unknown;
      try {
        result = await behavior.receive(message);
      } catch (e) {
        const error = e instanceof Error ? e : new Error(String(e));
        this.metrics?.onError?.(this.id, error);
        return this.supervise(behavior, error);
      }
      await this.commit(behavior, from);
      return result;
    });
  };

  public inspect = (): Promise<BehaviorSnapshot> => {
    return this.mailbox.enqueue(async () => {
      const behavior = await this.ensureActive();
      return behavior.snapshot();
    });
  };

  /**
   * Delivers `Deactivate` to the current state once and stops the host.
   * A host that never activated just stops.
   */
  public deactivate = (): Promise<void> => {
    return this.mailbox.enqueue(async () => {
      const behavior = this.behavior;
      if (this.status !== "active" || !behavior) {
        this.status = this.status === "failed" ? "failed" : "stopped";
        return;
      }

      const from = behavior.current?.name ?? null;
      try {
        await behavior.receive(Deactivate.message);
        await this.commit(behavior, from);
      } finally {
        if (this.status === "active") this.status = "stopped";
        this.behavior = null;
      }

      const state = behavior.current?.name ?? "";
      this.log.debug({ state }, "actor deactivated");
      this.metrics?.onDeactivate?.(this.id, state);
    });
  };

  private async ensureActive(): Promise<Behavior> {
    this.lastTouch = this.clock.now();
    if (this.status === "failed" || this.status === "stopped") {
      throw new StoppedActorError(this.id);
    }
    if (this.behavior) return this.behavior;

    const behavior = this.build();
    this.behavior = behavior;
    try {
      const stored = this.store ? await this.store.load(this.id) : null;
      if (stored) {
        behavior.restore(stored);
        this.committedEtag = stored.etag;
      } else {
        behavior.initial(this.def[_initial]);
        this.committedEtag = null;
      }

      const from = behavior.current?.name ?? null;
      await behavior.receive(Activate.message);
      await this.commit(behavior, from);
    } catch (e) {
      this.behavior = null;
      throw e;
    }

    this.status = "active";
    const state = behavior.current?.name ?? "";
    this.log.debug({ state, etag: behavior.etag }, "actor activated");
    this.metrics?.onActivate?.(this.id, state);
    return behavior;
  }

  private build(): Behavior {
    const behavior = new Behavior({ logger: this.log });
    const ctx = this.contextFor(behavior);
    const bind =
      (handler: StateHandler): Receive =>
      (message) =>
        handler(message, ctx);

    for (const state of this.def[_states].values()) {
      behavior.registerState(state.name, bind(state.handler), {
        traits: state.traits.map(bind),
      });
    }
    return behavior;
  }

  private contextFor(behavior: Behavior): ActorContext {
    return {
      self: { id: this.id },
      clock: this.clock,
      meta: { definition: this.def[_name] },
      current: () => behavior.current?.name ?? null,
      become: (state, ...args) => behavior.become(state, ...args),
      becomeStacked: (state, ...args) => behavior.becomeStacked(state, ...args),
      unbecome: (...args) => behavior.unbecome(...args),
    };
  }

  /**
   * Persists the behavior when its etag moved since the last commit. The
   * stored etag doubles as the expected value for the next save.
   *
   * A failed save fails the host: the behavior in memory is ahead of the
   * store, so the next `get` starts over from what the store holds.
   */
  private async commit(behavior: Behavior, from: string | null) {
    const snapshot = behavior.snapshot();
    if (snapshot.etag === this.committedEtag) return;

    if (this.store) {
      try {
        await this.store.save(this.id, snapshot, this.committedEtag);
      } catch (e) {
        this.log.error({ err: e, etag: snapshot.etag }, "behavior commit failed");
        this.status = "failed";
        this.behavior = null;
        const error =
          e instanceof CommitError
            ? e
            : new CommitError(`Failed to persist behavior of ${this.id}`, e);
        this.metrics?.onError?.(this.id, error);
        throw error;
      }
    }

    const isBaseline = this.committedEtag === null;
    this.committedEtag = snapshot.etag;
    if (!isBaseline && from !== null) {
      this.log.debug(
        { from, to: snapshot.current, etag: snapshot.etag },
        "behavior committed",
      );
      this.metrics?.onTransition?.(this.id, from, snapshot.current, snapshot.etag);
    }
  }

  /**
   * Applies the supervisor's decision for a failed turn. The decision sees
   * the state the turn ended in. The caller always gets an error: its own
   * on `resume` and `stop`, a ResetError on `reset`.
   */
  private async supervise(behavior: Behavior, error: Error): Promise<never> {
    if (!this.supervisor) throw error;

    const state = behavior.current?.name ?? null;
    const strategy = this.supervisor.strategy(state, error);
    switch (strategy) {
      case "resume":
        throw error;
      case "reset":
        this.log.warn({ state, err: error }, "resetting actor");
        this.behavior = null;
        this.committedEtag = null;
        this.status = "pending";
        await this.store?.clear(this.id);
        throw new ResetError(error);
      case "stop":
        this.log.warn({ state, err: error }, "stopping actor");
        this.status = "failed";
        this.behavior = null;
        throw error;
    }
  }
}
