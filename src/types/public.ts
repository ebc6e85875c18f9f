import type { BehaviorSnapshot, TransitionArgs } from "../behavior/Behavior";
import type { BehaviorStore } from "../persistence/types";
import type { Clock } from "../utils/clock";
import type { _initial, _name, _states, _tag } from "./internal";

export type { BehaviorSnapshot } from "../behavior/Behavior";

/**
 * What a state handler can do to the actor it runs in. Transitions go
 * straight to the actor's behavior, so calling them from a lifecycle hook
 * of a transition in flight is rejected.
 */
export interface ActorContext {
  self: { id: string };
  clock: Clock;
  meta: { definition: string };
  current(): string | null;
  become<T>(state: string, ...args: TransitionArgs<T>): Promise<void>;
  becomeStacked<T>(state: string, ...args: TransitionArgs<T>): Promise<void>;
  unbecome<T>(...args: TransitionArgs<T>): Promise<void>;
}

export type StateHandler = (
  message: unknown,
  ctx: ActorContext,
) => Promise<unknown>;

export interface StateDefinition {
  readonly name: string;
  readonly handler: StateHandler;
  readonly traits: readonly StateHandler[];
}

export interface ActorDefinition<
  TName extends string = string,
  TStates extends string = string,
> {
  readonly [_tag]: "ActorDefinition";
  readonly [_name]: TName;
  readonly [_states]: ReadonlyMap<string, StateDefinition>;
  readonly [_initial]: TStates;
}

export type AnyActorDefinition = ActorDefinition<string, string>;

// SUPERVISION

/**
 * The strategies a supervisor can choose to handle an error.
 */
export type SupervisorStrategy = "resume" | "reset" | "stop";

export interface Supervisor {
  /** `state` is the state the failing turn ended in. */
  strategy(state: string | null, error: Error): SupervisorStrategy;
}

// METRICS

export interface ActorMetrics {
  onActivate?: (id: string, state: string) => void;
  onDeactivate?: (id: string, state: string) => void;
  onTransition?: (id: string, from: string, to: string, etag: string) => void;
  onEvict?: (id: string) => void;
  onError?: (id: string, error: Error) => void;
}

// SYSTEM

export interface ActorSystemConfig<TDef extends AnyActorDefinition> {
  definition: TDef;
  store?: BehaviorStore;
  passivation?: {
    idleAfter: number; // ms
    sweepInterval?: number; // ms, default 60_000
  };
  supervisor?: Supervisor;
  metrics?: ActorMetrics;
  clock?: Clock;
}

export interface ActorRef {
  readonly id: string;
  tell(message: unknown): Promise<unknown>;
  inspect(): Promise<BehaviorSnapshot>;
  stop(): Promise<void>;
}

export interface ActorSystem {
  get(id: string): ActorRef;
  stop(): Promise<void>;
}
