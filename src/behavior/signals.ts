/**
 * Lifecycle signals delivered to state handlers through the same channel as
 * ordinary messages. `Activate` and `Deactivate` are shared instances;
 * `Become` and `Unbecome` carry an argument only when the transition that
 * produced them was given one.
 */

export class Activate {
  readonly kind = "Activate" as const;
  static readonly message = new Activate();

  private constructor() {}

  toString(): string {
    return "Activate";
  }
}

export class Deactivate {
  readonly kind = "Deactivate" as const;
  static readonly message = new Deactivate();

  private constructor() {}

  toString(): string {
    return "Deactivate";
  }
}

export class Become<T = undefined> {
  readonly kind = "Become" as const;
  static readonly message = new Become<undefined>(false, undefined);

  private constructor(
    readonly hasArgument: boolean,
    readonly argument: T,
  ) {}

  static with<T>(argument: T): Become<T> {
    return new Become(true, argument);
  }

  toString(): string {
    return this.hasArgument ? `Become<${typeName(this.argument)}>` : "Become";
  }
}

export class Unbecome<T = undefined> {
  readonly kind = "Unbecome" as const;
  static readonly message = new Unbecome<undefined>(false, undefined);

  private constructor(
    readonly hasArgument: boolean,
    readonly argument: T,
  ) {}

  static with<T>(argument: T): Unbecome<T> {
    return new Unbecome(true, argument);
  }

  toString(): string {
    return this.hasArgument
      ? `Unbecome<${typeName(this.argument)}>`
      : "Unbecome";
  }
}

export type Signal =
  | Activate
  | Deactivate
  | Become<unknown>
  | Unbecome<unknown>;

export type SignalKind = Signal["kind"];

export const isSignal = (message: unknown): message is Signal =>
  message instanceof Activate ||
  message instanceof Deactivate ||
  message instanceof Become ||
  message instanceof Unbecome;

export const isActivate = (message: unknown): message is Activate =>
  message instanceof Activate;

export const isDeactivate = (message: unknown): message is Deactivate =>
  message instanceof Deactivate;

export const isBecome = (message: unknown): message is Become<unknown> =>
  message instanceof Become;

export const isUnbecome = (message: unknown): message is Unbecome<unknown> =>
  message instanceof Unbecome;

/** Signals only the transition protocol may produce. */
export const isTransitionSignal = (
  message: unknown,
): message is Become<unknown> | Unbecome<unknown> =>
  isBecome(message) || isUnbecome(message);

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "Object";
  return typeof value;
}

/** Result a handler answers with when it handled a message and has nothing to return. */
export const Done: unique symbol = Symbol.for("behaviors.done");
export type Done = typeof Done;

/** Result a handler answers with to let the state's traits try the message. */
export const Unhandled: unique symbol = Symbol.for("behaviors.unhandled");
export type Unhandled = typeof Unhandled;
