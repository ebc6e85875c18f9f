/**
 * Handles one message for a state. Lifecycle signals arrive here too.
 * Answering anything other than a promise (or a plain value) is a contract
 * violation the behavior reports.
 */
export type Receive = (message: unknown) => Promise<unknown>;

export interface StateOptions {
  /** Tried in order when the state's own handler answers `Unhandled`. */
  traits?: readonly Receive[];
}

export interface State {
  readonly name: string;
  readonly receive: Receive;
  readonly traits: readonly Receive[];
}

export function createState(
  name: string,
  receive: Receive,
  options: StateOptions = {},
): State {
  return Object.freeze({
    name,
    receive,
    traits: Object.freeze([...(options.traits ?? [])]),
  });
}
