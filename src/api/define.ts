import { ConfigurationError } from "../errors";
import { _initial, _name, _states, _tag } from "../types/internal";
import type {
  ActorDefinition,
  StateDefinition,
  StateHandler,
} from "../types/public";

class DefinitionBuilder<TName extends string, TStates extends string = never> {
  constructor(
    private readonly name: TName,
    private readonly states: ReadonlyMap<string, StateDefinition>,
    private readonly initialState?: TStates,
  ) {}

  public state<const S extends string>(
    name: S,
    handler: StateHandler,
    options: { traits?: readonly StateHandler[] } = {},
  ): DefinitionBuilder<TName, TStates | S> {
    if (this.states.has(name)) {
      throw new ConfigurationError(
        `State "${name}" is already defined on ${this.name}`,
      );
    }
    const states = new Map(this.states);
    states.set(
      name,
      Object.freeze({
        name,
        handler,
        traits: Object.freeze([...(options.traits ?? [])]),
      }),
    );
    return new DefinitionBuilder<TName, TStates | S>(
      this.name,
      states,
      this.initialState,
    );
  }

  public initial(name: TStates): DefinitionBuilder<TName, TStates> {
    return new DefinitionBuilder(this.name, this.states, name);
  }

  public build(): ActorDefinition<TName, TStates> {
    const initial = this.initialState;
    if (initial === undefined) {
      throw new ConfigurationError(`${this.name} has no initial state`);
    }
    if (!this.states.has(initial)) {
      throw new ConfigurationError(
        `Initial state "${initial}" is not defined on ${this.name}`,
      );
    }
    return {
      [_tag]: "ActorDefinition" as const,
      [_name]: this.name,
      [_states]: new Map(this.states),
      [_initial]: initial,
    };
  }
}

export function define<TName extends string>(name: TName) {
  return new DefinitionBuilder<TName>(name, new Map());
}
