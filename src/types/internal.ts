// Branded symbols to hide internal properties from the public API and prevent accidental access.
export const _name = Symbol.for("behaviors_name");
export const _states = Symbol.for("behaviors_states");
export const _initial = Symbol.for("behaviors_initial");
export const _tag = Symbol.for("behaviors_tag");
