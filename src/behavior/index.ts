export {
  Behavior,
  type BehaviorOptions,
  type BehaviorSnapshot,
  type Target,
  type TransitionArgs,
} from "./Behavior";
export * from "./signals";
export { createState, type Receive, type State, type StateOptions } from "./state";
export { type GuardState, TransitionGuard } from "./TransitionGuard";
