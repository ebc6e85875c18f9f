export { InMemoryBehaviorStore } from "../persistence/adapters/inMemory";
export { create } from "./create";
export { define } from "./define";
export {
  type SupervisionRule,
  type SupervisionRules,
  supervisor,
} from "./supervisor";
