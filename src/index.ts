export * from "./api/index";
export * from "./behavior/index";
export * from "./errors/index";
export { createModuleLogger, logger } from "./logging/logger";
export type { BehaviorStore } from "./persistence/types";
export { describeMessage } from "./serde/index";
export { _initial, _name, _states, _tag } from "./types/internal";
export type * from "./types/public";
export type { Clock } from "./utils/clock";
