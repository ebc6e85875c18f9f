import type { Supervisor, SupervisorStrategy } from "../types/public";

type Guard = (state: string | null, error: Error) => boolean;

/** A guard, a constant, or the state names the rule applies in. */
export type SupervisionRule = boolean | Guard | readonly string[];

export interface SupervisionRules {
  resume?: SupervisionRule;
  reset?: SupervisionRule;
  stop?: SupervisionRule;
  default?: SupervisorStrategy;
}

const toGuard = (rule: SupervisionRule | undefined): Guard | undefined => {
  if (rule === undefined) return undefined;
  if (typeof rule === "function") return rule;
  if (typeof rule === "boolean") return () => rule;
  return (state) => state !== null && rule.includes(state);
};

/**
 * Builds a Supervisor from rules. Rules see the state the failing turn
 * ended in, which is the target state when a handler fails after asking
 * for a transition.
 *
 * Usage:
 *   const sup = supervisor({
 *     resume: (state, err) => err.name === "ValidationError",
 *     stop: ["closing"],
 *     default: "reset",
 *   });
 */
export function supervisor(rules: SupervisionRules): Supervisor {
  // stop, then reset, then resume
  const ordered: [SupervisorStrategy, Guard | undefined][] = [
    ["stop", toGuard(rules.stop)],
    ["reset", toGuard(rules.reset)],
    ["resume", toGuard(rules.resume)],
  ];
  const fallback = rules.default ?? "resume";

  return {
    strategy(state, error) {
      for (const [strategy, guard] of ordered) {
        if (guard?.(state, error)) return strategy;
      }
      return fallback;
    },
  };
}
