import superjson from "superjson";
import { isSignal } from "../behavior/signals";
import type { BehaviorSnapshot } from "../behavior/Behavior";

export const serialize = (value: unknown): string => superjson.stringify(value);

export const deserialize = <T = unknown>(value: string): T =>
  superjson.parse<T>(value);

const className = (value: object): string | null => {
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype || Array.isArray(value)) {
    return null;
  }
  return value.constructor.name || null;
};

/**
 * Textual form of a message for error text and logs. Strings are kept
 * verbatim, signals print their own name, class instances are prefixed
 * with their class.
 */
export const describeMessage = (message: unknown): string => {
  if (typeof message === "string") return message;
  if (isSignal(message)) return message.toString();
  if (typeof message !== "object" || message === null) return String(message);

  let json: string;
  try {
    json = JSON.stringify(superjson.serialize(message).json);
  } catch {
    json = String(message);
  }
  const name = className(message);
  return name ? `${name} ${json}` : json;
};

export const isBehaviorSnapshot = (value: unknown): value is BehaviorSnapshot => {
  if (typeof value !== "object" || value === null) return false;
  if (!("current" in value) || !("stack" in value) || !("etag" in value)) {
    return false;
  }
  return (
    typeof value.current === "string" &&
    typeof value.etag === "string" &&
    Array.isArray(value.stack) &&
    value.stack.every((name: unknown) => typeof name === "string")
  );
};
