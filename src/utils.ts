import { COORDINATE_DIGITS } from "./constants.js";
import { InvalidArgumentError } from "./errors.js";
import type { ResolvedAttributes } from "./types.js";

export function getEnv(name: string): string | undefined {
  // Works in Node.js; silently returns undefined in browsers
  try {
    return typeof process !== "undefined" ? process.env[name] : undefined;
  } catch {
    return undefined;
  }
}

export function parseTimeout(value: number | string | undefined): number | undefined {
  if (value === undefined || (typeof value === "string" && value.trim() === "")) {
    return undefined;
  }
  const timeout = Number(value);
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new InvalidArgumentError(
      `Invalid timeout '${value}': expected a positive number of milliseconds.`
    );
  }
  return timeout;
}

function isStringList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Checks the shape of a caller-supplied attribute selection.
 * Accepts `unknown` so that untyped callers get the same errors as typed ones.
 */
export function resolveAttributes(attributes: unknown): ResolvedAttributes {
  if (
    attributes === undefined ||
    attributes === null ||
    attributes === "" ||
    (Array.isArray(attributes) && attributes.length === 0)
  ) {
    throw new InvalidArgumentError("Missing coverage attributes.");
  }

  if (typeof attributes === "string") {
    return { kind: "joined", value: attributes };
  }
  if (isStringList(attributes)) {
    return { kind: "list", names: attributes };
  }
  throw new InvalidArgumentError("attributes must be a list, tuple or string");
}

export function joinAttributes(resolved: ResolvedAttributes): string {
  return resolved.kind === "list" ? resolved.names.join(",") : resolved.value;
}

/**
 * Percent-encodes a query value, leaving commas literal so attribute lists stay readable.
 */
export function encodeQueryValue(value: string): string {
  return encodeURIComponent(value).replace(/%2C/gi, ",");
}

/** Fixed decimal notation, never exponent form: -12 -> "-12.000000". */
export function formatCoordinate(value: number): string {
  return value.toFixed(COORDINATE_DIGITS);
}

export function assertInRange(
  value: number,
  range: { min: number; max: number },
  message: string
): void {
  // NaN fails both comparisons and is rejected here
  if (!(value >= range.min && value <= range.max)) {
    throw new InvalidArgumentError(message);
  }
}
