import type { HttpTransport } from "./http/transport.js";

export interface ClientOptions {
  /**
   * Per-request timeout in milliseconds.
   * Falls back to the WTSS_TIMEOUT_MS env var; no timeout when neither is set.
   */
  timeoutMs?: number;
  /** Replaces the default fetch-based transport (useful for tests and proxies) */
  transport?: HttpTransport;
  /**
   * When true (default), a response outside 200-299 fails with ServiceError
   * before its body is decoded. When false, the body is decoded regardless of status.
   */
  rejectNonSuccessStatus?: boolean;
}

export interface CoverageList {
  coverages: string[];
}

/** Service-defined coverage schema; not validated by the client. */
export type CoverageDescription = Record<string, unknown>;

export interface TimeSeriesAttribute {
  attribute: string;
  values: number[];
}

export interface TimeSeriesResult {
  timeline: string[];
  attributes: TimeSeriesAttribute[];
  [key: string]: unknown;
}

export interface TimeSeriesDocument {
  result: TimeSeriesResult;
  [key: string]: unknown;
}

/**
 * Attribute names as accepted by `timeSeries`: a list of names, or a string
 * already formatted as a comma-separated list.
 */
export type AttributesInput = string | readonly string[];

export type ResolvedAttributes =
  | { kind: "list"; names: readonly string[] }
  | { kind: "joined"; value: string };

export interface TimeSeriesRecord {
  time: Date;
  values: Record<string, number>;
}
