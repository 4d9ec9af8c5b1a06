import { AttributeNotFoundError, SchemaError } from "../errors.js";
import type { TimeSeriesAttribute, TimeSeriesRecord } from "../types.js";
import { parseDate } from "./strftime.js";

/** The part of a time_series response that `timeline` reads. */
export interface TimelineSource {
  result?: { timeline?: readonly string[] };
}

/** The part of a time_series response that `values` reads. */
export interface AttributesSource {
  result?: { attributes?: readonly TimeSeriesAttribute[] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readResult(doc: unknown): Record<string, unknown> {
  const result = isRecord(doc) ? doc.result : undefined;
  if (!isRecord(result)) {
    throw new SchemaError("Time series document has no 'result' object.");
  }
  return result;
}

function readTimeline(doc: unknown): string[] {
  const timeline = readResult(doc).timeline;
  if (!Array.isArray(timeline)) {
    throw new SchemaError("Time series result has no 'timeline' list.");
  }
  return timeline.map((entry, index) => {
    if (typeof entry !== "string") {
      throw new SchemaError(`Timeline entry ${index} is not a string.`);
    }
    return entry;
  });
}

function readAttributes(doc: unknown): unknown[] {
  const attributes = readResult(doc).attributes;
  if (!Array.isArray(attributes)) {
    throw new SchemaError("Time series result has no 'attributes' list.");
  }
  return attributes;
}

function readValues(record: Record<string, unknown>, name: string): number[] {
  const values = record.values;
  if (!Array.isArray(values)) {
    throw new SchemaError(`Time series for attribute '${name}' has no 'values' list.`);
  }
  return values;
}

/**
 * Parse the timeline of a time_series response into dates, in order.
 */
export function timeline(doc: TimelineSource, format: string): Date[] {
  return readTimeline(doc).map((entry) => parseDate(entry, format));
}

/**
 * Values of the first attribute record named `attributeName`.
 */
export function values(doc: AttributesSource, attributeName: string): number[] {
  for (const record of readAttributes(doc)) {
    if (isRecord(record) && record.attribute === attributeName) {
      return readValues(record, attributeName);
    }
  }
  throw new AttributeNotFoundError(attributeName);
}

/**
 * One record per timeline date with every attribute's value at that date.
 * When an attribute name repeats, the first record wins, as in `values`.
 */
export function toRecords(
  doc: TimelineSource & AttributesSource,
  format: string
): TimeSeriesRecord[] {
  const dates = timeline(doc, format);
  const series = new Map<string, number[]>();

  for (const record of readAttributes(doc)) {
    if (!isRecord(record) || typeof record.attribute !== "string") {
      throw new SchemaError("Attribute record has no 'attribute' name.");
    }
    if (series.has(record.attribute)) continue;

    const seriesValues = readValues(record, record.attribute);
    if (seriesValues.length !== dates.length) {
      throw new SchemaError(
        `Time series for attribute '${record.attribute}' has ${seriesValues.length} values for ${dates.length} timeline entries.`
      );
    }
    series.set(record.attribute, seriesValues);
  }

  return dates.map((time, index) => {
    const valuesAtTime: Record<string, number> = {};
    for (const [name, seriesValues] of series) {
      valuesAtTime[name] = seriesValues[index];
    }
    return { time, values: valuesAtTime };
  });
}
