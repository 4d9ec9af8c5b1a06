/**
 * A strptime-style date parser for the `timeline` helpers.
 *
 * Supported directives: %Y %y %m %d %H %M %S %f %j %b %B %h %%.
 * Whitespace in the format matches one or more whitespace characters, any
 * other character matches itself, and the whole input must be consumed.
 * Parsed dates are built in UTC; fields missing from the format default to
 * 1900-01-01T00:00:00.
 */

import { InvalidArgumentError, ParseError } from "../errors.js";

type Field =
  | "year"
  | "shortYear"
  | "month"
  | "monthName"
  | "day"
  | "hour"
  | "minute"
  | "second"
  | "fraction"
  | "dayOfYear";

interface CompiledFormat {
  regex: RegExp;
  fields: Field[];
}

const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const MONTH_ABBREVIATIONS = MONTH_NAMES.map((name) => name.slice(0, 3));

const DIRECTIVES: Record<string, { field: Field; pattern: string }> = {
  Y: { field: "year", pattern: "\\d{4}" },
  y: { field: "shortYear", pattern: "\\d{2}" },
  m: { field: "month", pattern: "\\d{1,2}" },
  d: { field: "day", pattern: "\\d{1,2}" },
  H: { field: "hour", pattern: "\\d{1,2}" },
  M: { field: "minute", pattern: "\\d{1,2}" },
  S: { field: "second", pattern: "\\d{1,2}" },
  f: { field: "fraction", pattern: "\\d{1,6}" },
  j: { field: "dayOfYear", pattern: "\\d{1,3}" },
  b: { field: "monthName", pattern: MONTH_ABBREVIATIONS.join("|") },
  h: { field: "monthName", pattern: MONTH_ABBREVIATIONS.join("|") },
  B: { field: "monthName", pattern: MONTH_NAMES.join("|") },
};

const compiledFormats = new Map<string, CompiledFormat>();

function escapeRegex(char: string): string {
  return char.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

function compileFormat(format: string): CompiledFormat {
  const cached = compiledFormats.get(format);
  if (cached) return cached;

  const fields: Field[] = [];
  let source = "";

  for (let i = 0; i < format.length; i++) {
    const char = format[i];

    if (char === "%") {
      const code = format[i + 1];
      i++;
      if (code === "%") {
        source += "%";
        continue;
      }
      const directive = code === undefined ? undefined : DIRECTIVES[code];
      if (!directive) {
        throw new InvalidArgumentError(
          `Unsupported date directive '%${code ?? ""}' in format '${format}'.`
        );
      }
      fields.push(directive.field);
      source += `(${directive.pattern})`;
      continue;
    }

    if (/\s/.test(char)) {
      // Collapse whitespace runs in the format into a single \s+
      if (!source.endsWith("\\s+")) source += "\\s+";
      continue;
    }

    source += escapeRegex(char);
  }

  const compiled = { regex: new RegExp(`^${source}$`, "i"), fields };
  compiledFormats.set(format, compiled);
  return compiled;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Parse `value` with the strftime-style `format`.
 *
 * @throws ParseError when the value does not match or names an impossible date
 * @throws InvalidArgumentError when the format uses an unsupported directive
 */
export function parseDate(value: string, format: string): Date {
  const { regex, fields } = compileFormat(format);
  const match = regex.exec(value);
  if (!match) {
    throw new ParseError(
      `time data '${value}' does not match format '${format}'`,
      value,
      format
    );
  }

  let year = 1900;
  let month: number | undefined;
  let day: number | undefined;
  let hour = 0;
  let minute = 0;
  let second = 0;
  let milliseconds = 0;
  let dayOfYear: number | undefined;

  for (const [index, field] of fields.entries()) {
    const raw = match[index + 1];
    switch (field) {
      case "year":
        year = Number(raw);
        break;
      case "shortYear": {
        const short = Number(raw);
        year = short < 69 ? 2000 + short : 1900 + short;
        break;
      }
      case "month":
        month = Number(raw);
        break;
      case "monthName":
        month = MONTH_ABBREVIATIONS.indexOf(raw.slice(0, 3).toLowerCase()) + 1;
        break;
      case "day":
        day = Number(raw);
        break;
      case "hour":
        hour = Number(raw);
        break;
      case "minute":
        minute = Number(raw);
        break;
      case "second":
        second = Number(raw);
        break;
      case "fraction":
        milliseconds = Math.floor(Number(raw.padEnd(6, "0")) / 1000);
        break;
      case "dayOfYear":
        dayOfYear = Number(raw);
        break;
    }
  }

  const invalid = (reason: string): ParseError =>
    new ParseError(`time data '${value}' is not a valid date: ${reason}`, value, format);

  if (hour > 23) throw invalid("hour out of range");
  if (minute > 59) throw invalid("minute out of range");
  if (second > 59) throw invalid("second out of range");

  const date = new Date(0);

  if (dayOfYear !== undefined && month === undefined && day === undefined) {
    const daysInYear = isLeapYear(year) ? 366 : 365;
    if (dayOfYear < 1 || dayOfYear > daysInYear) throw invalid("day of year out of range");
    date.setUTCFullYear(year, 0, dayOfYear);
  } else {
    const resolvedMonth = month ?? 1;
    const resolvedDay = day ?? 1;
    if (resolvedMonth < 1 || resolvedMonth > 12) throw invalid("month out of range");
    if (resolvedDay < 1 || resolvedDay > daysInMonth(year, resolvedMonth)) {
      throw invalid("day is out of range for month");
    }
    date.setUTCFullYear(year, resolvedMonth - 1, resolvedDay);
  }

  date.setUTCHours(hour, minute, second, milliseconds);
  return date;
}
