import { describe, expect, it } from "vitest";
import { parseDate } from "../src/time-series/strftime.js";
import { InvalidArgumentError, ParseError } from "../src/errors.js";

describe("parseDate", () => {
  it("parses ISO-style dates in UTC", () => {
    expect(parseDate("2020-01-17", "%Y-%m-%d").toISOString()).toBe("2020-01-17T00:00:00.000Z");
  });

  it("accepts single-digit month and day", () => {
    expect(parseDate("2020/1/7", "%Y/%m/%d").toISOString()).toBe("2020-01-07T00:00:00.000Z");
  });

  it("parses time of day and fractional seconds", () => {
    expect(parseDate("2019-12-31 23:59:58.25", "%Y-%m-%d %H:%M:%S.%f").toISOString()).toBe(
      "2019-12-31T23:59:58.250Z"
    );
  });

  it("matches runs of whitespace against a single space in the format", () => {
    expect(parseDate("2019-12-31   10:00", "%Y-%m-%d %H:%M").toISOString()).toBe(
      "2019-12-31T10:00:00.000Z"
    );
  });

  it("parses month names case-insensitively", () => {
    expect(parseDate("17 JAN 2020", "%d %b %Y").toISOString()).toBe("2020-01-17T00:00:00.000Z");
    expect(parseDate("2 february 2021", "%d %B %Y").toISOString()).toBe(
      "2021-02-02T00:00:00.000Z"
    );
  });

  it("maps two-digit years around 1969", () => {
    expect(parseDate("68-03-01", "%y-%m-%d").getUTCFullYear()).toBe(2068);
    expect(parseDate("69-03-01", "%y-%m-%d").getUTCFullYear()).toBe(1969);
  });

  it("resolves a day of year", () => {
    expect(parseDate("2020-060", "%Y-%j").toISOString()).toBe("2020-02-29T00:00:00.000Z");
  });

  it("defaults missing fields to 1900-01-01", () => {
    expect(parseDate("05", "%m").toISOString()).toBe("1900-05-01T00:00:00.000Z");
  });

  it("treats %% as a literal percent sign", () => {
    expect(parseDate("2020%03", "%Y%%%m").toISOString()).toBe("2020-03-01T00:00:00.000Z");
  });

  it("rejects input that does not match the format", () => {
    expect(() => parseDate("17/01/2020", "%Y-%m-%d")).toThrow(
      new ParseError("time data '17/01/2020' does not match format '%Y-%m-%d'", "17/01/2020", "%Y-%m-%d")
    );
  });

  it("rejects trailing characters", () => {
    expect(() => parseDate("2020-01-01T00:00", "%Y-%m-%d")).toThrow(ParseError);
  });

  it("rejects impossible calendar dates", () => {
    expect(() => parseDate("2021-02-29", "%Y-%m-%d")).toThrow(
      "time data '2021-02-29' is not a valid date: day is out of range for month"
    );
    expect(() => parseDate("2021-13-01", "%Y-%m-%d")).toThrow(
      "time data '2021-13-01' is not a valid date: month out of range"
    );
    expect(() => parseDate("2021-01-01 24:00", "%Y-%m-%d %H:%M")).toThrow(
      "time data '2021-01-01 24:00' is not a valid date: hour out of range"
    );
  });

  it("rejects unsupported directives", () => {
    expect(() => parseDate("Monday", "%A")).toThrow(
      new InvalidArgumentError("Unsupported date directive '%A' in format '%A'.")
    );
    expect(() => parseDate("2020", "%Y%")).toThrow(InvalidArgumentError);
  });
});
