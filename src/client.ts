import {
  DEFAULT_WTSS_HOST,
  LATITUDE_RANGE,
  LONGITUDE_RANGE,
  WTSS_HOST_ENV,
  WTSS_TIMEOUT_ENV,
} from "./constants.js";
import { DecodeError, InvalidArgumentError, ServiceError } from "./errors.js";
import { fetchTransport, type HttpTransport } from "./http/transport.js";
import {
  timeline,
  toRecords,
  values,
  type AttributesSource,
  type TimelineSource,
} from "./time-series/document.js";
import type {
  AttributesInput,
  ClientOptions,
  CoverageDescription,
  CoverageList,
  TimeSeriesDocument,
  TimeSeriesRecord,
} from "./types.js";
import {
  assertInRange,
  encodeQueryValue,
  formatCoordinate,
  getEnv,
  joinAttributes,
  parseTimeout,
  resolveAttributes,
} from "./utils.js";

/**
 * Client for a Web Time Series Service (WTSS).
 *
 * @example
 * ```typescript
 * const client = new WtssClient("http://www.dpi.inpe.br/tws");
 * const { coverages } = await client.listCoverages();
 * const doc = await client.timeSeries("mod13q1_512", ["red", "nir"], -12, -54);
 * const dates = WtssClient.timeline(doc, "%Y-%m-%d");
 * const red = WtssClient.values(doc, "red");
 * ```
 */
export class WtssClient {
  readonly host: string;
  private readonly timeoutMs?: number;
  private readonly transport: HttpTransport;
  private readonly rejectNonSuccessStatus: boolean;

  constructor(host?: string, options: ClientOptions = {}) {
    this.host = host ?? (getEnv(WTSS_HOST_ENV) || DEFAULT_WTSS_HOST);
    this.timeoutMs = parseTimeout(options.timeoutMs ?? getEnv(WTSS_TIMEOUT_ENV));
    this.transport = options.transport ?? fetchTransport;
    this.rejectNonSuccessStatus = options.rejectNonSuccessStatus ?? true;
  }

  /**
   * List the names of every coverage the service offers.
   */
  async listCoverages(): Promise<CoverageList> {
    return this.request<CoverageList>(`${this.host}/wtss/list_coverages`);
  }

  /**
   * Fetch the service-defined metadata of a coverage.
   */
  async describeCoverage(name: string): Promise<CoverageDescription> {
    return this.request<CoverageDescription>(
      `${this.host}/wtss/describe_coverage?name=${encodeQueryValue(name)}`
    );
  }

  /**
   * Retrieve the time series of one or more attributes at a location.
   *
   * @param attributes - list of attribute names, or a comma-separated string sent as is
   * @param latitude - degrees, WGS84
   * @param longitude - degrees, WGS84
   * @param startDate - sent verbatim; only used when endDate is also given
   * @param endDate - sent verbatim; only used when startDate is also given
   * @throws InvalidArgumentError before any request when an argument is missing or out of range
   */
  async timeSeries(
    coverage: string,
    attributes: AttributesInput,
    latitude: number,
    longitude: number,
    startDate?: string | null,
    endDate?: string | null
  ): Promise<TimeSeriesDocument> {
    return this.request<TimeSeriesDocument>(
      this.timeSeriesUrl(coverage, attributes, latitude, longitude, startDate, endDate)
    );
  }

  /**
   * Build the time_series query URL without sending it.
   * Applies the same validation as `timeSeries`.
   */
  timeSeriesUrl(
    coverage: string,
    attributes: AttributesInput,
    latitude: number,
    longitude: number,
    startDate?: string | null,
    endDate?: string | null
  ): string {
    if (!coverage) {
      throw new InvalidArgumentError("Missing coverage name.");
    }
    const joinedAttributes = joinAttributes(resolveAttributes(attributes));
    assertInRange(latitude, LATITUDE_RANGE, "latitude is out-of range!");
    assertInRange(longitude, LONGITUDE_RANGE, "longitude is out-of range!");

    let url =
      `${this.host}/wtss/time_series` +
      `?coverage=${encodeQueryValue(coverage)}` +
      `&attributes=${encodeQueryValue(joinedAttributes)}` +
      `&latitude=${formatCoordinate(latitude)}` +
      `&longitude=${formatCoordinate(longitude)}`;

    // A period is only sent when both ends are given
    if (startDate && endDate) {
      url += `&start=${startDate}&end=${endDate}`;
    }
    return url;
  }

  static timeline(doc: TimelineSource, format: string): Date[] {
    return timeline(doc, format);
  }

  static values(doc: AttributesSource, attributeName: string): number[] {
    return values(doc, attributeName);
  }

  static toRecords(doc: TimelineSource & AttributesSource, format: string): TimeSeriesRecord[] {
    return toRecords(doc, format);
  }

  private async request<T>(url: string): Promise<T> {
    const response = await this.transport.get(url, { timeoutMs: this.timeoutMs });

    if (this.rejectNonSuccessStatus && (response.status < 200 || response.status > 299)) {
      throw new ServiceError(
        `WTSS service error (${response.status}): ${response.statusText}`,
        url,
        response.status,
        response.body
      );
    }

    try {
      const doc: T = JSON.parse(response.body);
      return doc;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DecodeError(`Invalid JSON in response from ${url}: ${reason}`, url, {
        cause: err,
      });
    }
  }
}
