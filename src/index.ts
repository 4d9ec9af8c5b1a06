export * from "./constants.js";
export * from "./errors.js";
export * from "./types.js";
export { WtssClient } from "./client.js";
export {
  fetchTransport,
  type HttpTransport,
  type HttpResponse,
  type HttpGetOptions,
} from "./http/transport.js";
export {
  timeline,
  values,
  toRecords,
  type TimelineSource,
  type AttributesSource,
} from "./time-series/document.js";
export { parseDate } from "./time-series/strftime.js";
