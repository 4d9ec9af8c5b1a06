import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WtssClient } from "../src/index.js";
import { fetchTransport } from "../src/http/transport.js";
import { NetworkError } from "../src/errors.js";
import { captureError } from "./helpers/fake-transport.js";

const URL_UNDER_TEST = "http://wtss.test/wtss/list_coverages";

function textResponse(body: string, status = 200, statusText = "OK") {
  return { status, statusText, text: async () => body };
}

describe("fetchTransport", () => {
  let fetchSpy: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchSpy = vi.fn();
    vi.stubGlobal("fetch", fetchSpy);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("performs a GET and returns status and raw body", async () => {
    fetchSpy.mockResolvedValueOnce(textResponse('{"coverages":["a"]}'));

    const response = await fetchTransport.get(URL_UNDER_TEST);

    expect(response).toEqual({ status: 200, statusText: "OK", body: '{"coverages":["a"]}' });
    expect(fetchSpy).toHaveBeenCalledOnce();
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe(URL_UNDER_TEST);
    expect(init).toEqual({ method: "GET", signal: undefined });
  });

  it("returns non-success responses without judging them", async () => {
    fetchSpy.mockResolvedValueOnce(textResponse("missing", 404, "Not Found"));

    const response = await fetchTransport.get(URL_UNDER_TEST);

    expect(response).toEqual({ status: 404, statusText: "Not Found", body: "missing" });
  });

  it("attaches an abort signal when a timeout is given", async () => {
    fetchSpy.mockResolvedValueOnce(textResponse("{}"));

    await fetchTransport.get(URL_UNDER_TEST, { timeoutMs: 1000 });

    const [, init] = fetchSpy.mock.calls[0];
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it("wraps connection failures in NetworkError", async () => {
    const cause = new TypeError("fetch failed");
    fetchSpy.mockRejectedValueOnce(cause);

    const error = await captureError(fetchTransport.get(URL_UNDER_TEST), NetworkError);

    expect(error.message).toBe(`Request to ${URL_UNDER_TEST} failed: fetch failed`);
    expect(error.url).toBe(URL_UNDER_TEST);
    expect(error.cause).toBe(cause);
  });

  it("reports timeouts as NetworkError", async () => {
    fetchSpy.mockRejectedValueOnce(
      Object.assign(new Error("The operation was aborted due to timeout"), {
        name: "TimeoutError",
      })
    );

    const error = await captureError(
      fetchTransport.get(URL_UNDER_TEST, { timeoutMs: 50 }),
      NetworkError
    );

    expect(error.message).toBe(`Request to ${URL_UNDER_TEST} timed out after 50ms`);
  });

  it("wraps body read failures in NetworkError", async () => {
    fetchSpy.mockResolvedValueOnce({
      status: 200,
      statusText: "OK",
      text: async () => {
        throw new Error("socket hang up");
      },
    });

    const error = await captureError(fetchTransport.get(URL_UNDER_TEST), NetworkError);

    expect(error.message).toBe(`Failed reading response from ${URL_UNDER_TEST}: socket hang up`);
  });

  it("is the default transport of WtssClient", async () => {
    fetchSpy.mockResolvedValueOnce(textResponse('{"coverages":["mod13q1_512"]}'));

    const client = new WtssClient("http://wtss.test");
    const list = await client.listCoverages();

    expect(list.coverages).toEqual(["mod13q1_512"]);
    expect(fetchSpy.mock.calls[0][0]).toBe(URL_UNDER_TEST);
  });
});
