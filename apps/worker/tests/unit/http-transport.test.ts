import { classifyStatus, FetchLike, HttpTransport } from "../../src/adapters/http-transport";
import {
  isTransientError,
  PartialWriteFailure,
  PermanentFetchError,
  RunCancelled,
  SourceUnavailable,
  TransientFetchError,
  ValidationRejected
} from "../../src/core/errors";

const TARGET = "https://source.example.test/data.csv";

function respondingWith(status: number, body = ""): FetchLike {
  return async () => new Response(body, { status });
}

describe("HttpTransport", () => {
  it("returns the body of a successful response", async () => {
    const transport = new HttpTransport({ timeoutMs: 1000, fetchImpl: respondingWith(200, "hello") });
    await expect(transport.getText(TARGET)).resolves.toBe("hello");
  });

  it.each([408, 429, 500, 503])("treats status %i as transient", async (status) => {
    const transport = new HttpTransport({ timeoutMs: 1000, fetchImpl: respondingWith(status) });
    const error = await transport.getText(TARGET).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransientFetchError);
    expect(error).toEqual(expect.objectContaining({ status, message: `Source ${TARGET} responded with status ${status}` }));
  });

  it.each([400, 401, 404, 410])("treats status %i as permanent", async (status) => {
    const transport = new HttpTransport({ timeoutMs: 1000, fetchImpl: respondingWith(status) });
    await expect(transport.getText(TARGET)).rejects.toBeInstanceOf(PermanentFetchError);
  });

  it("releases the body of an error response before failing", async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      cancel() {
        cancelled = true;
      }
    });
    const transport = new HttpTransport({ timeoutMs: 1000, fetchImpl: async () => new Response(body, { status: 502 }) });

    await expect(transport.getText(TARGET)).rejects.toBeInstanceOf(TransientFetchError);
    expect(cancelled).toBe(true);
  });

  it("wraps network errors as transient", async () => {
    const transport = new HttpTransport({
      timeoutMs: 1000,
      fetchImpl: async () => {
        throw new TypeError("fetch failed");
      }
    });
    await expect(transport.getText(TARGET)).rejects.toThrow(
      new TransientFetchError({ url: TARGET, message: `Network error for ${TARGET}: fetch failed` })
    );
  });

  it("times out slow requests as transient", async () => {
    const fetchImpl: FetchLike = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    const transport = new HttpTransport({ timeoutMs: 20, fetchImpl });

    await expect(transport.getText(TARGET)).rejects.toThrow(`Request to ${TARGET} timed out after 20ms`);
  });

  it("reports cancellation instead of a fetch failure", async () => {
    const controller = new AbortController();
    controller.abort();
    const transport = new HttpTransport({ timeoutMs: 1000, fetchImpl: respondingWith(200) });

    await expect(transport.getText(TARGET, controller.signal)).rejects.toBeInstanceOf(RunCancelled);
  });

  it("rejects malformed JSON permanently", async () => {
    const transport = new HttpTransport({ timeoutMs: 1000, fetchImpl: respondingWith(200, "{not json") });
    const error = await transport.getJson(TARGET).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PermanentFetchError);
    expect(error instanceof Error ? error.message : "").toMatch(/^Malformed JSON from https:\/\/source\.example\.test/);
  });

  it("classifies status codes", () => {
    expect(classifyStatus(TARGET, 502)).toBeInstanceOf(TransientFetchError);
    expect(classifyStatus(TARGET, 403)).toBeInstanceOf(PermanentFetchError);
  });
});

describe("errors", () => {
  it("retries a source only when every endpoint failed transiently", () => {
    const transientOnly = new SourceUnavailable("grid", [{ url: TARGET, message: "reset", transient: true }]);
    const mixed = new SourceUnavailable("grid", [
      { url: TARGET, message: "reset", transient: true },
      { url: `${TARGET}?mirror`, message: "gone", transient: false }
    ]);

    expect(isTransientError(transientOnly)).toBe(true);
    expect(isTransientError(mixed)).toBe(false);
    expect(isTransientError(new SourceUnavailable("grid", []))).toBe(false);
    expect(isTransientError(new Error("plain"))).toBe(false);
    expect(new SourceUnavailable("grid", []).message).toBe("All endpoints failed for grid: no endpoints configured");
  });

  it("describes validation and write failures", () => {
    const rejected = new ValidationRejected({
      rejectedCount: 3,
      total: 4,
      rejections: { stale: 0, incomplete: 1, out_of_bounds: 2 },
      warnings: ["Batch looks odd"]
    });
    expect(rejected.message).toBe(
      "Validation rejected batch: 3/4 records rejected (incomplete=1, out_of_bounds=2); Batch looks odd"
    );
    expect(new ValidationRejected({ rejectedCount: 0, total: 0, rejections: rejected.rejections, warnings: [] }).message).toBe(
      "Validation rejected batch: no records"
    );

    const partial = new PartialWriteFailure({ index: 1, total: 3, size: 10, attempts: 3, errorMessage: "disk full" }, 10);
    expect(partial.message).toBe("Chunk 2 of 3 failed after 3 attempt(s): disk full");
    expect(partial).toBeInstanceOf(PartialWriteFailure);
  });
});
