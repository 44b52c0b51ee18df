import { describeError } from "@energy-pipeline/shared";
import { PermanentFetchError, RunCancelled, TransientFetchError } from "../core/errors";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpTransportOptions {
  timeoutMs: number;
  fetchImpl?: FetchLike;
  headers?: Record<string, string>;
}

interface RawResponse {
  statusCode: number;
  body: Uint8Array;
}

export class HttpTransport {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpTransportOptions) {
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async getText(url: string, signal?: AbortSignal): Promise<string> {
    const response = await this.request(url, signal);
    return new TextDecoder("utf-8").decode(response.body);
  }

  async getBytes(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    const response = await this.request(url, signal);
    return response.body;
  }

  async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const text = await this.getText(url, signal);
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new PermanentFetchError({ url, message: `Malformed JSON from ${url}: ${describeError(error)}`, cause: error });
    }
  }

  private async request(url: string, signal?: AbortSignal): Promise<RawResponse> {
    if (signal?.aborted) {
      throw new RunCancelled(`Cancelled before fetching ${url}`);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          "user-agent": "energy-pipeline-worker/0.1",
          ...this.options.headers
        },
        signal: controller.signal
      });

      if (!response.ok) {
        const failure = classifyStatus(url, response.status);
        await response.body?.cancel();
        throw failure;
      }

      return {
        statusCode: response.status,
        body: new Uint8Array(await response.arrayBuffer())
      };
    } catch (error) {
      if (error instanceof TransientFetchError || error instanceof PermanentFetchError) {
        throw error;
      }
      if (signal?.aborted) {
        throw new RunCancelled(`Cancelled while fetching ${url}`);
      }
      if (timedOut) {
        throw new TransientFetchError({ url, message: `Request to ${url} timed out after ${this.options.timeoutMs}ms` });
      }
      throw new TransientFetchError({ url, message: `Network error for ${url}: ${describeError(error)}`, cause: error });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

export function classifyStatus(url: string, status: number): TransientFetchError | PermanentFetchError {
  const message = `Source ${url} responded with status ${status}`;
  if (status === 408 || status === 429 || status >= 500) {
    return new TransientFetchError({ url, message, status });
  }
  return new PermanentFetchError({ url, message, status });
}

export function malformedPayload(url: string, detail: string): PermanentFetchError {
  return new PermanentFetchError({ url, message: `Malformed payload from ${url}: ${detail}` });
}
