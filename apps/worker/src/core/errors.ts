import type { SourceKind } from "@energy-pipeline/shared";
import type { EndpointFailure, FailedChunk, RejectionReason } from "./types";

export class TransientFetchError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(args: { url: string; message: string; status?: number | null; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "TransientFetchError";
    this.url = args.url;
    this.status = args.status ?? null;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PermanentFetchError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(args: { url: string; message: string; status?: number | null; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "PermanentFetchError";
    this.url = args.url;
    this.status = args.status ?? null;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SourceUnavailable extends Error {
  readonly source: SourceKind;
  readonly failures: EndpointFailure[];

  constructor(source: SourceKind, failures: EndpointFailure[]) {
    super(
      `All endpoints failed for ${source}: ` +
        (failures.length ? failures.map((item) => `${item.url} (${item.message})`).join("; ") : "no endpoints configured")
    );
    this.name = "SourceUnavailable";
    this.source = source;
    this.failures = failures;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** True when every endpoint failed for a reason that may clear on its own. */
  get transient(): boolean {
    return this.failures.length > 0 && this.failures.every((item) => item.transient);
  }
}

export class ValidationRejected extends Error {
  readonly rejectedCount: number;
  readonly total: number;
  readonly rejections: Record<RejectionReason, number>;

  constructor(args: { rejectedCount: number; total: number; rejections: Record<RejectionReason, number>; warnings: string[] }) {
    super(describeRejection(args));
    this.name = "ValidationRejected";
    this.rejectedCount = args.rejectedCount;
    this.total = args.total;
    this.rejections = args.rejections;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PartialWriteFailure extends Error {
  readonly chunk: FailedChunk;
  readonly committed: number;

  constructor(chunk: FailedChunk, committed: number) {
    super(
      `Chunk ${chunk.index + 1} of ${chunk.total} failed after ${chunk.attempts} attempt(s): ${chunk.errorMessage}`
    );
    this.name = "PartialWriteFailure";
    this.chunk = chunk;
    this.committed = committed;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RunCancelled extends Error {
  constructor(message = "Run cancelled") {
    super(message);
    this.name = "RunCancelled";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientFetchError) {
    return true;
  }
  if (error instanceof SourceUnavailable) {
    return error.transient;
  }
  return false;
}

export function throwIfAborted(signal: AbortSignal | undefined, message?: string) {
  if (signal?.aborted) {
    throw new RunCancelled(message);
  }
}

function describeRejection(args: {
  rejectedCount: number;
  total: number;
  rejections: Record<RejectionReason, number>;
  warnings: string[];
}): string {
  if (args.total === 0) {
    return "Validation rejected batch: no records";
  }
  const reasons = Object.entries(args.rejections)
    .filter(([, count]) => count > 0)
    .map(([reason, count]) => `${reason}=${count}`);
  const detail = reasons.length ? ` (${reasons.join(", ")})` : "";
  const head = `Validation rejected batch: ${args.rejectedCount}/${args.total} records rejected${detail}`;
  return args.warnings.length ? `${head}; ${args.warnings.join("; ")}` : head;
}
