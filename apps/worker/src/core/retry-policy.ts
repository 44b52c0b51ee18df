import { describeError } from "@energy-pipeline/shared";
import { isTransientError, RunCancelled } from "./errors";

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryState {
  attempt: number;
  nextDelayMs: number;
  lastError: unknown;
}

export type RetryStep =
  | { action: "retry"; state: RetryState }
  | { action: "give_up"; state: RetryState; reason: "exhausted" | "permanent" };

export interface RetryPolicyOptions {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoff: "fixed" | "exponential";
  shouldRetry?: (error: unknown) => boolean;
  sleeper?: Sleeper;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; reason: "exhausted" | "permanent"; error: unknown }) => void;
}

export const abortableSleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RunCancelled("Cancelled before retry delay"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelled("Cancelled during retry delay"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export class RetryPolicy {
  private readonly maxAttempts: number;
  private readonly shouldRetry: (error: unknown) => boolean;
  private readonly sleeper: Sleeper;

  constructor(private readonly options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new Error(`maxAttempts must be an integer >= 1, got ${options.maxAttempts}`);
    }
    this.maxAttempts = options.maxAttempts;
    this.shouldRetry = options.shouldRetry ?? isTransientError;
    this.sleeper = options.sleeper ?? abortableSleep;
  }

  initial(): RetryState {
    return { attempt: 0, nextDelayMs: 0, lastError: null };
  }

  delayFor(attempt: number): number {
    const { baseDelayMs, maxDelayMs, backoff } = this.options;
    if (backoff === "fixed") {
      return Math.min(maxDelayMs, baseDelayMs);
    }
    return Math.min(maxDelayMs, baseDelayMs * Math.pow(2, Math.max(0, attempt - 1)));
  }

  /** Transition after attempt `state.attempt + 1` failed with `error`. */
  next(state: RetryState, error: unknown): RetryStep {
    const attempt = state.attempt + 1;
    if (!this.shouldRetry(error)) {
      return { action: "give_up", reason: "permanent", state: { attempt, nextDelayMs: 0, lastError: error } };
    }
    if (attempt >= this.maxAttempts) {
      return { action: "give_up", reason: "exhausted", state: { attempt, nextDelayMs: 0, lastError: error } };
    }
    return { action: "retry", state: { attempt, nextDelayMs: this.delayFor(attempt), lastError: error } };
  }

  async execute<T>(fn: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T> {
    let state = this.initial();
    while (true) {
      if (signal?.aborted) {
        throw new RunCancelled(
          state.attempt ? `Cancelled after ${state.attempt} attempt(s): ${describeError(state.lastError)}` : undefined
        );
      }
      try {
        return await fn(state.attempt + 1);
      } catch (error) {
        if (error instanceof RunCancelled) {
          throw error;
        }
        const step = this.next(state, error);
        if (step.action === "give_up") {
          this.options.onGiveUp?.({
            attempt: step.state.attempt,
            maxAttempts: this.maxAttempts,
            reason: step.reason,
            error
          });
          throw error;
        }
        this.options.onRetry?.({
          attempt: step.state.attempt,
          maxAttempts: this.maxAttempts,
          delayMs: step.state.nextDelayMs,
          error
        });
        await this.sleeper(step.state.nextDelayMs, signal);
        state = step.state;
      }
    }
  }
}
