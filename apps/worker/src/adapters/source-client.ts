import type { SourceKind, TimeWindow } from "@energy-pipeline/shared";
import { describeError, formatWindow } from "@energy-pipeline/shared";
import { PermanentFetchError, RunCancelled, SourceUnavailable, throwIfAborted, TransientFetchError } from "../core/errors";
import type { LoggerLike } from "../core/logger";
import type { EndpointFailure, FetchOptions, FetchResult, SourceSettings } from "../core/types";
import { SourceAdapter } from "./adapter.interface";

/**
 * Walks the adapter's endpoint plan in order and falls back to the
 * synthetic generator when every endpoint fails. Never touches the store.
 */
export class SourceClient<K extends SourceKind> {
  constructor(
    private readonly adapter: SourceAdapter<K>,
    private readonly logger: LoggerLike,
    private readonly clock: () => Date = () => new Date()
  ) {}

  get source(): K {
    return this.adapter.source;
  }

  async fetch(window: TimeWindow, settings: SourceSettings, options: FetchOptions = {}): Promise<FetchResult<K>> {
    const plan = this.adapter.planEndpoints(window, settings, this.clock());
    const failures: EndpointFailure[] = [];

    for (const endpoint of plan) {
      throwIfAborted(options.signal, `Cancelled before fetching ${endpoint.url}`);
      try {
        const records = await this.adapter.fetchFrom(endpoint, window, options);
        if (!records.length) {
          throw new PermanentFetchError({
            url: endpoint.url,
            message: `No ${this.adapter.source} records inside ${formatWindow(window)}`
          });
        }
        if (failures.length) {
          this.logger.warn(
            { source: this.adapter.source, url: endpoint.url, tier: endpoint.tier, failed_endpoints: failures.length },
            "Fetched from fallback endpoint"
          );
        }
        return { records, tier: endpoint.tier, url: endpoint.url, failures };
      } catch (error) {
        if (error instanceof RunCancelled) {
          throw error;
        }
        const failure: EndpointFailure = {
          url: endpoint.url,
          message: describeError(error),
          transient: error instanceof TransientFetchError
        };
        failures.push(failure);
        this.logger.warn({ source: this.adapter.source, ...failure }, "Endpoint fetch failed");
      }
    }

    if (settings.enableSyntheticFallback) {
      const records = this.adapter.synthesize(window, settings.syntheticQuality);
      this.logger.warn(
        {
          source: this.adapter.source,
          quality: settings.syntheticQuality,
          records: records.length,
          failed_endpoints: failures.length
        },
        "Using synthetic fallback data"
      );
      return { records, tier: "synthetic", url: null, failures };
    }

    throw new SourceUnavailable(this.adapter.source, failures);
  }
}
