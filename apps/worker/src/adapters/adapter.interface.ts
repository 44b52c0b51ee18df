import type { SourceKind, SyntheticQuality, TimeWindow } from "@energy-pipeline/shared";
import type { FetchOptions, SourceRecord, SourceSettings, SourceTier } from "../core/types";

export interface PlannedEndpoint {
  url: string;
  tier: Exclude<SourceTier, "synthetic">;
  /** Extra query parameters this endpoint needs. */
  params?: Record<string, string>;
}

export interface SourceAdapter<K extends SourceKind> {
  readonly source: K;
  /** Endpoints in the order they are tried. */
  planEndpoints(window: TimeWindow, settings: SourceSettings, now: Date): PlannedEndpoint[];
  fetchFrom(endpoint: PlannedEndpoint, window: TimeWindow, options?: FetchOptions): Promise<SourceRecord<K>[]>;
  synthesize(window: TimeWindow, quality: SyntheticQuality): SourceRecord<K>[];
}

export function planDeclaredOrder(settings: SourceSettings): PlannedEndpoint[] {
  const plan: PlannedEndpoint[] = [];
  const seen = new Set<string>();
  for (const url of [settings.endpointUrl, ...settings.fallbackUrls]) {
    if (!url || seen.has(url)) {
      continue;
    }
    seen.add(url);
    plan.push({ url, tier: plan.length === 0 ? "primary" : "fallback" });
  }
  return plan;
}
