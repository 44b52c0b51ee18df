export const SOURCE_KINDS = ["household", "weather", "grid"] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

export type IngestionJobStatus = "running" | "success" | "partial_success" | "failed";

export type SyntheticQuality = "basic" | "standard" | "high";

export function isSourceKind(value: string): value is SourceKind {
  return SOURCE_KINDS.some((kind) => kind === value);
}
