import { config as loadDotenv } from "dotenv";
import { join } from "path";

/** Loads `.env` from the working directory, then from the repository root. */
export function loadEnvironment(cwd = process.cwd()) {
  loadDotenv({ path: join(cwd, ".env"), override: false });
  loadDotenv({ path: join(cwd, "../../.env"), override: false });
}

export function envValue(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const cleaned = value.replace(/^\uFEFF/, "").trim();
  return cleaned.length ? cleaned : undefined;
}

export function envFlag(value: string | undefined): boolean | undefined {
  const cleaned = envValue(value)?.toLowerCase();
  if (cleaned === undefined) {
    return undefined;
  }
  if (["1", "true", "yes", "on"].includes(cleaned)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(cleaned)) {
    return false;
  }
  throw new Error(`Expected a boolean flag, got "${value}"`);
}

export function resolveSsl(connectionString: string, sslMode = envValue(process.env.DB_SSL_MODE)) {
  if (sslMode === "disable") {
    return false;
  }

  const requiresSsl = connectionString.includes("sslmode=require") || sslMode === "require";
  if (!requiresSsl) {
    return false;
  }

  return {
    rejectUnauthorized: false
  };
}
