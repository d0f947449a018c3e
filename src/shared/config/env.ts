export type PersistTarget = "files" | "mongo";

export type Env = {
  LOOKUP_URL: string;
  LOOKUP_ID_PARAM: string;
  PERSIST_TARGET: PersistTarget;
  OUTPUT_DIR: string;
  MONGO_URI: string;
  MONGO_DB: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const parsePersistTarget = (raw: string | undefined): PersistTarget => {
  const value = raw?.trim().toLowerCase() || "files";
  if (value === "files" || value === "mongo") return value;
  throw new Error(`PERSIST_TARGET must be "files" or "mongo". Received: ${raw ?? ""}`);
};

const nonEmptyOr = (raw: string | undefined, fallback: string): string => {
  const value = raw?.trim();
  return value ? value : fallback;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const LOOKUP_URL = validateHttpUrl("LOOKUP_URL", env.LOOKUP_URL ?? "http://localhost:3999/lookup");
  const LOOKUP_ID_PARAM = nonEmptyOr(env.LOOKUP_ID_PARAM, "cinemaid");
  const PERSIST_TARGET = parsePersistTarget(env.PERSIST_TARGET);
  const OUTPUT_DIR = nonEmptyOr(env.OUTPUT_DIR, "results");
  const MONGO_URI = env.MONGO_URI ?? "mongodb://localhost:27017/cinema_scan";
  const MONGO_DB = nonEmptyOr(env.MONGO_DB, "cinema_scan");

  return { LOOKUP_URL, LOOKUP_ID_PARAM, PERSIST_TARGET, OUTPUT_DIR, MONGO_URI, MONGO_DB };
};
