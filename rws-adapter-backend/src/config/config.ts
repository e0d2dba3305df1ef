import path from "path";

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${name} must be a number, got "${raw}"`);
  }
  return parsed;
}

const isTestRun =
  process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;

export const config = {
  application: {
    name: "rws-adapter-backend",
    port: readNumber("PORT", 3000),
  },
  controller: {
    baseUrl: process.env.RWS_BASE_URL ?? "http://127.0.0.1",
    // Empty username disables the Authorization header.
    username: process.env.RWS_USERNAME ?? "",
    password: process.env.RWS_PASSWORD ?? "",
    requestTimeoutMs: readNumber("RWS_TIMEOUT_MS", 5000),
  },
  logging: {
    level: process.env.LOG_LEVEL ?? "info",
    // Test runs stay quiet unless a level is asked for explicitly.
    silent: isTestRun && process.env.LOG_LEVEL === undefined,
    directory: process.env.LOG_DIR ?? path.join(__dirname, "..", "..", "logs"),
    toFile: process.env.LOG_TO_FILE
      ? process.env.LOG_TO_FILE === "true"
      : !isTestRun,
  },
};
