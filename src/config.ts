import dotenv from "dotenv";

dotenv.config();

// ── Command-line overrides ──────────────────────────────────────────────
// `--host <addr>`, `--port <n>` and `--debug` win over the environment.

function argValue(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return undefined;
  const val = process.argv[idx + 1];
  if (val === undefined || val.startsWith("--")) return undefined;
  return val;
}

const debug = process.argv.includes("--debug");

export const config = {
  rest: {
    host: argValue("--host") ?? process.env.HOST ?? "0.0.0.0",
    port: parseInt(argValue("--port") ?? process.env.PORT ?? "5000", 10),
  },
  provider: {
    /** Upper bound on a single upstream call; a slower answer is UpstreamUnavailable */
    timeoutMs: parseInt(process.env.PROVIDER_TIMEOUT_MS ?? "8000", 10),
    maxRetries: parseInt(process.env.PROVIDER_MAX_RETRIES ?? "2", 10),
    retryDelayMs: parseInt(process.env.PROVIDER_RETRY_DELAY_MS ?? "500", 10),
  },
  log: {
    level: debug ? "debug" : (process.env.LOG_LEVEL ?? "info"),
    debug,
  },
};

export type AppConfig = typeof config;
