import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_BASE_URL = "https://app.musicleague.com";

export type CompletionPolicy = "strict" | "lenient";

const DEFAULT_DATA_DIR = path.join(process.cwd(), "data");

const booleanString = z
  .string()
  .optional()
  .transform((val) => (val == null ? undefined : ["true", "1", "yes"].includes(val.trim().toLowerCase())));

const int = (min: number, fallback: number) => z.coerce.number().int().min(min).default(fallback);

/** Longest a single page read may take when it uses every load cycle. */
function loadBudgetMs({
  pageTimeoutMs,
  maxLoadCycles,
  settleTimeoutMs
}: {
  pageTimeoutMs: number;
  maxLoadCycles: number;
  settleTimeoutMs: number;
}) {
  return pageTimeoutMs + maxLoadCycles * settleTimeoutMs;
}

const configSchema = z
  .object({
    baseUrl: z.string().url().default(DEFAULT_BASE_URL),
    dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
    databasePath: z.string().min(1).optional(),
    sessionPath: z.string().min(1).optional(),
    delayMinMs: int(0, 1000),
    delayMaxMs: int(0, 3000),
    maxAttempts: int(1, 3),
    backoffBaseMs: int(0, 5000),
    backoffCapMs: int(0, 60000),
    /** Defaults to enough time for a page that keeps growing to use every load cycle. */
    attemptTimeoutMs: z.coerce.number().int().min(1000).optional(),
    maxLoadCycles: int(1, 50),
    settleTimeoutMs: int(0, 5000),
    pageTimeoutMs: int(1000, 60000),
    authTimeoutMs: int(1000, 300000),
    completionPolicy: z.enum(["strict", "lenient"]).default("strict"),
    nameFilter: z.string().trim().min(1).nullable().default(null),
    concurrency: z.coerce.number().int().min(1).max(8).default(1),
    maxScore: int(0, 5),
    sessionMaxAgeHours: int(1, 168),
    headless: z.boolean().default(true)
  })
  .refine((cfg) => cfg.delayMinMs <= cfg.delayMaxMs, {
    message: "delayMinMs must not exceed delayMaxMs",
    path: ["delayMinMs"]
  })
  .refine((cfg) => cfg.backoffBaseMs <= cfg.backoffCapMs, {
    message: "backoffBaseMs must not exceed backoffCapMs",
    path: ["backoffBaseMs"]
  })
  .refine((cfg) => cfg.attemptTimeoutMs == null || cfg.attemptTimeoutMs >= loadBudgetMs(cfg), {
    message: "attemptTimeoutMs must cover pageTimeoutMs + maxLoadCycles * settleTimeoutMs",
    path: ["attemptTimeoutMs"]
  })
  .transform((cfg) => ({
    ...cfg,
    attemptTimeoutMs: cfg.attemptTimeoutMs ?? loadBudgetMs(cfg) + cfg.pageTimeoutMs,
    baseUrl: cfg.baseUrl.replace(/\/+$/, ""),
    databasePath: cfg.databasePath ?? path.join(cfg.dataDir, "league-harvest.db"),
    sessionPath: cfg.sessionPath ?? path.join(cfg.dataDir, "session.json")
  }));

export type HarvestConfig = z.output<typeof configSchema>;
export type ConfigOverrides = Partial<z.input<typeof configSchema>>;

const ENV_KEYS = {
  baseUrl: "LH_BASE_URL",
  dataDir: "LH_DATA_DIR",
  databasePath: "LH_DB_PATH",
  sessionPath: "LH_SESSION_PATH",
  delayMinMs: "LH_DELAY_MIN_MS",
  delayMaxMs: "LH_DELAY_MAX_MS",
  maxAttempts: "LH_MAX_ATTEMPTS",
  backoffBaseMs: "LH_BACKOFF_BASE_MS",
  backoffCapMs: "LH_BACKOFF_CAP_MS",
  attemptTimeoutMs: "LH_ATTEMPT_TIMEOUT_MS",
  maxLoadCycles: "LH_MAX_LOAD_CYCLES",
  settleTimeoutMs: "LH_SETTLE_TIMEOUT_MS",
  pageTimeoutMs: "LH_PAGE_TIMEOUT_MS",
  authTimeoutMs: "LH_AUTH_TIMEOUT_MS",
  completionPolicy: "LH_COMPLETION_POLICY",
  nameFilter: "LH_FILTER",
  concurrency: "LH_CONCURRENCY",
  maxScore: "LH_MAX_SCORE",
  sessionMaxAgeHours: "LH_SESSION_MAX_AGE_HOURS"
} as const;

export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): HarvestConfig {
  const fromEnv: Record<string, unknown> = {};
  for (const [field, name] of Object.entries(ENV_KEYS)) {
    const value = env[name]?.trim();
    if (value) fromEnv[field] = value;
  }
  const headless = booleanString.parse(env.LH_HEADLESS?.trim() || undefined);
  if (headless !== undefined) fromEnv.headless = headless;

  const definedOverrides = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));

  const parsed = configSchema.safeParse({ ...fromEnv, ...definedOverrides });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}

export function resolveUrls(baseUrl: string) {
  return {
    login: `${baseUrl}/login/`,
    completed: `${baseUrl}/completed/`
  };
}
