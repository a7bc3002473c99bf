import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

const DEFAULT_REFUND_URL =
  "https://www.vueling.com/en/we-are-vueling/contact/management?helpCenterFlow=RefundJustifiedReasons";

const DEFAULT_VERIFY_URL = "https://tickets.vueling.com/RetrieveBooking.aspx?event=change&culture=en-GB";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? fallback : ["1", "true", "yes"].includes(value.toLowerCase())));

const envSchema = z.object({
  NODE_ENV: z.string().optional().default("production"),
  LOG_LEVEL: z.string().optional().default("info"),
  REFUND_URL: z.string().url().optional().default(DEFAULT_REFUND_URL),
  VERIFY_URL: z.string().url().optional().default(DEFAULT_VERIFY_URL),
  HEADLESS: booleanFlag(true),
  USER_AGENT: z.string().optional().default(DEFAULT_USER_AGENT),
  WORKER_COUNT: z.coerce.number().int().positive().optional().default(2),
  STEP_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(45_000),
  PAGE_LOAD_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(60_000),
  ATTEMPT_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(5_000),
  RETRY_BACKOFF_MS: z.coerce.number().int().nonnegative().optional().default(3_000),
  MIN_DELAY_MS: z.coerce.number().int().nonnegative().optional().default(1_500),
  MAX_DELAY_MS: z.coerce.number().int().nonnegative().optional().default(3_500),
  EVIDENCE_DIR: z.string().optional().default("screenshots"),
  KEEP_EVIDENCE: booleanFlag(false),
  ATTACHMENT_DIR: z.string().optional().default(join(tmpdir(), "refund-claims")),
  MAX_ATTACHMENT_BYTES: z.coerce.number().int().positive().optional().default(4 * 1024 * 1024),
  CALLBACK_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(10_000)
});

export interface TimingConfig {
  stepTimeoutMs: number;
  pageLoadTimeoutMs: number;
  attemptTimeoutMs: number;
  retryBackoffMs: number;
  minDelayMs: number;
  maxDelayMs: number;
}

export interface AppConfig {
  env: string;
  logLevel: string;
  refundUrl: string;
  verifyUrl: string;
  browser: {
    headless: boolean;
    userAgent: string;
  };
  workers: number;
  timing: TimingConfig;
  evidence: {
    rootDir: string;
    keep: boolean;
  };
  attachments: {
    rootDir: string;
    maxTotalBytes: number;
  };
  callbackTimeoutMs: number;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);
  const minDelayMs = Math.min(env.MIN_DELAY_MS, env.MAX_DELAY_MS);

  return {
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    refundUrl: env.REFUND_URL,
    verifyUrl: env.VERIFY_URL,
    browser: {
      headless: env.HEADLESS,
      userAgent: env.USER_AGENT
    },
    workers: env.WORKER_COUNT,
    timing: {
      stepTimeoutMs: env.STEP_TIMEOUT_MS,
      pageLoadTimeoutMs: env.PAGE_LOAD_TIMEOUT_MS,
      attemptTimeoutMs: env.ATTEMPT_TIMEOUT_MS,
      retryBackoffMs: env.RETRY_BACKOFF_MS,
      minDelayMs,
      maxDelayMs: env.MAX_DELAY_MS
    },
    evidence: {
      rootDir: env.EVIDENCE_DIR,
      keep: env.KEEP_EVIDENCE
    },
    attachments: {
      rootDir: env.ATTACHMENT_DIR,
      maxTotalBytes: env.MAX_ATTACHMENT_BYTES
    },
    callbackTimeoutMs: env.CALLBACK_TIMEOUT_MS
  };
}
