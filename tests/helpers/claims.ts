import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { AppConfig, TimingConfig } from "../../src/config.js";
import type { ClaimRequest } from "../../src/types.js";

export const CONFIRMATION_TEXT = "Thank you. Your claim has been processed under reference 9988776.";

export function testTiming(overrides: Partial<TimingConfig> = {}): TimingConfig {
  return {
    stepTimeoutMs: 2_000,
    pageLoadTimeoutMs: 5_000,
    attemptTimeoutMs: 250,
    retryBackoffMs: 3_000,
    minDelayMs: 10,
    maxDelayMs: 20,
    ...overrides
  };
}

export function sampleClaim(overrides: Partial<ClaimRequest> = {}): ClaimRequest {
  return {
    bookingCode: "EHZRMC",
    bookingEmail: "traveller@example.com",
    reason: "PREGNANT",
    firstName: "Ana",
    surname: "Lopez",
    contactEmail: "contact@example.com",
    phoneCountry: "+34",
    phoneNumber: "600111222",
    comment: "Medical certificate attached",
    documents: [],
    ...overrides
  };
}

export function testConfig(root: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    env: "test",
    logLevel: "silent",
    refundUrl: "https://refunds.example.test/claim",
    verifyUrl: "https://bookings.example.test/retrieve",
    browser: { headless: true, userAgent: "test-agent" },
    workers: 2,
    timing: testTiming(),
    evidence: { rootDir: join(root, "evidence"), keep: false },
    attachments: { rootDir: join(root, "attachments"), maxTotalBytes: 4 * 1024 * 1024 },
    callbackTimeoutMs: 2_000,
    ...overrides
  };
}

export async function makeTempDir(): Promise<{ dir: string; dispose: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "claimbot-test-"));
  return {
    dir,
    dispose: async () => {
      await rm(dir, { recursive: true, force: true });
    }
  };
}
