import type { AutomationContext } from "./automation.js";
import { systemClock, type Clock } from "./clock.js";

export const CONTENT_SELECTORS = [
  ".message",
  ".chat-message",
  "[class*='message']",
  "[class*='bubble']",
  "[class*='response']",
  "[class*='answer']"
];

export type SignalSource = () => Promise<number>;

export interface AwaitChangeOptions {
  baseline: number;
  timeoutMs: number;
  settleMs: number;
  maxSettleRetries: number;
  pollIntervalMs?: number;
  settleIntervalMs?: number;
  signal?: AbortSignal;
}

export interface ChangeResult {
  changed: boolean;
  count: number;
}

const DEFAULT_POLL_INTERVAL_MS = 500;
const DEFAULT_SETTLE_INTERVAL_MS = 1_000;

/**
 * Polls `source` until its count grows past the baseline, then debounces until
 * the count stops moving. A timeout without growth is reported as
 * `changed: false`; some widget turns never change the count.
 */
export async function detectChange(
  source: SignalSource,
  options: AwaitChangeOptions,
  clock: Clock = systemClock
): Promise<ChangeResult> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const settleIntervalMs = options.settleIntervalMs ?? DEFAULT_SETTLE_INTERVAL_MS;
  const deadline = clock.now() + options.timeoutMs;

  let current = options.baseline;
  let grew = false;
  while (clock.now() < deadline) {
    await clock.sleep(Math.min(pollIntervalMs, deadline - clock.now()), options.signal);
    current = await source();
    if (current > options.baseline) {
      grew = true;
      break;
    }
  }

  if (!grew) {
    return { changed: false, count: current };
  }

  await clock.sleep(options.settleMs, options.signal);
  let stable = await source();
  for (let retry = 0; retry < options.maxSettleRetries; retry += 1) {
    await clock.sleep(settleIntervalMs, options.signal);
    const next = await source();
    if (next === stable) {
      break;
    }
    stable = next;
  }

  return { changed: true, count: stable };
}

export async function awaitChange(
  source: SignalSource,
  options: AwaitChangeOptions,
  clock: Clock = systemClock
): Promise<boolean> {
  const result = await detectChange(source, options, clock);
  return result.changed;
}

export async function countContent(
  context: AutomationContext,
  selectors: string[] = CONTENT_SELECTORS
): Promise<number> {
  let max = 0;
  for (const selector of selectors) {
    const count = await context
      .locator(selector)
      .count()
      .catch(() => 0);
    if (count > max) {
      max = count;
    }
  }
  return max;
}

export function contentSignal(context: AutomationContext, selectors?: string[]): SignalSource {
  return () => countContent(context, selectors);
}

export interface ResponseWaitOptions {
  timeoutMs: number;
  settleMs?: number;
  maxSettleRetries?: number;
  fallbackMs?: number;
  expectSelector?: string;
  expectTimeoutMs?: number;
  expectGraceMs?: number;
  signal?: AbortSignal;
}

export interface ResponseWaitResult {
  changed: boolean;
  count: number;
  expectedFound?: boolean;
}

/**
 * Step-facing wrapper: reads the current baseline, waits for the bot to reply,
 * and falls back to a fixed pause when nothing observable happens.
 */
export async function waitForResponse(
  context: AutomationContext,
  options: ResponseWaitOptions,
  clock: Clock = systemClock
): Promise<ResponseWaitResult> {
  const source = contentSignal(context);
  const baseline = await source();
  const result = await detectChange(
    source,
    {
      baseline,
      timeoutMs: options.timeoutMs,
      settleMs: options.settleMs ?? 2_000,
      maxSettleRetries: options.maxSettleRetries ?? 3,
      signal: options.signal
    },
    clock
  );

  if (!result.changed) {
    await clock.sleep(options.fallbackMs ?? 8_000, options.signal);
  }

  if (!options.expectSelector) {
    return result;
  }

  const expectedFound = await context
    .locator(options.expectSelector)
    .first()
    .waitFor({ state: "visible", timeout: options.expectTimeoutMs ?? 15_000 })
    .then(() => true)
    .catch(() => false);
  if (!expectedFound) {
    await clock.sleep(options.expectGraceMs ?? 5_000, options.signal);
  }

  return { ...result, expectedFound };
}
