import { describe, expect, it } from "vitest";
import type { AutomationContext } from "../src/automation.js";
import { awaitChange, countContent, detectChange, waitForResponse } from "../src/change-detector.js";
import { JobCancelledError } from "../src/errors.js";
import { FakeClock, FakePage } from "./helpers/fakeAutomation.js";

function sequence(values: number[]): () => Promise<number> {
  const queue = [...values];
  return async () => (queue.length > 1 ? (queue.shift() ?? 0) : (queue[0] ?? 0));
}

describe("detectChange", () => {
  it("reports no change once the timeout passes without growth", async () => {
    const clock = new FakeClock();
    const result = await detectChange(
      sequence([3]),
      { baseline: 3, timeoutMs: 2_000, settleMs: 1_000, maxSettleRetries: 3 },
      clock
    );

    expect(result).toEqual({ changed: false, count: 3 });
    expect(clock.sleeps).toEqual([500, 500, 500, 500]);
    expect(clock.now()).toBe(2_000);
  });

  it("debounces after growth until two reads agree", async () => {
    const clock = new FakeClock();
    const result = await detectChange(
      sequence([3, 5, 6, 7, 7]),
      { baseline: 3, timeoutMs: 10_000, settleMs: 1_500, maxSettleRetries: 3 },
      clock
    );

    expect(result).toEqual({ changed: true, count: 7 });
    expect(clock.sleeps).toEqual([500, 500, 1_500, 1_000, 1_000]);
  });

  it("stops re-polling after the settle retry budget", async () => {
    const clock = new FakeClock();
    const result = await detectChange(
      sequence([4, 5, 6, 7, 8, 9]),
      { baseline: 3, timeoutMs: 10_000, settleMs: 2_000, maxSettleRetries: 2 },
      clock
    );

    expect(result).toEqual({ changed: true, count: 7 });
    expect(clock.sleeps).toEqual([500, 2_000, 1_000, 1_000]);
  });

  it("honours custom poll intervals", async () => {
    const clock = new FakeClock();
    const changed = await awaitChange(
      sequence([0]),
      { baseline: 0, timeoutMs: 600, settleMs: 0, maxSettleRetries: 0, pollIntervalMs: 200 },
      clock
    );

    expect(changed).toBe(false);
    expect(clock.sleeps).toEqual([200, 200, 200]);
  });

  it("never polls past the deadline when the timeout is not a multiple of the interval", async () => {
    const clock = new FakeClock();
    const changed = await awaitChange(
      sequence([0]),
      { baseline: 0, timeoutMs: 1_200, settleMs: 0, maxSettleRetries: 3 },
      clock
    );

    expect(changed).toBe(false);
    expect(clock.sleeps).toEqual([500, 500, 200]);
    expect(clock.now()).toBe(1_200);
  });

  it("rejects when the run is cancelled", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      detectChange(
        sequence([1]),
        { baseline: 1, timeoutMs: 5_000, settleMs: 0, maxSettleRetries: 0, signal: controller.signal },
        new FakeClock()
      )
    ).rejects.toBeInstanceOf(JobCancelledError);
  });
});

describe("countContent", () => {
  it("takes the largest count and treats a failing selector as zero", async () => {
    const page = new FakePage();
    page.messages = 4;
    const broken = page.locator(".message");
    broken.count = async () => {
      throw new Error("frame was detached");
    };
    const context: AutomationContext = {
      label: "frame",
      locator: (selector) => (selector === ".message" ? broken : page.locator(selector)),
      getByText: (text) => page.getByText(text),
      getByLabel: (text) => page.getByLabel(text)
    };

    await expect(countContent(context)).resolves.toBe(4);
    await expect(countContent(context, [".message"])).resolves.toBe(0);
  });
});

describe("waitForResponse", () => {
  it("sleeps the fallback when the conversation does not move", async () => {
    const clock = new FakeClock();
    const page = new FakePage();
    page.messages = 2;

    const result = await waitForResponse(page, { timeoutMs: 1_000, fallbackMs: 8_000 }, clock);

    expect(result).toEqual({ changed: false, count: 2 });
    expect(clock.sleeps).toEqual([500, 500, 8_000]);
  });

  it("adds a grace period when the expected control never shows", async () => {
    const clock = new FakeClock();
    const page = new FakePage({ hidden: (selector) => selector === "input[type='file']" });

    const result = await waitForResponse(
      page,
      { timeoutMs: 500, fallbackMs: 1_000, expectSelector: "input[type='file']", expectGraceMs: 4_000 },
      clock
    );

    expect(result.expectedFound).toBe(false);
    expect(clock.sleeps).toEqual([500, 1_000, 4_000]);
  });

  it("skips the grace period when the expected control is visible", async () => {
    const clock = new FakeClock();
    const page = new FakePage();

    const result = await waitForResponse(
      page,
      { timeoutMs: 500, fallbackMs: 1_000, expectSelector: "button:has-text('Select')" },
      clock
    );

    expect(result.expectedFound).toBe(true);
    expect(clock.sleeps).toEqual([500, 1_000]);
  });
});
