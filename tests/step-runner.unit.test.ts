import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JobCancelledError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { StepRunner, type StepDefinition, type StepRunnerOptions } from "../src/step-runner.js";
import { CLAIM_STEP_PLAN, claimStepNames } from "../src/steps.js";
import type { RunProgress, StepEvent } from "../src/types.js";
import { CONFIRMATION_TEXT, makeTempDir, sampleClaim, testTiming } from "./helpers/claims.js";
import { FakeClock, fakeSessions, type FakePageOptions } from "./helpers/fakeAutomation.js";

describe("StepRunner", () => {
  let temp: { dir: string; dispose: () => Promise<void> };

  beforeEach(async () => {
    temp = await makeTempDir();
  });

  afterEach(async () => {
    await temp.dispose();
  });

  function createRunner(
    pageOptions: FakePageOptions,
    overrides: Partial<StepRunnerOptions> = {}
  ): {
    runner: StepRunner;
    fakes: ReturnType<typeof fakeSessions>;
    clock: FakeClock;
    events: StepEvent[];
    published: RunProgress[];
  } {
    const fakes = fakeSessions(pageOptions);
    const clock = new FakeClock();
    const events: StepEvent[] = [];
    const published: RunProgress[] = [];
    const runner = new StepRunner({
      jobId: "job-1",
      claim: sampleClaim(),
      documentPaths: [],
      plan: CLAIM_STEP_PLAN,
      sessionFactory: fakes.factory,
      evidenceRootDir: temp.dir,
      refundUrl: "https://refunds.example.test/claim",
      timing: testTiming(),
      logger: silentLogger,
      clock,
      hooks: {
        publish: (progress) => {
          published.push(progress);
        },
        event: (event) => {
          events.push(event);
        }
      },
      ...overrides
    });
    return { runner, fakes, clock, events, published };
  }

  it("runs the whole claim plan and extracts the case number", async () => {
    const { runner, fakes, published } = createRunner(
      { bodyText: CONFIRMATION_TEXT },
      { documentPaths: ["/tmp/claim/certificate.pdf"] }
    );

    const outcome = await runner.run();

    expect(outcome.success).toBe(true);
    expect(outcome.completedSteps).toEqual(claimStepNames());
    expect(outcome.caseNumber).toBe("9988776");
    expect(outcome.errors).toEqual([]);
    expect(published).toHaveLength(14);

    const page = fakes.page;
    expect(page.visitedUrl).toBe("https://refunds.example.test/claim");
    expect(page.fills.get('input[placeholder*="code" i]')).toBe("EHZRMC");
    expect(page.fills.get('input[placeholder*="email" i]')).toBe("traveller@example.com");
    expect(page.fills.get('input[placeholder*="first name" i]')).toBe("Ana");
    expect(page.fills.get('input[placeholder*="surname" i]')).toBe("Lopez");
    expect(page.fills.get('input[placeholder*="phone" i]:visible')).toBe("600111222");
    expect(page.fills.get("textarea:visible")).toBe("Medical certificate attached");
    expect(page.log).toContain('click button:has-text("PREGNANT")');
    expect(page.log).toContain("click text=(+34)");
    expect(page.uploads).toEqual([["/tmp/claim/certificate.pdf"]]);

    expect(fakes.sessions).toHaveLength(1);
    expect(fakes.sessions[0]?.closed).toBe(1);
  });

  it("stops at the failing step and keeps only the steps before it", async () => {
    const failedSteps: string[] = [];
    const { runner, fakes, events } = createRunner(
      { hidden: (selector) => selector.toLowerCase().includes("pregnant") },
      {
        hooks: {
          stepFailed: (step) => {
            failedSteps.push(step.id);
          },
          event: (event) => {
            events.push(event);
          }
        }
      }
    );

    const outcome = await runner.run();

    expect(outcome.success).toBe(false);
    expect(outcome.completedSteps).toEqual(claimStepNames().slice(0, 5));
    expect(outcome.errors).toHaveLength(1);
    expect(outcome.errors[0]?.step).toBe("Select Reason");
    expect(outcome.errors[0]?.message.split("\n")[0]).toBe(
      "Unable to resolve element for any of 'PREGNANT', 'Pregnant', 'pregnant'."
    );
    expect(outcome.errors[0]?.evidence).toMatch(/job-1\/\d{2}_error_select_reason\.png$/);
    expect(outcome.caseNumber).toBeNull();
    expect(failedSteps).toEqual(["select_reason"]);

    const retries = events.filter((event) => event.type === "step:retry" && event.step === "Select Reason");
    expect(retries).toHaveLength(2);
    expect(fakes.sessions[0]?.closed).toBe(1);
  });

  it("retries a flaky step after the backoff", async () => {
    let calls = 0;
    const plan: StepDefinition[] = [
      {
        id: "launch",
        name: "Launch",
        retries: 1,
        run: async (context) => {
          await context.openPage();
        }
      },
      {
        id: "flaky",
        name: "Flaky",
        retries: 2,
        run: async () => {
          calls += 1;
          if (calls === 1) {
            throw new Error("widget not ready");
          }
        }
      }
    ];
    const { runner, clock, events } = createRunner({}, { plan });

    const outcome = await runner.run();

    expect(outcome).toMatchObject({ success: true, completedSteps: ["Launch", "Flaky"], errors: [] });
    expect(calls).toBe(2);
    expect(clock.sleeps).toEqual([3_000]);
    expect(events.map((event) => event.type)).toEqual([
      "step:start",
      "step:success",
      "step:start",
      "step:retry",
      "step:start",
      "step:success"
    ]);
  });

  it("records a failure without evidence when no page is open", async () => {
    const plan: StepDefinition[] = [
      {
        id: "read",
        name: "Read Page",
        retries: 1,
        run: async (context) => {
          context.page();
        }
      }
    ];
    const { runner } = createRunner({}, { plan });

    const outcome = await runner.run();

    expect(outcome.success).toBe(false);
    expect(outcome.errors).toEqual([
      { step: "Read Page", message: "Automation session is not open; the launch step must run first" }
    ]);
  });

  it("closes the session when the run is cancelled", async () => {
    const controller = new AbortController();
    const plan: StepDefinition[] = [
      {
        id: "launch",
        name: "Launch",
        retries: 2,
        run: async (context) => {
          await context.openPage();
        }
      },
      {
        id: "wait",
        name: "Wait",
        retries: 3,
        run: async (context) => {
          controller.abort();
          await context.clock.sleep(1_000, context.signal);
        }
      }
    ];
    const { runner, fakes } = createRunner({}, { plan, signal: controller.signal });

    await expect(runner.run()).rejects.toBeInstanceOf(JobCancelledError);
    expect(runner.progress().completedSteps).toEqual(["Launch"]);
    expect(fakes.sessions[0]?.closed).toBe(1);
  });
});
