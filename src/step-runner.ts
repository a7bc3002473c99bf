import {
  findWidgetContext,
  type AutomationContext,
  type AutomationPage,
  type AutomationSession,
  type AutomationSessionFactory
} from "./automation.js";
import { waitForResponse, type ResponseWaitOptions, type ResponseWaitResult } from "./change-detector.js";
import { randomBetween, systemClock, type Clock } from "./clock.js";
import type { TimingConfig } from "./config.js";
import { errorMessage, JobCancelledError, StepFailureError } from "./errors.js";
import { EvidenceRecorder } from "./evidence.js";
import type { Logger } from "./logger.js";
import type {
  ClaimRequest,
  EvidenceArtifact,
  RunOutcome,
  RunProgress,
  StepErrorRecord,
  StepEvent
} from "./types.js";

export interface PostCondition {
  selector: string;
  timeoutMs?: number;
}

export interface StepDefinition {
  id: string;
  name: string;
  /** Total attempts, including the first. */
  retries: number;
  run(context: StepContext): Promise<void>;
  postCondition?: PostCondition;
}

export interface StepContext {
  readonly jobId: string;
  readonly claim: ClaimRequest;
  readonly documentPaths: string[];
  readonly refundUrl: string;
  readonly timing: TimingConfig;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly signal: AbortSignal;
  openPage(): Promise<AutomationPage>;
  page(): AutomationPage;
  widget(): Promise<AutomationContext>;
  capture(label: string): Promise<EvidenceArtifact | undefined>;
  setCaseNumber(value: string): void;
  pause(minMs?: number, maxMs?: number): Promise<void>;
  waitForResponse(context: AutomationContext, options?: Partial<ResponseWaitOptions>): Promise<ResponseWaitResult>;
}

export interface StepRunnerHooks {
  publish?(progress: RunProgress): Promise<void> | void;
  stepCompleted?(step: StepDefinition, progress: RunProgress): void;
  stepFailed?(step: StepDefinition, error: StepErrorRecord, progress: RunProgress): void;
  event?(event: StepEvent): void;
}

export interface StepRunnerOptions {
  jobId: string;
  claim: ClaimRequest;
  documentPaths: string[];
  plan: readonly StepDefinition[];
  sessionFactory: AutomationSessionFactory;
  evidenceRootDir: string;
  refundUrl: string;
  timing: TimingConfig;
  logger: Logger;
  clock?: Clock;
  signal?: AbortSignal;
  hooks?: StepRunnerHooks;
}

/**
 * Runs one job's step plan strictly in order against its own automation
 * session. Owns the per-run accumulator and always releases the session.
 */
export class StepRunner {
  private readonly clock: Clock;
  private readonly signal: AbortSignal;
  private readonly evidence: EvidenceRecorder;
  private readonly completedSteps: string[] = [];
  private readonly errors: StepErrorRecord[] = [];
  private caseNumber: string | null = null;
  private session: AutomationSession | null = null;
  private currentPage: AutomationPage | null = null;

  constructor(private readonly options: StepRunnerOptions) {
    this.clock = options.clock ?? systemClock;
    this.signal = options.signal ?? new AbortController().signal;
    this.evidence = new EvidenceRecorder({
      rootDir: options.evidenceRootDir,
      jobId: options.jobId,
      logger: options.logger
    });
  }

  async run(): Promise<RunOutcome> {
    try {
      for (const step of this.options.plan) {
        await this.runStep(step);
      }
      return { success: true, ...this.progress() };
    } catch (error) {
      if (error instanceof StepFailureError) {
        this.options.logger.error(
          { step: error.step, completedSteps: this.completedSteps },
          "Step plan aborted"
        );
        return { success: false, ...this.progress() };
      }
      throw error;
    } finally {
      await this.releaseSession();
    }
  }

  progress(): RunProgress {
    return {
      completedSteps: [...this.completedSteps],
      errors: this.errors.map((entry) => ({ ...entry })),
      evidence: this.evidence.list(),
      caseNumber: this.caseNumber
    };
  }

  private async runStep(step: StepDefinition): Promise<void> {
    const retries = Math.max(1, step.retries);
    const context = this.createContext();
    const hooks = this.options.hooks ?? {};

    for (let attempt = 1; attempt <= retries; attempt += 1) {
      this.throwIfAborted();
      hooks.event?.({ type: "step:start", step: step.name, attempt, retries });
      const startedAt = this.clock.now();

      try {
        await step.run(context);
        if (step.postCondition) {
          await this.awaitPostCondition(step, step.postCondition);
        }
      } catch (error) {
        if (error instanceof JobCancelledError || this.signal.aborted) {
          throw error instanceof JobCancelledError ? error : new JobCancelledError();
        }

        const message = errorMessage(error);
        if (attempt < retries) {
          const backoffMs = this.options.timing.retryBackoffMs;
          this.options.logger.warn({ step: step.name, attempt, retries, error: message }, "Step attempt failed");
          hooks.event?.({ type: "step:retry", step: step.name, attempt, retries, message, backoffMs });
          await this.clock.sleep(backoffMs, this.signal);
          continue;
        }

        const artifact = await this.evidence.capture(this.currentPage, `error_${step.id}`);
        const record: StepErrorRecord = { step: step.name, message };
        if (artifact) {
          record.evidence = artifact.path;
        }
        this.errors.push(record);
        hooks.event?.({ type: "step:failure", step: step.name, attempt, message, evidence: artifact?.path });
        const progress = this.progress();
        await hooks.publish?.(progress);
        hooks.stepFailed?.(step, record, progress);
        throw new StepFailureError(step.name, message, artifact?.path);
      }

      this.completedSteps.push(step.name);
      hooks.event?.({
        type: "step:success",
        step: step.name,
        attempt,
        durationMs: this.clock.now() - startedAt
      });
      const progress = this.progress();
      await hooks.publish?.(progress);
      hooks.stepCompleted?.(step, progress);
      return;
    }
  }

  private async awaitPostCondition(step: StepDefinition, condition: PostCondition): Promise<void> {
    const widget = await findWidgetContext(this.requirePage());
    const found = await widget
      .locator(condition.selector)
      .first()
      .waitFor({ state: "visible", timeout: condition.timeoutMs ?? 15_000 })
      .then(() => true)
      .catch(() => false);

    if (!found) {
      this.options.logger.info(
        { step: step.name, selector: condition.selector },
        "Post-condition not observed; continuing"
      );
      await this.clock.sleep(5_000, this.signal);
    }
  }

  private createContext(): StepContext {
    const { options } = this;
    const timing = options.timing;

    return {
      jobId: options.jobId,
      claim: options.claim,
      documentPaths: options.documentPaths,
      refundUrl: options.refundUrl,
      timing,
      clock: this.clock,
      logger: options.logger,
      signal: this.signal,
      openPage: () => this.openPage(),
      page: () => this.requirePage(),
      widget: () => findWidgetContext(this.requirePage()),
      capture: (label) => this.evidence.capture(this.currentPage, label),
      setCaseNumber: (value) => {
        this.caseNumber = value;
      },
      pause: (minMs = timing.minDelayMs, maxMs = timing.maxDelayMs) =>
        this.clock.sleep(randomBetween(minMs, maxMs), this.signal),
      waitForResponse: (context, waitOptions = {}) =>
        waitForResponse(
          context,
          {
            timeoutMs: timing.stepTimeoutMs,
            ...waitOptions,
            signal: this.signal
          },
          this.clock
        )
    };
  }

  private async openPage(): Promise<AutomationPage> {
    await this.releaseSession();
    const session = this.options.sessionFactory();
    this.session = session;
    this.currentPage = await session.open();
    return this.currentPage;
  }

  private requirePage(): AutomationPage {
    if (!this.currentPage) {
      throw new Error("Automation session is not open; the launch step must run first");
    }
    return this.currentPage;
  }

  private async releaseSession(): Promise<void> {
    const session = this.session;
    this.session = null;
    this.currentPage = null;
    if (!session) {
      return;
    }

    try {
      await session.close();
    } catch (error) {
      this.options.logger.warn({ error: errorMessage(error) }, "Failed to close automation session");
    }
  }

  private throwIfAborted(): void {
    if (this.signal.aborted) {
      throw new JobCancelledError();
    }
  }
}
