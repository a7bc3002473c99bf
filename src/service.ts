import { randomUUID } from "node:crypto";
import { AttachmentResolver } from "./attachments.js";
import type { AutomationSessionFactory } from "./automation.js";
import { systemClock, type Clock } from "./clock.js";
import type { AppConfig } from "./config.js";
import { parseClaimRequest, parseVerifyRequest, summarizeClaim } from "./contracts.js";
import { errorMessage, JobCancelledError, JobNotFoundError, UnexpectedWorkerError } from "./errors.js";
import { listEvidenceFiles, removeEvidence } from "./evidence.js";
import { JobQueue } from "./job-queue.js";
import { isTerminal, JobStore } from "./job-store.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { ProgressNotifier, type NotificationTarget } from "./notifier.js";
import { playwrightSessionFactory } from "./playwright-session.js";
import { StepRunner, type StepDefinition } from "./step-runner.js";
import { CLAIM_STEP_PLAN } from "./steps.js";
import type { JobRecord, StepEvent, VerificationResult } from "./types.js";
import { BookingVerifier } from "./verify.js";
import { WorkerPool } from "./worker-pool.js";

export interface ClaimServiceOptions {
  config: AppConfig;
  logger?: Logger;
  sessionFactory?: AutomationSessionFactory;
  clock?: Clock;
  plan?: readonly StepDefinition[];
  notifier?: ProgressNotifier;
  attachments?: AttachmentResolver;
  createId?: () => string;
  now?: () => Date;
  onStepEvent?: (jobId: string, event: StepEvent) => void;
}

/**
 * Accepts claim requests, queues them and runs each one through the step plan
 * on the worker pool. Job state lives in memory only.
 */
export class ClaimService {
  readonly store = new JobStore();
  private readonly queue = new JobQueue();
  private readonly pool: WorkerPool;
  private readonly logger: Logger;
  private readonly notifier: ProgressNotifier;
  private readonly attachments: AttachmentResolver;
  private readonly sessionFactory: AutomationSessionFactory;
  private readonly active = new Set<string>();
  private readonly waiters = new Map<string, Array<(record: JobRecord) => void>>();

  constructor(private readonly options: ClaimServiceOptions) {
    const { config } = options;
    this.logger = options.logger ?? defaultLogger;
    this.notifier =
      options.notifier ??
      new ProgressNotifier({ timeoutMs: config.callbackTimeoutMs, logger: this.logger, now: options.now });
    this.attachments =
      options.attachments ??
      new AttachmentResolver({
        rootDir: config.attachments.rootDir,
        maxTotalBytes: config.attachments.maxTotalBytes,
        logger: this.logger
      });
    this.sessionFactory = options.sessionFactory ?? playwrightSessionFactory(config.browser);
    this.pool = new WorkerPool({
      size: config.workers,
      queue: this.queue,
      logger: this.logger,
      process: (jobId, signal, log) => this.processJob(jobId, signal, log)
    });
  }

  async submit(raw: unknown): Promise<JobRecord> {
    const request = parseClaimRequest(raw);
    const record: JobRecord = {
      id: (this.options.createId ?? randomUUID)(),
      status: "queued",
      request: summarizeClaim(request),
      completedSteps: [],
      errors: [],
      evidence: [],
      caseNumber: null,
      createdAt: this.timestamp(),
      startedAt: null,
      completedAt: null
    };

    const stored = await this.store.add(record, request);
    this.queue.push(stored.id);
    this.logger.info({ jobId: stored.id, bookingCode: request.bookingCode }, "Claim queued");
    return stored;
  }

  /**
   * Checks that a booking exists and reads its flights. Runs immediately on
   * its own session, outside the claim queue, and posts one
   * `booking_verification` callback when a callback URL is given.
   */
  async verify(raw: unknown, signal?: AbortSignal): Promise<VerificationResult> {
    const request = parseVerifyRequest(raw);
    const id = (this.options.createId ?? randomUUID)();
    const { config } = this.options;
    const verifier = new BookingVerifier({
      sessionFactory: this.sessionFactory,
      verifyUrl: config.verifyUrl,
      timing: config.timing,
      logger: this.logger.child({ verificationId: id }),
      clock: this.options.clock,
      signal
    });

    const result = await verifier.verify(id, request);
    this.notifier.notifyVerification(
      { jobId: id, claimId: request.claimId, callbackUrl: request.callbackUrl },
      request,
      result
    );
    return result;
  }

  get(id: string): JobRecord | undefined {
    return this.store.get(id);
  }

  require(id: string): JobRecord {
    const record = this.store.get(id);
    if (!record) {
      throw new JobNotFoundError(id);
    }
    return record;
  }

  list(): JobRecord[] {
    return this.store.list();
  }

  async listEvidence(id: string): Promise<string[]> {
    this.require(id);
    return listEvidenceFiles(this.options.config.evidence.rootDir, id);
  }

  start(): void {
    this.pool.start();
  }

  async stop(): Promise<void> {
    await this.pool.stop();
    await this.notifier.flush();
  }

  /** Resolves once the job is terminal and its housekeeping has finished. */
  waitFor(id: string): Promise<JobRecord> {
    const record = this.require(id);
    if (isTerminal(record.status) && !this.active.has(id)) {
      return Promise.resolve(record);
    }

    return new Promise<JobRecord>((resolvePromise) => {
      const pending = this.waiters.get(id) ?? [];
      pending.push(resolvePromise);
      this.waiters.set(id, pending);
    });
  }

  async processJob(jobId: string, signal: AbortSignal, log: Logger = this.logger.child({ jobId })): Promise<void> {
    const request = this.store.getRequest(jobId);
    if (!request) {
      log.warn("Job has no request body; skipping");
      return;
    }

    const target: NotificationTarget = {
      jobId,
      claimId: request.claimId,
      callbackUrl: request.callbackUrl
    };
    const { config } = this.options;
    this.active.add(jobId);

    try {
      await this.store.update(jobId, { status: "running", startedAt: this.timestamp() });
      log.info({ bookingCode: request.bookingCode, documents: request.documents.length }, "Job started");

      const documentPaths = await this.attachments.resolve(jobId, request.documents, signal);
      const runner = new StepRunner({
        jobId,
        claim: request,
        documentPaths,
        plan: this.options.plan ?? CLAIM_STEP_PLAN,
        sessionFactory: this.sessionFactory,
        evidenceRootDir: config.evidence.rootDir,
        refundUrl: config.refundUrl,
        timing: config.timing,
        logger: log,
        clock: this.options.clock ?? systemClock,
        signal,
        hooks: {
          publish: async (progress) => {
            await this.store.update(jobId, progress);
          },
          stepCompleted: (step, progress) => {
            this.notifier.notifyStep(target, step.id, step.name, progress.caseNumber);
          },
          stepFailed: (step, error) => {
            this.notifier.notifyFailure(target, step.id, step.name, error.message);
          },
          event: (event) => {
            this.options.onStepEvent?.(jobId, event);
          }
        }
      });

      const outcome = await runner.run();
      await this.store.update(jobId, {
        status: outcome.success ? "completed" : "failed",
        completedAt: this.timestamp(),
        completedSteps: outcome.completedSteps,
        errors: outcome.errors,
        evidence: outcome.evidence,
        caseNumber: outcome.caseNumber
      });
      log.info(
        { success: outcome.success, caseNumber: outcome.caseNumber, steps: outcome.completedSteps.length },
        outcome.success ? "Job completed" : "Job failed"
      );
    } catch (error) {
      await this.failJob(jobId, target, error, log);
    } finally {
      await this.housekeeping(jobId, log);
      this.active.delete(jobId);
      this.store.releaseRequest(jobId);
      this.notifier.release(jobId);
      this.settle(jobId);
    }
  }

  private async failJob(jobId: string, target: NotificationTarget, error: unknown, log: Logger): Promise<void> {
    const message = errorMessage(error);
    if (error instanceof JobCancelledError) {
      log.warn("Job cancelled before completion");
    } else {
      log.error({ err: new UnexpectedWorkerError(jobId, error) }, "Job crashed");
    }

    const current = this.store.get(jobId);
    if (!current || isTerminal(current.status)) {
      return;
    }

    const patch = {
      status: "failed" as const,
      completedAt: this.timestamp(),
      errors: [...current.errors, { step: "worker", message }]
    };
    if (current.status === "queued") {
      await this.store.update(jobId, { status: "running", startedAt: this.timestamp() });
    }
    await this.store.update(jobId, patch);
    this.notifier.notifyFailure(target, "worker", "worker", message);
  }

  private async housekeeping(jobId: string, log: Logger): Promise<void> {
    const { config } = this.options;
    try {
      await this.attachments.cleanup(jobId);
      if (!config.evidence.keep) {
        await removeEvidence(config.evidence.rootDir, jobId);
      }
    } catch (error) {
      log.warn({ error: errorMessage(error) }, "Housekeeping failed");
    }
  }

  private settle(jobId: string): void {
    const pending = this.waiters.get(jobId);
    const record = this.store.get(jobId);
    if (!pending || !record) {
      return;
    }
    this.waiters.delete(jobId);
    for (const resolvePromise of pending) {
      resolvePromise(record);
    }
  }

  private timestamp(): string {
    return (this.options.now ?? (() => new Date()))().toISOString();
  }
}
