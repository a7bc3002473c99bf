import { JobCancelledError, UnexpectedWorkerError } from "./errors.js";
import type { JobQueue } from "./job-queue.js";
import type { Logger } from "./logger.js";

export type JobProcessor = (jobId: string, signal: AbortSignal, logger: Logger) => Promise<void>;

export interface WorkerPoolOptions {
  size: number;
  queue: JobQueue;
  process: JobProcessor;
  logger: Logger;
}

export class WorkerPool {
  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];

  constructor(private readonly options: WorkerPoolOptions) {}

  get running(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) {
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    const size = Math.max(1, this.options.size);
    this.loops = Array.from({ length: size }, (_, index) => this.loop(index + 1, controller.signal));
    this.options.logger.info({ workers: size }, "Worker pool started");
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      return;
    }

    controller.abort();
    await Promise.all(this.loops);
    this.controller = null;
    this.loops = [];
    this.options.logger.info("Worker pool stopped");
  }

  private async loop(worker: number, signal: AbortSignal): Promise<void> {
    const log = this.options.logger.child({ worker });

    while (!signal.aborted) {
      let jobId: string;
      try {
        jobId = await this.options.queue.take(signal);
      } catch (error) {
        if (error instanceof JobCancelledError) {
          break;
        }
        throw error;
      }

      const jobLog = log.child({ jobId });
      try {
        await this.options.process(jobId, signal, jobLog);
      } catch (error) {
        if (error instanceof JobCancelledError) {
          jobLog.info("Job interrupted by shutdown");
          continue;
        }
        const wrapped = new UnexpectedWorkerError(jobId, error);
        jobLog.error({ err: wrapped }, "Worker caught an unexpected error");
      }
    }
  }
}
