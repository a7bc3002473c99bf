import type { JobStatus } from "./types.js";

export class StepFailureError extends Error {
  readonly step: string;
  readonly evidence?: string;

  constructor(step: string, message: string, evidence?: string) {
    super(`[${step}] ${message}`);
    this.name = "StepFailureError";
    this.step = step;
    this.evidence = evidence;
  }
}

export class ElementNotFoundError extends Error {
  readonly intent: string;
  readonly attempts: string[];

  constructor(intent: string, attempts: string[]) {
    const detail = attempts.map((entry) => `- ${entry}`).join("\n");
    super([`Unable to resolve element for ${intent}.`, detail].filter(Boolean).join("\n"));
    this.name = "ElementNotFoundError";
    this.intent = intent;
    this.attempts = attempts;
  }
}

export class UnexpectedWorkerError extends Error {
  readonly jobId: string;

  constructor(jobId: string, cause: unknown) {
    super(`Job ${jobId} crashed: ${errorMessage(cause)}`, { cause });
    this.name = "UnexpectedWorkerError";
    this.jobId = jobId;
  }
}

export class NotificationDeliveryError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(message);
    this.name = "NotificationDeliveryError";
    this.url = url;
    this.status = status;
  }
}

export class JobCancelledError extends Error {
  constructor(message = "Job run was cancelled") {
    super(message);
    this.name = "JobCancelledError";
  }
}

export class JobNotFoundError extends Error {
  readonly jobId: string;

  constructor(jobId: string) {
    super(`Job '${jobId}' was not found`);
    this.name = "JobNotFoundError";
    this.jobId = jobId;
  }
}

export class InvalidTransitionError extends Error {
  constructor(jobId: string, from: JobStatus, to: JobStatus) {
    super(`Job '${jobId}' cannot move from '${from}' to '${to}'`);
    this.name = "InvalidTransitionError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function firstLine(message: string): string {
  return message.split("\n")[0] ?? message;
}
