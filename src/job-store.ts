import { InvalidTransitionError, JobNotFoundError } from "./errors.js";
import type { ClaimRequest, JobPatch, JobRecord, JobStatus } from "./types.js";

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ["running"],
  running: ["completed", "failed"],
  completed: [],
  failed: []
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return from === to || TRANSITIONS[from].includes(to);
}

export function isTerminal(status: JobStatus): boolean {
  return status === "completed" || status === "failed";
}

/** One lock for every mutation; waiters run in arrival order. */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolvePromise) => {
      release = resolvePromise;
    });

    await previous;
    try {
      return await task();
    } finally {
      release();
    }
  }
}

export type JobListener = (record: JobRecord) => void;

export class JobStore {
  private readonly jobs = new Map<string, JobRecord>();
  private readonly requests = new Map<string, ClaimRequest>();
  private readonly listeners = new Set<JobListener>();
  private readonly mutex = new AsyncMutex();

  async add(record: JobRecord, request: ClaimRequest): Promise<JobRecord> {
    return this.mutex.runExclusive(() => {
      if (this.jobs.has(record.id)) {
        throw new Error(`Job '${record.id}' already exists`);
      }
      const stored = cloneRecord(record);
      this.jobs.set(record.id, stored);
      this.requests.set(record.id, request);
      this.emit(stored);
      return cloneRecord(stored);
    });
  }

  get(id: string): JobRecord | undefined {
    const record = this.jobs.get(id);
    return record ? cloneRecord(record) : undefined;
  }

  getRequest(id: string): ClaimRequest | undefined {
    return this.requests.get(id);
  }

  list(): JobRecord[] {
    return [...this.jobs.values()].map(cloneRecord);
  }

  /** Merges `patch` into the job under the store lock; status may only move forward and terminal records are final. */
  async update(id: string, patch: JobPatch): Promise<JobRecord> {
    return this.mutex.runExclusive(() => {
      const current = this.jobs.get(id);
      if (!current) {
        throw new JobNotFoundError(id);
      }

      if (isTerminal(current.status)) {
        throw new InvalidTransitionError(id, current.status, patch.status ?? current.status);
      }
      if (patch.status !== undefined && !canTransition(current.status, patch.status)) {
        throw new InvalidTransitionError(id, current.status, patch.status);
      }

      const next = cloneRecord({ ...current, ...definedFields(patch) });
      this.jobs.set(id, next);
      this.emit(next);
      return cloneRecord(next);
    });
  }

  /** Drops the inline request body once a job is terminal; the record stays. */
  releaseRequest(id: string): void {
    this.requests.delete(id);
  }

  subscribe(listener: JobListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(record: JobRecord): void {
    for (const listener of this.listeners) {
      listener(cloneRecord(record));
    }
  }
}

function definedFields(patch: JobPatch): JobPatch {
  const result: JobPatch = {};
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

export function cloneRecord(record: JobRecord): JobRecord {
  return {
    ...record,
    request: {
      ...record.request,
      documents: record.request.documents.map((document) => ({ ...document }))
    },
    completedSteps: [...record.completedSteps],
    errors: record.errors.map((entry) => ({ ...entry })),
    evidence: record.evidence.map((entry) => ({ ...entry }))
  };
}
