import { mkdir, readdir, rm } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { AutomationPage } from "./automation.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { EvidenceArtifact } from "./types.js";

export interface EvidenceRecorderOptions {
  rootDir: string;
  jobId: string;
  logger: Logger;
  now?: () => Date;
}

/** Numbered full-page snapshots for one job, stored under `<rootDir>/<jobId>/`. */
export class EvidenceRecorder {
  readonly dir: string;
  private sequence = 0;
  private readonly artifacts: EvidenceArtifact[] = [];

  constructor(private readonly options: EvidenceRecorderOptions) {
    this.dir = resolve(options.rootDir, options.jobId);
  }

  async capture(page: AutomationPage | null, label: string): Promise<EvidenceArtifact | undefined> {
    if (!page) {
      return undefined;
    }

    this.sequence += 1;
    const safeLabel = sanitizeLabel(label);
    const path = join(this.dir, `${String(this.sequence).padStart(2, "0")}_${safeLabel}.png`);

    try {
      await mkdir(this.dir, { recursive: true });
      await page.screenshot(path);
    } catch (error) {
      this.options.logger.warn({ label: safeLabel, error: errorMessage(error) }, "Evidence capture failed");
      return undefined;
    }

    const artifact: EvidenceArtifact = {
      sequence: this.sequence,
      label: safeLabel,
      path,
      capturedAt: (this.options.now ?? (() => new Date()))().toISOString()
    };
    this.artifacts.push(artifact);
    this.options.logger.debug({ path }, "Evidence captured");
    return artifact;
  }

  list(): EvidenceArtifact[] {
    return [...this.artifacts];
  }
}

export function sanitizeLabel(label: string): string {
  const cleaned = label
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return cleaned.length > 0 ? cleaned : "snapshot";
}

export async function listEvidenceFiles(rootDir: string, jobId: string): Promise<string[]> {
  const dir = resolve(rootDir, jobId);
  try {
    const entries = await readdir(dir);
    return entries
      .filter((entry) => entry.endsWith(".png"))
      .sort((left, right) => left.localeCompare(right))
      .map((entry) => join(dir, entry));
  } catch (error) {
    if (isMissingPath(error)) {
      return [];
    }
    throw error;
  }
}

export async function removeEvidence(rootDir: string, jobId: string): Promise<void> {
  await rm(resolve(rootDir, jobId), { recursive: true, force: true });
}

function isMissingPath(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
