import { mkdir, rm, writeFile } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import { fetch } from "undici";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { DocumentInput } from "./types.js";

export const ALLOWED_EXTENSIONS: ReadonlySet<string> = new Set([
  ".pdf",
  ".jpg",
  ".jpeg",
  ".png",
  ".gif",
  ".tiff",
  ".tif"
]);

const DOWNLOAD_TIMEOUT_MS = 30_000;

export interface AttachmentResolverOptions {
  rootDir: string;
  maxTotalBytes: number;
  logger: Logger;
  downloadTimeoutMs?: number;
}

/** Turns inline and remote documents into files under `<rootDir>/<jobId>/`. */
export class AttachmentResolver {
  constructor(private readonly options: AttachmentResolverOptions) {}

  jobDir(jobId: string): string {
    return resolve(this.options.rootDir, jobId);
  }

  async resolve(jobId: string, documents: DocumentInput[], signal?: AbortSignal): Promise<string[]> {
    if (documents.length === 0) {
      return [];
    }

    const dir = this.jobDir(jobId);
    await mkdir(dir, { recursive: true });

    const log = this.options.logger.child({ jobId });
    const written: string[] = [];
    let totalBytes = 0;

    for (const document of documents) {
      const filename = basename(document.filename);
      const extension = extname(filename).toLowerCase();
      if (!ALLOWED_EXTENSIONS.has(extension)) {
        log.warn({ filename, extension }, "Skipping document with unsupported extension");
        continue;
      }

      let content: Buffer;
      try {
        const loaded = await this.load(document, signal);
        if (!loaded) {
          log.warn({ filename }, "Skipping document without a usable source");
          continue;
        }
        content = loaded;
      } catch (error) {
        log.warn({ filename, error: errorMessage(error) }, "Failed to fetch document");
        continue;
      }

      if (totalBytes + content.byteLength > this.options.maxTotalBytes) {
        log.warn(
          { filename, bytes: content.byteLength, limit: this.options.maxTotalBytes },
          "Skipping document over the total size limit"
        );
        continue;
      }

      const path = join(dir, filename);
      try {
        await writeFile(path, content);
      } catch (error) {
        log.warn({ filename, error: errorMessage(error) }, "Failed to store document");
        continue;
      }
      totalBytes += content.byteLength;
      written.push(path);
      log.info({ filename, bytes: content.byteLength }, "Document stored");
    }

    return written;
  }

  async cleanup(jobId: string): Promise<void> {
    await rm(this.jobDir(jobId), { recursive: true, force: true });
  }

  private async load(document: DocumentInput, signal?: AbortSignal): Promise<Buffer | undefined> {
    if (document.base64 !== undefined) {
      return decodeInline(document.base64);
    }
    if (document.url === undefined) {
      return undefined;
    }
    if (!/^https?:\/\//i.test(document.url)) {
      throw new Error(`Unsupported document URL: ${document.url}`);
    }

    const timeout = AbortSignal.timeout(this.options.downloadTimeoutMs ?? DOWNLOAD_TIMEOUT_MS);
    const response = await fetch(document.url, {
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout
    });
    if (response.status !== 200) {
      await response.body?.cancel();
      throw new Error(`HTTP ${response.status}`);
    }
    return Buffer.from(await response.arrayBuffer());
  }
}

export function decodeInline(value: string): Buffer {
  const payload = value.replace(/^data:[^;,]*;base64,/i, "").replace(/\s+/g, "");
  if (payload.length === 0 || !/^[A-Za-z0-9+/_-]+={0,2}$/.test(payload)) {
    throw new Error("Inline document is not valid base64");
  }
  return Buffer.from(payload, "base64");
}
