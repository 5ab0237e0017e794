import { readFile } from "node:fs/promises";
import { performance } from "node:perf_hooks";
import { setTimeout as sleep } from "node:timers/promises";
import { invokeBackend } from "../backend/index.js";
import { parseClassification } from "../classifier/index.js";
import { logger } from "../config/logger.js";
import { normalizeEmail } from "../parser/index.js";
import { buildPrompt } from "../prompt/index.js";
import {
  PipelineError,
  fail,
  isFailedRecord,
  type BackendConfig,
  type BatchRecord,
  type ClassificationResult,
  type ClassifiedRecord,
  type EmailDocument,
  type FailedRecord,
  type StageResult,
} from "../types/index.js";

export interface BatchOptions {
  backend: BackendConfig;
  /** Files classified at the same time. Defaults to 2. */
  concurrency?: number;
  maxBodyChars?: number;
  /** Extra attempts after a BackendTimeout, 0 or 1. Defaults to 1. */
  timeoutRetries?: number;
  retryDelayMs?: number;
  signal?: AbortSignal;
  fetch?: typeof fetch;
}

/**
 * Backoff before retry number `attempt`: baseDelayMs * 2^(attempt - 1).
 */
export function retryDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * Math.pow(2, attempt - 1);
}

export function toFailedRecord(error: PipelineError): FailedRecord {
  return {
    file: error.sourceFile,
    error: { type: error.kind, message: error.message },
  };
}

function toClassifiedRecord(
  doc: EmailDocument,
  result: ClassificationResult,
  inferenceSeconds: number
): ClassifiedRecord {
  return {
    file: result.sourceFile,
    email_metadata: {
      subject: doc.subject,
      from: doc.fromAddress,
      to: [...doc.toAddresses],
    },
    classification: result.category,
    certainty_level: result.certainty,
    content_keywords: [...result.keywords],
    reason: result.reason,
    inference_time: Math.round(inferenceSeconds * 1000) / 1000,
  };
}

async function invokeWithRetry(
  prompt: string,
  file: string,
  options: BatchOptions
): Promise<StageResult<string>> {
  const retries = Math.min(1, Math.max(0, options.timeoutRetries ?? 1));
  const baseDelayMs = options.retryDelayMs ?? 1000;

  for (let attempt = 1; ; attempt++) {
    const reply = await invokeBackend(prompt, options.backend, {
      sourceFile: file,
      signal: options.signal,
      fetch: options.fetch,
    });
    if (reply.success || reply.error.kind !== "BackendTimeout" || attempt > retries) {
      return reply;
    }

    const delayMs = retryDelay(attempt, baseDelayMs);
    logger.info({ file, attempt, delayMs }, "Retrying backend call after timeout");
    try {
      await sleep(delayMs, undefined, { signal: options.signal });
    } catch (err) {
      if (options.signal?.aborted) {
        return fail("Cancelled", file, "Batch was cancelled while waiting to retry");
      }
      throw err;
    }
  }
}

async function runPipeline(file: string, options: BatchOptions): Promise<BatchRecord> {
  let raw: Buffer;
  try {
    raw = await readFile(file);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return toFailedRecord(new PipelineError("UnreadableFile", file, `Cannot read file: ${message}`));
  }

  const doc = await normalizeEmail(raw, file);
  if (!doc.success) return toFailedRecord(doc.error);

  const prompt = buildPrompt(doc.data, { maxBodyChars: options.maxBodyChars });

  const started = performance.now();
  const reply = await invokeWithRetry(prompt, file, options);
  const inferenceSeconds = (performance.now() - started) / 1000;
  if (!reply.success) return toFailedRecord(reply.error);

  const result = parseClassification(reply.data, file);
  if (!result.success) return toFailedRecord(result.error);

  return toClassifiedRecord(doc.data, result.data, inferenceSeconds);
}

/**
 * Run one file through read, normalize, prompt, backend and parse. Always
 * resolves: every failure becomes a FailedRecord for this file.
 */
export async function classifyFile(file: string, options: BatchOptions): Promise<BatchRecord> {
  let record: BatchRecord;
  try {
    record = await runPipeline(file, options);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ file, error: err }, "Unexpected error while classifying email");
    record = toFailedRecord(new PipelineError("InternalError", file, message));
  }

  if (isFailedRecord(record)) {
    logger.warn({ file, kind: record.error.type, error: record.error.message }, "Email classification failed");
  } else {
    logger.info(
      {
        file,
        classification: record.classification,
        certainty: record.certainty_level,
        inferenceTime: record.inference_time,
      },
      "Email classified"
    );
  }
  return record;
}

/**
 * Classify files with a bounded worker pool. The output has one record per
 * input, in input order, whatever order the files finish in. Once `signal`
 * aborts, files that have not started are recorded as Cancelled.
 */
export async function runBatch(
  files: readonly string[],
  options: BatchOptions
): Promise<BatchRecord[]> {
  const results = new Array<BatchRecord>(files.length);
  const workerCount = Math.max(1, Math.min(options.concurrency ?? 2, files.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < files.length) {
      const index = next++;
      const file = files[index];
      if (options.signal?.aborted) {
        results[index] = toFailedRecord(
          new PipelineError("Cancelled", file, "Batch was cancelled before this file started")
        );
        continue;
      }
      results[index] = await classifyFile(file, options);
    }
  };

  logger.info(
    { files: files.length, workers: workerCount, model: options.backend.model },
    "Starting classification batch"
  );
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const failed = results.filter(isFailedRecord).length;
  logger.info({ succeeded: results.length - failed, failed }, "Classification batch finished");
  return results;
}

/**
 * 0 when at least one file was classified, 1 when every file failed.
 */
export function batchExitCode(records: readonly BatchRecord[]): number {
  return records.some((r) => !isFailedRecord(r)) ? 0 : 1;
}
