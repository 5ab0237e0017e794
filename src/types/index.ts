export interface AttachmentMeta {
  filename: string;
  contentType: string;
  size: number;
}

/**
 * Format-agnostic view of one email file. Every scalar is always present;
 * missing header values become "".
 */
export interface EmailDocument {
  readonly subject: string;
  readonly fromAddress: string;
  readonly toAddresses: readonly string[];
  readonly bodyText: string;
  readonly attachments: readonly AttachmentMeta[];
}

export const CATEGORIES = ["Safe", "Spam", "Phishing", "Malicious"] as const;

export type Category = (typeof CATEGORIES)[number];

export interface ClassificationResult {
  readonly category: Category;
  /** Integer percentage, clamped to 0-100. */
  readonly certainty: number;
  readonly keywords: readonly string[];
  readonly reason: string;
  readonly sourceFile: string;
}

export type PipelineErrorKind =
  | "UnreadableFile"
  | "UnsupportedFormat"
  | "BackendUnavailable"
  | "BackendTimeout"
  | "MalformedResponse"
  | "Cancelled"
  | "InternalError";

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly sourceFile: string;

  constructor(kind: PipelineErrorKind, sourceFile: string, message: string) {
    super(message);
    this.name = "PipelineError";
    this.kind = kind;
    this.sourceFile = sourceFile;
  }
}

export type StageResult<T> =
  | { success: true; data: T }
  | { success: false; error: PipelineError };

export function ok<T>(data: T): StageResult<T> {
  return { success: true, data };
}

export function fail<T>(
  kind: PipelineErrorKind,
  sourceFile: string,
  message: string
): StageResult<T> {
  return { success: false, error: new PipelineError(kind, sourceFile, message) };
}

export interface BackendConfig {
  readonly model: string;
  readonly host: string;
  readonly timeoutMs: number;
}

export interface ClassifiedRecord {
  file: string;
  email_metadata: {
    subject: string;
    from: string;
    to: string[];
  };
  classification: Category;
  certainty_level: number;
  content_keywords: string[];
  reason: string;
  /** Seconds spent waiting on the backend, retries included. */
  inference_time: number;
}

export interface FailedRecord {
  file: string;
  error: {
    type: PipelineErrorKind;
    message: string;
  };
}

export type BatchRecord = ClassifiedRecord | FailedRecord;

export function isFailedRecord(record: BatchRecord): record is FailedRecord {
  return "error" in record;
}
