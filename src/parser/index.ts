import { logger } from "../config/logger.js";
import { fail, ok, type EmailDocument, type StageResult } from "../types/index.js";
import { NotAnOutlookMessageError, parseOutlookMsg } from "./msg.js";
import { parseRfc822 } from "./rfc822.js";
import { sniffFormat } from "./sniff.js";

export { stripHtml } from "./html.js";
export { sniffFormat, type SniffResult } from "./sniff.js";

type ContainerReader = (raw: Buffer) => Promise<EmailDocument>;

const READERS: Record<"rfc822" | "compound", ContainerReader> = {
  rfc822: parseRfc822,
  compound: parseOutlookMsg,
};

/**
 * Turn the bytes of one email file into an EmailDocument. The container is
 * chosen by sniffing the content; `filename` is only used for error records.
 */
export async function normalizeEmail(
  raw: Buffer,
  filename: string
): Promise<StageResult<EmailDocument>> {
  if (raw.length === 0) {
    return fail("UnreadableFile", filename, "File is empty");
  }

  const sniffed = sniffFormat(raw);
  if (sniffed.format === "unsupported") {
    logger.debug({ file: filename, detected: sniffed.description }, "Unsupported container");
    return fail(
      "UnsupportedFormat",
      filename,
      `Unsupported file type (${sniffed.description}); only RFC 822 messages and Outlook .msg files are supported`
    );
  }

  try {
    const doc = await READERS[sniffed.format](raw);
    logger.debug(
      { file: filename, format: sniffed.format, attachments: doc.attachments.length },
      "Email normalized"
    );
    return ok(doc);
  } catch (err) {
    if (err instanceof NotAnOutlookMessageError) {
      return fail("UnsupportedFormat", filename, `Unsupported file type: ${err.message}`);
    }
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ file: filename, format: sniffed.format, error: message }, "Failed to parse email");
    return fail("UnreadableFile", filename, `Could not parse ${sniffed.format} container: ${message}`);
  }
}
