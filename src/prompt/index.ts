import { CATEGORIES, type EmailDocument } from "../types/index.js";

export const BLOCK_START = "<<<CLASSIFICATION>>>";
export const BLOCK_END = "<<<END>>>";
export const KEYWORD_DELIMITER = ",";

export const DEFAULT_MAX_BODY_CHARS = 4000;

export interface PromptOptions {
  maxBodyChars?: number;
}

const INSTRUCTIONS = [
  "You are an expert in email security.",
  "Analyze the email above, including the attachment metadata.",
  "Factors to consider include suspicious senders, URLs, file names, file types " +
    "(e.g. '.exe', '.js', '.gz'), double extensions (e.g. '.pdf.js'), rare MIME types, " +
    "and other techniques employed by threat actors.",
  "",
  "Respond with exactly one block in this format and nothing inside it but these four lines:",
  BLOCK_START,
  `Category: <one of ${CATEGORIES.join(", ")}>`,
  "Certainty: <integer from 0 to 100, no percent sign>",
  `Keywords: <a few keywords reflecting the content, separated by "${KEYWORD_DELIMITER}">`,
  "Reason: <one sentence explaining the classification>",
  BLOCK_END,
].join("\n");

/**
 * Keep the first `max` UTF-16 code units without splitting a surrogate pair.
 */
export function truncateBody(body: string, max: number): { text: string; truncated: boolean } {
  if (body.length <= max) {
    return { text: body, truncated: false };
  }
  let end = max;
  const last = body.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) end--;
  return { text: body.slice(0, end), truncated: true };
}

function describeAttachments(doc: EmailDocument): string {
  if (doc.attachments.length === 0) return "No attachments";
  return doc.attachments
    .map((a) => `- ${a.filename || "(unnamed)"} (${a.contentType}, ${a.size} bytes)`)
    .join("\n");
}

export function buildPrompt(doc: EmailDocument, options: PromptOptions = {}): string {
  const maxBodyChars = options.maxBodyChars ?? DEFAULT_MAX_BODY_CHARS;
  const body = truncateBody(doc.bodyText, maxBodyChars);

  const sections = [
    `Subject: ${doc.subject}`,
    `From: ${doc.fromAddress}`,
    `To: ${doc.toAddresses.length > 0 ? doc.toAddresses.join(", ") : "(none)"}`,
    `Attachments:\n${describeAttachments(doc)}`,
    "--- BEGIN EMAIL BODY ---",
    body.text,
    "--- END EMAIL BODY ---",
  ];
  if (body.truncated) {
    sections.push(`[Body truncated to ${body.text.length} characters]`);
  }

  return `${sections.join("\n")}\n\n${INSTRUCTIONS}\n`;
}
