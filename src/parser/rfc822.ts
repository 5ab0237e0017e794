import { simpleParser } from "mailparser";
import { addressList } from "./address.js";
import { stripHtml } from "./html.js";
import type { AttachmentMeta, EmailDocument } from "../types/index.js";

/**
 * Parse a plain-text RFC 822 message. The text part wins over the HTML part;
 * attachment contents are dropped after measuring them.
 */
export async function parseRfc822(raw: Buffer): Promise<EmailDocument> {
  const parsed = await simpleParser(raw);

  const attachments: AttachmentMeta[] = parsed.attachments.map((att) => ({
    filename: att.filename ?? "",
    contentType: att.contentType,
    size: att.size,
  }));

  const text = parsed.text?.trim() ?? "";
  const bodyText = text || (parsed.html ? stripHtml(parsed.html) : "");

  return {
    subject: parsed.subject?.trim() ?? "",
    fromAddress: addressList(parsed.from).join(", "),
    toAddresses: addressList(parsed.to),
    bodyText,
    attachments,
  };
}
