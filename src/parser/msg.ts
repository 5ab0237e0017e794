import CFB from "cfb";
import type { CFB$Container } from "cfb";
import { simpleParser } from "mailparser";
import { addressList, formatAddress } from "./address.js";
import { stripHtml } from "./html.js";
import type { AttachmentMeta, EmailDocument } from "../types/index.js";

// MAPI property tags (upper four hex digits of the property id).
const TAG = {
  subject: "0037",
  transportHeaders: "007D",
  senderName: "0C1A",
  senderEmail: "0C1F",
  senderSmtp: "5D01",
  body: "1000",
  htmlBody: "1013",
  displayName: "3001",
  emailAddress: "3003",
  smtpAddress: "39FE",
  attachData: "3701",
  attachFilename: "3704",
  attachLongFilename: "3707",
  attachMimeTag: "370E",
} as const;

const RECIPIENT_STORAGE = /^__RECIP_VERSION1\.0_#[0-9A-F]{8}\/$/;
const ATTACHMENT_STORAGE = /^__ATTACH_VERSION1\.0_#[0-9A-F]{8}\/$/;

export class NotAnOutlookMessageError extends Error {
  constructor() {
    super("compound document does not contain an Outlook message");
    this.name = "NotAnOutlookMessageError";
  }
}

/**
 * Streams of a compound file keyed by their upper-cased path below the root
 * storage, e.g. "__SUBSTG1.0_0037001F" or
 * "__RECIP_VERSION1.0_#00000000/__SUBSTG1.0_3001001F". Storages keep their
 * trailing slash and map to an empty buffer.
 */
type StreamMap = Map<string, Buffer>;

function indexStreams(container: CFB$Container): StreamMap {
  const streams: StreamMap = new Map();
  container.FullPaths.forEach((fullPath, i) => {
    const slash = fullPath.indexOf("/");
    const path = fullPath.slice(slash + 1).toUpperCase();
    if (!path) return;
    const entry = container.FileIndex[i];
    streams.set(path, entry.content ? Buffer.from(entry.content) : Buffer.alloc(0));
  });
  return streams;
}

function readString(streams: StreamMap, prefix: string, tag: string): string {
  const unicode = streams.get(`${prefix}__SUBSTG1.0_${tag}001F`);
  if (unicode) {
    return unicode.toString("utf16le").replace(/\0+$/, "").trim();
  }
  const ansi = streams.get(`${prefix}__SUBSTG1.0_${tag}001E`);
  if (ansi) {
    return ansi.toString("latin1").replace(/\0+$/, "").trim();
  }
  return "";
}

function readHtml(streams: StreamMap): string {
  const binary = streams.get(`__SUBSTG1.0_${TAG.htmlBody}0102`);
  if (binary) return binary.toString("utf8").replace(/\0+$/, "");
  return readString(streams, "", TAG.htmlBody);
}

function childStorages(streams: StreamMap, pattern: RegExp): string[] {
  return [...streams.keys()].filter((path) => pattern.test(path)).sort();
}

function readRecipients(streams: StreamMap): string[] {
  return childStorages(streams, RECIPIENT_STORAGE)
    .map((prefix) => {
      const address =
        readString(streams, prefix, TAG.smtpAddress) ||
        readString(streams, prefix, TAG.emailAddress);
      return formatAddress(readString(streams, prefix, TAG.displayName), address);
    })
    .filter(Boolean);
}

function readAttachments(streams: StreamMap): AttachmentMeta[] {
  return childStorages(streams, ATTACHMENT_STORAGE).map((prefix) => ({
    filename:
      readString(streams, prefix, TAG.attachLongFilename) ||
      readString(streams, prefix, TAG.attachFilename),
    contentType:
      readString(streams, prefix, TAG.attachMimeTag) || "application/octet-stream",
    size: streams.get(`${prefix}__SUBSTG1.0_${TAG.attachData}0102`)?.length ?? 0,
  }));
}

/**
 * Parse an Outlook .msg compound document. Throws NotAnOutlookMessageError
 * when the container is valid but holds something else (a Word file, say);
 * any other throw means the container itself is damaged.
 */
export async function parseOutlookMsg(raw: Buffer): Promise<EmailDocument> {
  const container = CFB.read(raw, { type: "buffer" });
  const streams = indexStreams(container);

  const isMessage = [...streams.keys()].some((path) => path.startsWith("__SUBSTG1.0_"));
  if (!isMessage) {
    throw new NotAnOutlookMessageError();
  }

  let subject = readString(streams, "", TAG.subject);
  let fromAddress = formatAddress(
    readString(streams, "", TAG.senderName),
    readString(streams, "", TAG.senderSmtp) || readString(streams, "", TAG.senderEmail)
  );
  let toAddresses = readRecipients(streams);

  // Messages saved from a received mail keep the original transport headers.
  const headers = readString(streams, "", TAG.transportHeaders);
  if (headers && (!subject || !fromAddress || toAddresses.length === 0)) {
    const parsed = await simpleParser(`${headers.trimEnd()}\r\n\r\n`);
    subject ||= parsed.subject?.trim() ?? "";
    fromAddress ||= addressList(parsed.from).join(", ");
    if (toAddresses.length === 0) toAddresses = addressList(parsed.to);
  }

  const plain = readString(streams, "", TAG.body);
  const html = plain ? "" : readHtml(streams);

  return {
    subject,
    fromAddress,
    toAddresses,
    bodyText: plain || stripHtml(html),
    attachments: readAttachments(streams),
  };
}
