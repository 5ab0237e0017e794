export type SniffResult =
  | { format: "rfc822" }
  | { format: "compound" }
  | { format: "unsupported"; description: string };

const OLE2_MAGIC = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);

const KNOWN_CONTAINERS: { magic: Buffer; description: string }[] = [
  { magic: Buffer.from("PK\x03\x04", "latin1"), description: "ZIP archive" },
  { magic: Buffer.from("%PDF-", "latin1"), description: "PDF document" },
  { magic: Buffer.from([0x1f, 0x8b]), description: "gzip stream" },
  { magic: Buffer.from([0x89, 0x50, 0x4e, 0x47]), description: "PNG image" },
  { magic: Buffer.from([0xff, 0xd8, 0xff]), description: "JPEG image" },
  { magic: Buffer.from("From ", "latin1"), description: "mbox mailbox" },
];

// Header names that only show up in a message header block.
const MESSAGE_HEADERS = new Set([
  "from",
  "to",
  "subject",
  "date",
  "received",
  "message-id",
  "mime-version",
  "return-path",
]);

const HEADER_LINE = /^([\x21-\x39\x3b-\x7e]+)[ \t]*:/;
const SNIFF_WINDOW = 64 * 1024;

function looksLikeRfc822(raw: Buffer): boolean {
  const head = raw.subarray(0, SNIFF_WINDOW);
  if (head.includes(0)) return false;

  const lines = head
    .toString("latin1")
    .replace(/^\xEF\xBB\xBF/, "")
    .split(/\r?\n/);

  let start = 0;
  while (start < lines.length && lines[start].trim() === "") start++;
  if (start === lines.length || !HEADER_LINE.test(lines[start])) return false;

  for (let i = start; i < lines.length && lines[i] !== ""; i++) {
    const match = HEADER_LINE.exec(lines[i]);
    if (match && MESSAGE_HEADERS.has(match[1].toLowerCase())) return true;
  }
  return false;
}

/**
 * Identify the container format from the leading bytes. File extensions are
 * never consulted.
 */
export function sniffFormat(raw: Buffer): SniffResult {
  if (raw.subarray(0, OLE2_MAGIC.length).equals(OLE2_MAGIC)) {
    return { format: "compound" };
  }

  for (const known of KNOWN_CONTAINERS) {
    if (raw.subarray(0, known.magic.length).equals(known.magic)) {
      return { format: "unsupported", description: known.description };
    }
  }

  if (looksLikeRfc822(raw)) {
    return { format: "rfc822" };
  }

  return { format: "unsupported", description: "unrecognized content" };
}
