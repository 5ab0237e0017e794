import CFB from "cfb";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import MailComposer from "nodemailer/lib/mail-composer/index.js";
import type Mail from "nodemailer/lib/mailer/index.js";

export const INVOICE_EML = [
  "From: Billing Team <billing@example.com>",
  "To: Alice <alice@example.org>, bob@example.org",
  "Subject: Invoice for last month",
  "Date: Mon, 06 Jan 2025 10:00:00 +0000",
  "MIME-Version: 1.0",
  "Content-Type: text/plain; charset=utf-8",
  "",
  "Please find the invoice attached.",
  "",
].join("\r\n");

export function composeEml(options: Mail.Options): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    new MailComposer(options).compile().build((err, message) => {
      if (err) reject(err);
      else resolve(message);
    });
  });
}

export interface MsgFixture {
  subject?: string;
  senderName?: string;
  senderEmail?: string;
  body?: string;
  html?: string;
  transportHeaders?: string;
  recipients?: { name: string; email: string }[];
  attachments?: { filename: string; mimeType?: string; data: Buffer }[];
}

function utf16(text: string): Buffer {
  return Buffer.from(text, "utf16le");
}

function storageName(kind: "recip" | "attach", index: number): string {
  return `/__${kind}_version1.0_#${index.toString(16).toUpperCase().padStart(8, "0")}`;
}

/**
 * Write an Outlook-style compound file holding the given MAPI properties.
 */
export function buildMsg(msg: MsgFixture): Buffer {
  const container = CFB.utils.cfb_new();
  const add = (path: string, content: Buffer) => {
    CFB.utils.cfb_add(container, path, content);
  };

  add("/__properties_version1.0", Buffer.alloc(32));
  if (msg.subject !== undefined) add("/__substg1.0_0037001F", utf16(msg.subject));
  if (msg.senderName !== undefined) add("/__substg1.0_0C1A001F", utf16(msg.senderName));
  if (msg.senderEmail !== undefined) add("/__substg1.0_5D01001F", utf16(msg.senderEmail));
  if (msg.body !== undefined) add("/__substg1.0_1000001F", utf16(msg.body));
  if (msg.html !== undefined) add("/__substg1.0_10130102", Buffer.from(msg.html, "utf8"));
  if (msg.transportHeaders !== undefined) {
    add("/__substg1.0_007D001F", utf16(msg.transportHeaders));
  }

  (msg.recipients ?? []).forEach((r, i) => {
    const dir = storageName("recip", i);
    add(`${dir}/__properties_version1.0`, Buffer.alloc(8));
    add(`${dir}/__substg1.0_3001001F`, utf16(r.name));
    add(`${dir}/__substg1.0_39FE001F`, utf16(r.email));
  });

  (msg.attachments ?? []).forEach((a, i) => {
    const dir = storageName("attach", i);
    add(`${dir}/__properties_version1.0`, Buffer.alloc(8));
    add(`${dir}/__substg1.0_3707001F`, utf16(a.filename));
    if (a.mimeType) add(`${dir}/__substg1.0_370E001F`, utf16(a.mimeType));
    add(`${dir}/__substg1.0_37010102`, a.data);
  });

  return Buffer.from(CFB.write(container, { type: "buffer" }));
}

/** A compound file that is not a message, like a legacy Word document. */
export function buildWordLikeCompound(): Buffer {
  const container = CFB.utils.cfb_new();
  CFB.utils.cfb_add(container, "/WordDocument", Buffer.from("not a message"));
  return Buffer.from(CFB.write(container, { type: "buffer" }));
}

/** OLE2 magic followed by a header no reader accepts. */
export function buildCorruptCompound(): Buffer {
  return Buffer.concat([
    Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]),
    Buffer.alloc(1016, 0xff),
  ]);
}

export interface FixtureDir {
  path: string;
  write: (name: string, data: Buffer | string) => Promise<string>;
  cleanup: () => Promise<void>;
}

export async function createFixtureDir(): Promise<FixtureDir> {
  const path = await mkdtemp(join(tmpdir(), "mail-risk-classifier-"));
  return {
    path,
    write: async (name, data) => {
      const file = join(path, name);
      await writeFile(file, data);
      return file;
    },
    cleanup: () => rm(path, { recursive: true, force: true }),
  };
}
