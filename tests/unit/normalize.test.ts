import { describe, it, expect } from "vitest";
import { normalizeEmail } from "../../src/parser/index.js";
import type { EmailDocument, StageResult } from "../../src/types/index.js";
import {
  INVOICE_EML,
  buildCorruptCompound,
  buildMsg,
  buildWordLikeCompound,
  composeEml,
} from "../helpers/fixtures.js";

function expectDocument(result: StageResult<EmailDocument>): EmailDocument {
  if (!result.success) {
    throw new Error(`expected a document, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.data;
}

describe("normalizeEmail: RFC 822", () => {
  it("extracts subject, sender, recipients and text body", async () => {
    const doc = expectDocument(await normalizeEmail(Buffer.from(INVOICE_EML), "invoice.eml"));
    expect(doc).toEqual({
      subject: "Invoice for last month",
      fromAddress: "Billing Team <billing@example.com>",
      toAddresses: ["Alice <alice@example.org>", "bob@example.org"],
      bodyText: "Please find the invoice attached.",
      attachments: [],
    });
  });

  it("sniffs content instead of trusting the extension", async () => {
    const doc = expectDocument(await normalizeEmail(Buffer.from(INVOICE_EML), "renamed.msg"));
    expect(doc.subject).toBe("Invoice for last month");
  });

  it("falls back to the HTML part when there is no text part", async () => {
    const raw = [
      "From: security@example.net",
      "To: user@example.org",
      "Subject: Action required",
      "MIME-Version: 1.0",
      "Content-Type: text/html; charset=utf-8",
      "",
      "<html><body><p>Verify your account now</p></body></html>",
      "",
    ].join("\r\n");

    const doc = expectDocument(await normalizeEmail(Buffer.from(raw), "html.eml"));
    expect(doc.bodyText).toBe("Verify your account now");
    expect(doc.fromAddress).toBe("security@example.net");
  });

  it("keeps attachment metadata without the contents", async () => {
    const raw = await composeEml({
      from: "Sender <sender@example.com>",
      to: ["a@example.org", "b@example.org"],
      subject: "Quarterly report",
      text: "See attached.",
      attachments: [
        {
          filename: "report.pdf.js",
          content: Buffer.from("alert(1)"),
          contentType: "application/javascript",
        },
      ],
    });

    const doc = expectDocument(await normalizeEmail(raw, "report.eml"));
    expect(doc.toAddresses).toEqual(["a@example.org", "b@example.org"]);
    expect(doc.bodyText).toBe("See attached.");
    expect(doc.attachments).toEqual([
      { filename: "report.pdf.js", contentType: "application/javascript", size: 8 },
    ]);
  });

  it("uses empty values for missing headers", async () => {
    const raw = "Date: Mon, 06 Jan 2025 10:00:00 +0000\r\n\r\nno headers to speak of\r\n";
    const doc = expectDocument(await normalizeEmail(Buffer.from(raw), "bare.eml"));
    expect(doc.subject).toBe("");
    expect(doc.fromAddress).toBe("");
    expect(doc.toAddresses).toEqual([]);
    expect(doc.bodyText).toBe("no headers to speak of");
  });
});

describe("normalizeEmail: Outlook MSG", () => {
  it("reads MAPI properties, recipients and attachments", async () => {
    const raw = buildMsg({
      subject: "Invoice for last month",
      senderName: "Billing Team",
      senderEmail: "billing@example.com",
      body: "Please find the invoice attached.\r\n",
      recipients: [
        { name: "Alice", email: "alice@example.org" },
        { name: "bob@example.org", email: "bob@example.org" },
      ],
      attachments: [
        { filename: "invoice.pdf", mimeType: "application/pdf", data: Buffer.alloc(1234, 1) },
        { filename: "notes.bin", data: Buffer.from("xyz") },
      ],
    });

    const doc = expectDocument(await normalizeEmail(raw, "invoice.msg"));
    expect(doc).toEqual({
      subject: "Invoice for last month",
      fromAddress: "Billing Team <billing@example.com>",
      toAddresses: ["Alice <alice@example.org>", "bob@example.org"],
      bodyText: "Please find the invoice attached.",
      attachments: [
        { filename: "invoice.pdf", contentType: "application/pdf", size: 1234 },
        { filename: "notes.bin", contentType: "application/octet-stream", size: 3 },
      ],
    });
  });

  it("strips the HTML body when there is no plain body", async () => {
    const raw = buildMsg({
      subject: "Password expiry",
      senderEmail: "it-support@example.net",
      html: "<html><body><p>Your password expires today.</p><p>Click <a href=\"http://example.net/reset\">here</a></p></body></html>",
    });

    const doc = expectDocument(await normalizeEmail(raw, "expiry.msg"));
    expect(doc.bodyText).toBe("Your password expires today.\nClick here");
    expect(doc.fromAddress).toBe("it-support@example.net");
  });

  it("fills missing fields from the transport headers", async () => {
    const raw = buildMsg({
      body: "hello",
      transportHeaders: [
        "Received: from mx.example.com",
        "From: Carol <carol@example.com>",
        "To: dave@example.org",
        "Subject: Lunch on Friday",
      ].join("\r\n"),
    });

    const doc = expectDocument(await normalizeEmail(raw, "lunch.msg"));
    expect(doc.subject).toBe("Lunch on Friday");
    expect(doc.fromAddress).toBe("Carol <carol@example.com>");
    expect(doc.toAddresses).toEqual(["dave@example.org"]);
  });

  it("produces empty fields for a message with no properties set", async () => {
    const doc = expectDocument(await normalizeEmail(buildMsg({ body: "" }), "empty.msg"));
    expect(doc).toEqual({
      subject: "",
      fromAddress: "",
      toAddresses: [],
      bodyText: "",
      attachments: [],
    });
  });
});

describe("normalizeEmail: failures", () => {
  it("rejects an empty file as unreadable", async () => {
    const result = await normalizeEmail(Buffer.alloc(0), "empty.eml");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("UnreadableFile");
      expect(result.error.sourceFile).toBe("empty.eml");
    }
  });

  it("reports a damaged compound file as unreadable", async () => {
    const result = await normalizeEmail(buildCorruptCompound(), "broken.msg");
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.kind).toBe("UnreadableFile");
  });

  it("reports a truncated compound file as unreadable", async () => {
    const truncated = buildMsg({ subject: "cut short" }).subarray(0, 100);
    const result = await normalizeEmail(truncated, "truncated.msg");
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.kind).toBe("UnreadableFile");
  });

  it("reports a compound file without a message as unsupported", async () => {
    const result = await normalizeEmail(buildWordLikeCompound(), "letter.msg");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("UnsupportedFormat");
      expect(result.error.message).toBe(
        "Unsupported file type: compound document does not contain an Outlook message"
      );
    }
  });

  it("reports other containers as unsupported", async () => {
    const result = await normalizeEmail(Buffer.from("%PDF-1.4\n%…"), "invoice.eml");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("UnsupportedFormat");
      expect(result.error.message).toBe(
        "Unsupported file type (PDF document); only RFC 822 messages and Outlook .msg files are supported"
      );
    }
  });
});
