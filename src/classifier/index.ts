import { z } from "zod";
import { logger } from "../config/logger.js";
import { BLOCK_END, BLOCK_START, KEYWORD_DELIMITER } from "../prompt/index.js";
import {
  CATEGORIES,
  fail,
  ok,
  type Category,
  type ClassificationResult,
  type StageResult,
} from "../types/index.js";

type FieldName = "category" | "certainty" | "keywords" | "reason";

interface RawFields {
  category?: string;
  certainty?: string | number;
  keywords?: string | string[];
  reason?: string;
}

const FIELD_ALIASES: Record<string, FieldName> = {
  category: "category",
  classification: "category",
  certainty: "certainty",
  "certainty level": "certainty",
  keywords: "keywords",
  tags: "keywords",
  reason: "reason",
};

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const BLOCK_PATTERN = new RegExp(
  `${escapeRegExp(BLOCK_START)}([\\s\\S]*?)(?:${escapeRegExp(BLOCK_END)}|$)`,
  "gi"
);

// Tolerates markdown bullets and bold keys such as "- **Category:** Safe".
const FIELD_LINE = /^[\s>*_#-]*([A-Za-z][A-Za-z ]*?)[\s*_]*:[\s*_]*(.*)$/;

/**
 * Bodies of every structured block, last first. A model may echo the template
 * before or after its answer, so callers take the first one that validates.
 */
function extractBlocks(raw: string): string[] {
  return [...raw.matchAll(BLOCK_PATTERN)].map((m) => m[1]).reverse();
}

function readBlockFields(block: string): RawFields {
  const fields: RawFields = {};
  let current: FieldName | undefined;

  for (const line of block.split(/\r?\n/)) {
    if (/^\s*`{3,}/.test(line)) continue;

    const match = FIELD_LINE.exec(line);
    const field = match ? FIELD_ALIASES[match[1].trim().toLowerCase()] : undefined;
    if (match && field) {
      current = field;
      if (field === "keywords") {
        fields.keywords = match[2];
      } else {
        fields[field] = match[2];
      }
      continue;
    }

    // Only the reason may run over several lines.
    if (current === "reason" && line.trim()) {
      fields.reason = `${fields.reason ?? ""} ${line.trim()}`;
    }
  }
  return fields;
}

const jsonVerdictSchema = z.record(z.unknown());
const jsonValueSchemas = {
  category: z.string(),
  certainty: z.union([z.number(), z.string()]),
  keywords: z.union([z.array(z.string()), z.string()]),
  reason: z.string(),
};

function stripCodeFences(text: string): string {
  return text.replace(/```[a-z]*\s*/gi, "").replace(/```/g, "");
}

/**
 * Fallback for models that ignore the block format and answer in JSON, with
 * either the block's key names or "Classification"/"Certainty Level"/"Tags".
 */
function readJsonFields(raw: string): RawFields | undefined {
  const text = stripCodeFences(raw);
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start < 0 || end <= start) return undefined;

  let json: unknown;
  try {
    json = JSON.parse(text.slice(start, end + 1));
  } catch {
    return undefined;
  }

  const record = jsonVerdictSchema.safeParse(json);
  if (!record.success) return undefined;

  const fields: RawFields = {};
  for (const [key, value] of Object.entries(record.data)) {
    const field = FIELD_ALIASES[key.trim().toLowerCase()];
    if (!field) continue;
    if (field === "keywords") {
      const parsed = jsonValueSchemas.keywords.safeParse(value);
      if (parsed.success) fields.keywords = parsed.data;
    } else if (field === "certainty") {
      const parsed = jsonValueSchemas.certainty.safeParse(value);
      if (parsed.success) fields.certainty = parsed.data;
    } else {
      const parsed = jsonValueSchemas[field].safeParse(value);
      if (parsed.success) fields[field] = parsed.data;
    }
  }
  return fields;
}

function unwrap(value: string): string {
  return value.trim().replace(/^["'`*_[(]+|["'`*_\]).]+$/g, "").trim();
}

function normalizeCategory(value: string): Category | undefined {
  const label = unwrap(value).toLowerCase();
  return CATEGORIES.find((c) => c.toLowerCase() === label);
}

function normalizeCertainty(value: string | number): number | undefined {
  let number: number;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return undefined;
    number = value;
  } else {
    const text = value.trim().replace(/^[*_]+|[*_]+$/g, "").trim();
    if (!/^[-+]?\d+(\.\d+)?\s*%?$/.test(text)) return undefined;
    number = Number.parseFloat(text);
  }
  return Math.min(100, Math.max(0, Math.round(number)));
}

function unwrapReason(value: string): string {
  return value.trim().replace(/^[*_]+|[*_]+$/g, "").trim();
}

function normalizeKeywords(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  const items = Array.isArray(value)
    ? value
    : value.trim().replace(/^\[|\]$/g, "").split(KEYWORD_DELIMITER);
  const cleaned = items
    .map((k) => k.trim().replace(/^["'`]+|["'`]+$/g, "").trim())
    .filter((k) => k.length > 0);
  return [...new Set(cleaned)];
}

function validateFields(fields: RawFields, sourceFile: string): StageResult<ClassificationResult> {
  if (fields.category === undefined || !fields.category.trim()) {
    return fail("MalformedResponse", sourceFile, "Response is missing the category");
  }
  const category = normalizeCategory(fields.category);
  if (!category) {
    return fail(
      "MalformedResponse",
      sourceFile,
      `Unrecognized category "${fields.category.trim()}"; expected one of ${CATEGORIES.join(", ")}`
    );
  }

  if (fields.certainty === undefined || !String(fields.certainty).trim()) {
    return fail("MalformedResponse", sourceFile, "Response is missing the certainty");
  }
  const certainty = normalizeCertainty(fields.certainty);
  if (certainty === undefined) {
    return fail(
      "MalformedResponse",
      sourceFile,
      `Certainty "${String(fields.certainty).trim()}" is not a number`
    );
  }

  const reason = fields.reason === undefined ? "" : unwrapReason(fields.reason);
  if (!reason) {
    return fail("MalformedResponse", sourceFile, "Response is missing the reason");
  }

  return ok({
    category,
    certainty,
    keywords: normalizeKeywords(fields.keywords),
    reason,
    sourceFile,
  });
}

/**
 * Parse raw model output into a ClassificationResult. Surrounding prose is
 * ignored; only a missing or invalid required field fails the parse. When
 * no block validates, the error reported is that of the last block.
 */
export function parseClassification(
  raw: string,
  sourceFile: string
): StageResult<ClassificationResult> {
  const blocks = extractBlocks(raw);
  if (blocks.length > 0) {
    const results = blocks.map((block) => validateFields(readBlockFields(block), sourceFile));
    return results.find((result) => result.success) ?? results[0];
  }

  const fields = readJsonFields(raw);
  if (!fields) {
    logger.debug({ file: sourceFile, length: raw.length }, "No classification block in response");
    return fail("MalformedResponse", sourceFile, "Response did not contain a classification block");
  }
  return validateFields(fields, sourceFile);
}
