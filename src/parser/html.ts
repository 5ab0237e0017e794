const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

function fromCodePoint(match: string, code: number): string {
  return Number.isInteger(code) && code > 0 && code <= 0x10ffff
    ? String.fromCodePoint(code)
    : match;
}

function decodeReference(match: string, ref: string): string {
  if (ref[0] !== "#") return NAMED_ENTITIES[ref.toLowerCase()] ?? match;
  const hex = ref[1] === "x" || ref[1] === "X";
  return fromCodePoint(match, hex ? parseInt(ref.slice(2), 16) : Number(ref.slice(1)));
}

/**
 * Strip HTML tags from a string to extract plain text. Block-level closing
 * tags and <br> become line breaks; everything else collapses to spaces.
 */
export function stripHtml(html: string): string {
  return html
    .replace(/<(style|script|head)[^>]*>.*?<\/\1\s*>/gis, "")
    .replace(/<!--.*?-->/gs, "")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(p|div|li|tr|h[1-6]|table|ul|ol|blockquote)\s*>/gi, "\n")
    .replace(/<[^>]+>/g, " ")
    .replace(/&(#\d+|#x[0-9a-f]+|[a-z]+);/gi, decodeReference)
    .replace(/\r\n?/g, "\n")
    .replace(/[^\S\n]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
