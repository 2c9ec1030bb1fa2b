const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8");

function isLineBreakOrControl(code: number): boolean {
  return code <= 0x1f || code === 0x7f || code === 0x85 || code === 0x2028 || code === 0x2029;
}

/** Collapses whitespace and control characters into single spaces. */
export function sanitizeOneLine(input: string): string {
  const parts: string[] = [];
  let word = "";
  for (const ch of input) {
    const code = ch.codePointAt(0) ?? 0;
    if (isLineBreakOrControl(code) || /\s/u.test(ch)) {
      if (word) parts.push(word);
      word = "";
      continue;
    }
    word += ch;
  }
  if (word) parts.push(word);
  return parts.join(" ");
}

/** Cuts `input` to at most `maxBytes` of UTF-8 without splitting a code point. */
export function truncateUtf8(input: string, maxBytes: number): string {
  if (!Number.isInteger(maxBytes) || maxBytes <= 0) return "";
  const bytes = encoder.encode(input);
  if (bytes.byteLength <= maxBytes) return input;

  let cut = maxBytes;
  while (cut > 0 && ((bytes[cut] ?? 0) & 0xc0) === 0x80) cut -= 1;
  return decoder.decode(bytes.subarray(0, cut));
}

export function formatOneLineUtf8(input: string, maxBytes: number): string {
  return truncateUtf8(sanitizeOneLine(input), maxBytes);
}
