export type AlertPayload = Record<string, unknown>;

const ENTITIES: Record<string, string> = {
  '&quot;': '"',
  '&#34;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&amp;': '&',
  '&nbsp;': ' ',
};

/** Straightens quotes mail clients "smarten" and decodes quote entities. */
export function normalizeQuotes(text: string): string {
  return text
    .replace(/[“”„‟″]/g, '"')
    .replace(/[‘’‚‛′]/g, "'")
    .replace(/&(quot|#34|#39|apos|amp|nbsp);/g, (m) => ENTITIES[m] ?? m);
}

/** Semicolons used as field separators, and trailing commas. */
export function repairSeparators(text: string): string {
  return text.replace(/;\s*(?=["'])/g, ', ').replace(/,\s*}/g, '}');
}

/** Python dict literal (single quotes, True/False/None) to JSON. */
export function pythonLiteralToJson(text: string): string {
  return text
    .replace(/'((?:[^'\\]|\\.)*)'/g, (_, inner: string) => JSON.stringify(inner.replace(/\\'/g, "'")))
    .replace(/\bTrue\b/g, 'true')
    .replace(/\bFalse\b/g, 'false')
    .replace(/\bNone\b/g, 'null');
}

function stripTags(text: string): string {
  return /<[a-z][\s\S]*>/i.test(text) ? text.replace(/<[^>]+>/g, ' ') : text;
}

function candidates(text: string): string[] {
  const found: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const t = line.trim();
    if (t.startsWith('{') && t.endsWith('}')) found.push(t);
  }
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) found.push(text.slice(start, end + 1));
  return found;
}

function tryParse(text: string): AlertPayload | undefined {
  try {
    const value: unknown = JSON.parse(text);
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
  } catch {
    return undefined;
  }
  return undefined;
}

export function parseLoosePayload(text: string): AlertPayload | undefined {
  const straight = repairSeparators(normalizeQuotes(text));
  return tryParse(text) ?? tryParse(straight) ?? tryParse(pythonLiteralToJson(straight));
}

/** First JSON-ish object found in the body, then in the subject. */
export function extractSignalPayload(body: string, subject = ''): AlertPayload | undefined {
  for (const source of [stripTags(normalizeQuotes(body)), normalizeQuotes(subject)]) {
    for (const candidate of candidates(source)) {
      const parsed = parseLoosePayload(candidate);
      if (parsed) return parsed;
    }
  }
  return undefined;
}
