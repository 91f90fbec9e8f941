export type LoginForm = {
  action: string;
  fields: Record<string, string>;
};

const FORM_RE = /<form\b([^>]*)>([\s\S]*?)<\/form>/gi;
const INPUT_RE = /<input\b([^>]*?)\/?>/gi;
const ATTR_RE = /([a-zA-Z_:][-a-zA-Z0-9_:.]*)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/g;

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: '\'',
  '#39': '\'',
};

const MAX_CODE_POINT = 0x10ffff;

export const decodeHtmlEntities = (value: string): string => value.replace(
  /&(#x[0-9a-f]+|#\d+|[a-z]+);/gi,
  (match, entity: string) => {
    const lower = entity.toLowerCase();
    if (lower in ENTITIES) return ENTITIES[lower];
    if (!lower.startsWith('#')) return match;

    const codePoint = lower.startsWith('#x') ? parseInt(lower.slice(2), 16) : parseInt(lower.slice(1), 10);
    return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : match;
  },
);

export const parseAttributes = (source: string): Record<string, string> => {
  const attrs: Record<string, string> = {};
  for (const match of source.matchAll(ATTR_RE)) {
    const value = match[2] ?? match[3] ?? match[4] ?? '';
    attrs[match[1].toLowerCase()] = decodeHtmlEntities(value);
  }
  return attrs;
};

/**
 * Finds the first form accepted by `predicate` and collects its hidden inputs.
 * Relative actions are resolved against `pageUrl`.
 */
export const findLoginForm = (
  html: string,
  pageUrl: string,
  predicate: (attrs: Record<string, string>, action: URL) => boolean,
): LoginForm | null => {
  for (const formMatch of html.matchAll(FORM_RE)) {
    const attrs = parseAttributes(formMatch[1]);
    let action: URL;
    try {
      action = new URL(attrs.action || pageUrl, pageUrl);
    } catch {
      continue;
    }
    if (!predicate(attrs, action)) continue;

    const fields: Record<string, string> = {};
    for (const inputMatch of formMatch[2].matchAll(INPUT_RE)) {
      const input = parseAttributes(inputMatch[1]);
      if ((input.type || '').toLowerCase() !== 'hidden' || !input.name) continue;
      fields[input.name] = input.value ?? '';
    }
    return { action: action.toString(), fields };
  }
  return null;
};
