const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith("#x") || entity.startsWith("#X")) {
      return String.fromCodePoint(parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith("#")) {
      return String.fromCodePoint(Number(entity.slice(1)));
    }
    return ENTITIES[entity.toLowerCase()] ?? match;
  });
}

function escapeTag(tag: string): string {
  return tag.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Inner markup of every `<tag ...>...</tag>` in document order. Not nesting-aware. */
export function elements(xml: string, tag: string): string[] {
  const name = escapeTag(tag);
  const pattern = new RegExp(`<${name}(?:\\s[^>]*)?>([\\s\\S]*?)</${name}>`, "g");
  return [...xml.matchAll(pattern)].map((match) => match[1]);
}

/** Text of the first `<tag>`, with nested markup dropped and entities decoded. */
export function text(xml: string, tag: string): string {
  const [first] = elements(xml, tag);
  return first === undefined ? "" : plain(first);
}

export function plain(markup: string): string {
  return decodeEntities(markup.replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, "$1").replace(/<[^>]+>/g, ""))
    .replace(/\s+/g, " ")
    .trim();
}

/** Opening tags of `<tag .../>` or `<tag ...>` with their attributes. */
export function attributes(xml: string, tag: string): Array<Record<string, string>> {
  const pattern = new RegExp(`<${escapeTag(tag)}(\\s[^>]*?)?/?>`, "g");
  return [...xml.matchAll(pattern)].map((match) => {
    const attrs: Record<string, string> = {};
    for (const attr of (match[1] ?? "").matchAll(/([\w:-]+)\s*=\s*"([^"]*)"/g)) {
      attrs[attr[1]] = decodeEntities(attr[2]);
    }
    return attrs;
  });
}
