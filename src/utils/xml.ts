import { XMLParser, XMLValidator } from 'fast-xml-parser';

export type XmlNode = Record<string, unknown>;

// Namespace prefixes are dropped so callers look up local names
// (dc:title -> title, e:property -> property, s:Body -> Body).
const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true
});

export function parseXML(xml: string): unknown {
  return parser.parse(xml);
}

export function isWellFormed(xml: string): boolean {
  return XMLValidator.validate(xml) === true;
}

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

export function child(node: unknown, name: string): unknown {
  return isXmlNode(node) ? node[name] : undefined;
}

/**
 * Text content of an element, whether it parsed as a bare string or as a node
 * with attributes and a text part
 */
export function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (isXmlNode(value)) {
    const text = value['#text'];
    if (text === undefined) {
      // <tag attr="x"/> has attributes but no text
      return '';
    }
    return textOf(text);
  }
  if (Array.isArray(value)) {
    return textOf(value[0]);
  }
  return undefined;
}

export function attrOf(value: unknown, name: string): string | undefined {
  const node = Array.isArray(value) ? value[0] : value;
  if (!isXmlNode(node)) {
    return undefined;
  }
  const attr = node[`@_${name}`];
  return typeof attr === 'string' ? attr : undefined;
}

/**
 * Depth-first search for the first element with the given local name
 */
export function findFirst(node: unknown, name: string): unknown {
  if (Array.isArray(node)) {
    for (const item of node) {
      const found = findFirst(item, name);
      if (found !== undefined) {
        return found;
      }
    }
    return undefined;
  }
  if (!isXmlNode(node)) {
    return undefined;
  }
  if (name in node) {
    return node[name];
  }
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith('@_') || key === '#text') {
      continue;
    }
    const found = findFirst(value, name);
    if (found !== undefined) {
      return found;
    }
  }
  return undefined;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function unescapeXml(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, '\'')
    .replace(/&#x([0-9a-fA-F]+);/g, (_, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => String.fromCodePoint(parseInt(dec, 10)))
    .replace(/&amp;/g, '&');
}

/**
 * Embedded documents (DIDL-Lite inside a LastChange value) arrive with one or
 * more extra layers of entity encoding depending on firmware. Peel layers until
 * the text is markup, then require it to be well formed.
 * Returns undefined when it never becomes a well-formed document.
 */
export function decodeEmbeddedXml(text: string, maxExtraPasses = 2): string | undefined {
  let current = text.trim();
  for (let pass = 0; pass < maxExtraPasses && !current.startsWith('<') && current.includes('&lt;'); pass++) {
    current = unescapeXml(current).trim();
  }
  if (!current.startsWith('<') || !isWellFormed(current)) {
    return undefined;
  }
  return current;
}
