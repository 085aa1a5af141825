import { XMLParser } from 'fast-xml-parser';
import {
  ENTRY_ELEMENT,
  type AggregateDocument,
  type AggregateEntry,
} from './schema.js';

const INDENT = '  ';
const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';
const ATTRIBUTES_KEY = '$attributes';
const TEXT_KEY = '#text';
const ATTRIBUTE_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;
// Code units XML 1.0 forbids in character data: C0 controls other than
// tab, LF and CR, U+FFFE/U+FFFF, and unpaired surrogates.
const DISALLOWED_CHARS =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

export class XmlParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'XmlParseError';
  }
}

export function isValidAttributeName(name: string): boolean {
  return ATTRIBUTE_NAME.test(name);
}

export function stripDisallowedChars(value: string): string {
  return value.replace(DISALLOWED_CHARS, '');
}

export function escapeText(value: string): string {
  return stripDisallowedChars(value)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/\r/g, '&#13;');
}

export function escapeAttribute(value: string): string {
  return stripDisallowedChars(value)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/\t/g, '&#9;')
    .replace(/\n/g, '&#10;')
    .replace(/\r/g, '&#13;');
}

/**
 * Entries go one per line at two-space depth. Body text is written as-is
 * (escaped), so multi-line text keeps its own line breaks and the indent
 * never leaks into it.
 */
export function serializeDocument(doc: AggregateDocument): string {
  const lines: string[] = [XML_DECLARATION];

  if (doc.entries.length === 0) {
    lines.push(`<${doc.rootName} />`);
  } else {
    lines.push(`<${doc.rootName}>`);
    for (const entry of doc.entries) {
      lines.push(`${INDENT}${serializeEntry(entry)}`);
    }
    lines.push(`</${doc.rootName}>`);
  }

  return lines.join('\n') + '\n';
}

function serializeEntry(entry: AggregateEntry): string {
  const attrs = Object.entries(entry.attributes)
    .map(([name, value]) => ` ${name}="${escapeAttribute(value)}"`)
    .join('');
  return `<${ENTRY_ELEMENT}${attrs}>${escapeText(entry.text)}</${ENTRY_ELEMENT}>`;
}

function createParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    attributesGroupName: ATTRIBUTES_KEY,
    textNodeName: TEXT_KEY,
    alwaysCreateTextNode: true,
    trimValues: false,
    parseTagValue: false,
    parseAttributeValue: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
    processEntities: true,
    htmlEntities: true,
    isArray: (name, jpath, _isLeafNode, isAttribute) =>
      !isAttribute && name === ENTRY_ELEMENT && jpath.split('.').length === 2,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses a previously written aggregate document. Any single root element
 * is accepted and its name kept; only its direct `entry` children are read.
 */
export function parseDocument(xml: string): AggregateDocument {
  let parsed: unknown;
  try {
    parsed = createParser().parse(xml, true);
  } catch (err) {
    throw new XmlParseError(err instanceof Error ? err.message : String(err), { cause: err });
  }

  if (!isRecord(parsed)) {
    throw new XmlParseError('Parser returned no document');
  }

  const rootNames = Object.keys(parsed).filter((key) => key !== TEXT_KEY);
  if (rootNames.length !== 1) {
    throw new XmlParseError(rootNames.length === 0 ? 'No root element' : 'Multiple root elements');
  }

  const rootName = rootNames[0];
  const root = parsed[rootName];
  const rawEntries = isRecord(root) ? root[ENTRY_ELEMENT] : undefined;

  const entries: AggregateEntry[] = [];
  if (Array.isArray(rawEntries)) {
    for (const raw of rawEntries) {
      entries.push(toEntry(raw));
    }
  }

  return { rootName, entries };
}

function toEntry(raw: unknown): AggregateEntry {
  if (!isRecord(raw)) {
    return { attributes: {}, text: typeof raw === 'string' ? raw : '' };
  }

  const attributes: Record<string, string> = {};
  const rawAttributes = raw[ATTRIBUTES_KEY];
  if (isRecord(rawAttributes)) {
    for (const [name, value] of Object.entries(rawAttributes)) {
      if (typeof value === 'string') {
        attributes[name] = value;
      }
    }
  }

  const text = raw[TEXT_KEY];
  return { attributes, text: typeof text === 'string' ? text : '' };
}
