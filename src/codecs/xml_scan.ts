/**
 * codecs/xml_scan.ts
 *
 * Splits a well-formed document into the raw text of its root's direct
 * children. The XML parser gives us structure but not source offsets,
 * and foreign tasks have to be written back exactly as they were read.
 *
 * Only call this on input XMLValidator has accepted.
 */

export interface XmlChunk {
  kind: 'element' | 'comment' | 'text' | 'other';
  raw: string;
  name?: string;              // element name, for kind === 'element'
}

export interface ScannedDocument {
  rootName: string;
  children: XmlChunk[];
}

const NAME = /^<\s*([^\s/>]+)/;

/** Index just past the `>` closing the tag that starts at `start`, honouring quoted attribute values. */
function tagEnd(xml: string, start: number): number {
  let quote: string | null = null;
  for (let i = start + 1; i < xml.length; i++) {
    const c = xml[i];
    if (quote) {
      if (c === quote) quote = null;
    } else if (c === '"' || c === '\'') {
      quote = c;
    } else if (c === '>') {
      return i + 1;
    }
  }
  return xml.length;
}

function indexAfter(xml: string, token: string, from: number): number {
  const i = xml.indexOf(token, from);
  return i === -1 ? xml.length : i + token.length;
}

/** Index just past a comment, CDATA section, PI or declaration at `i`, or -1 if none starts there. */
function skipSpecial(xml: string, i: number): number {
  if (xml.startsWith('<!--', i)) return indexAfter(xml, '-->', i + 4);
  if (xml.startsWith('<![CDATA[', i)) return indexAfter(xml, ']]>', i + 9);
  if (xml.startsWith('<?', i)) return indexAfter(xml, '?>', i + 2);
  if (xml.startsWith('<!', i)) return tagEnd(xml, i);
  return -1;
}

/** Index just past the element that starts at `start`. */
function elementEnd(xml: string, start: number): number {
  let i = tagEnd(xml, start);
  if (xml[i - 2] === '/') return i;

  let depth = 1;
  while (depth > 0 && i < xml.length) {
    const lt = xml.indexOf('<', i);
    if (lt === -1) return xml.length;
    const special = skipSpecial(xml, lt);
    if (special !== -1) {
      i = special;
      continue;
    }
    const end = tagEnd(xml, lt);
    if (xml[lt + 1] === '/') depth--;
    else if (xml[end - 2] !== '/') depth++;
    i = end;
  }
  return i;
}

export function scanDocument(xml: string): ScannedDocument {
  let i = 0;

  // Prolog: declaration, comments, doctype, whitespace
  for (;;) {
    const lt = xml.indexOf('<', i);
    if (lt === -1) return { rootName: '', children: [] };
    const special = skipSpecial(xml, lt);
    if (special === -1) {
      i = lt;
      break;
    }
    i = special;
  }

  const rootMatch = NAME.exec(xml.slice(i));
  const rootName = rootMatch ? rootMatch[1] : '';
  const rootOpenEnd = tagEnd(xml, i);
  const children: XmlChunk[] = [];
  if (xml[rootOpenEnd - 2] === '/') return { rootName, children };

  i = rootOpenEnd;
  while (i < xml.length) {
    if (xml[i] !== '<') {
      const next = xml.indexOf('<', i);
      const end = next === -1 ? xml.length : next;
      children.push({ kind: 'text', raw: xml.slice(i, end) });
      i = end;
      continue;
    }
    if (xml.startsWith('</', i)) break; // root closes

    const special = skipSpecial(xml, i);
    if (special !== -1) {
      const raw = xml.slice(i, special);
      children.push({ kind: raw.startsWith('<!--') ? 'comment' : 'other', raw });
      i = special;
      continue;
    }

    const end = elementEnd(xml, i);
    const raw = xml.slice(i, end);
    const m = NAME.exec(raw);
    children.push({ kind: 'element', raw, name: m ? m[1] : '' });
    i = end;
  }

  return { rootName, children };
}
