import { XMLParser, XMLValidator } from 'fast-xml-parser';

import { StructuredDecodeError } from '../errors';

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: true,
  trimValues: true,
});

/**
 * Parses an XML document into plain data and returns the content of its root
 * element. Repeated child elements become arrays, a single one stays a value.
 */
export function parseXmlBody(text: string): unknown {
  const validation = XMLValidator.validate(text);

  if (validation !== true) {
    throw new StructuredDecodeError(`failed to decode arguments: invalid XML (${validation.err.msg})`);
  }

  const document: unknown = parser.parse(text);

  if (typeof document === 'object' && document !== null && !Array.isArray(document)) {
    const roots = Object.values(document);

    if (roots.length === 1) {
      return roots[0];
    }
  }

  return document;
}
