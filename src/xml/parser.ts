/**
 * Core XML parsing utilities for S3 API responses
 */

import { XMLParser } from 'fast-xml-parser';

/**
 * Parser options for S3 XML
 */
const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  ignoreDeclaration: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
};

/**
 * Creates a configured XML parser instance for S3 responses
 */
export function createXmlParser(): XMLParser {
  return new XMLParser(PARSER_OPTIONS);
}

/**
 * Parses an XML document into a plain object
 *
 * @throws Error if XML is invalid
 */
export function parseXml(xml: string): Record<string, unknown> {
  try {
    const parsed: unknown = createXmlParser().parse(xml, true);
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    throw new Error(
      `Failed to parse XML: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
