export { createXmlParser, parseXml } from './parser.js';
export { parseErrorResponse, formatErrorMessage, type ParsedError } from './error.js';
