export type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
export { getHeader, getETag, getRequestId, isSuccessResponse } from './types.js';
export { FetchTransport, type FetchTransportOptions } from './fetch-transport.js';
