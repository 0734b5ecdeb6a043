export type { PayloadSource } from './types.js';
export {
  BytesPayloadSource,
  FilePayloadSource,
  readPayload,
  toPayloadSource,
} from './sources.js';
