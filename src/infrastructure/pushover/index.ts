export { ImageAttachment } from './attachment.js';
export { fetchAttachment, MAX_ATTACHMENT_BYTES } from './attachment-fetcher.js';
export {
  sendNotification,
  redactParams,
  sanitizeMultipartMessage,
  detectMimeType,
  PUSHOVER_API_URL,
} from './client.js';
export type { DispatchResult } from './client.js';
