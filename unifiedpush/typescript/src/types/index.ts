/**
 * UnifiedPush types - public exports.
 */

export type { SerializableMessage, PushMessage } from './message.js';
export { serializeMessage } from './message.js';

export type {
  SendSuccess,
  SendFailure,
  SendResult,
  MessageResponseCallback,
} from './result.js';
