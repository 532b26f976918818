/**
 * Message payload types.
 */

/**
 * A message model that knows how to serialize itself.
 */
export interface SerializableMessage {
  toJsonString(): string;
}

/**
 * Anything the sender can post: an already-serialized payload or a
 * serializable message model.
 */
export type PushMessage = string | SerializableMessage;

/**
 * Produces the request body for a message. The payload is never inspected.
 */
export function serializeMessage(message: PushMessage): string {
  return typeof message === 'string' ? message : message.toJsonString();
}
