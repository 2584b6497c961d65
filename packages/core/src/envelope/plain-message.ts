/**
 * didseal: DIDComm-style plain message construction.
 */

import { v7 as uuidv7 } from "uuid";
import { DIDCOMM_PLAIN, type PlainMessage } from "../types/messages.js";

export interface PlainMessageInit<T> {
  type: string;
  body: T;
  from?: string;
  to?: string[];
  thid?: string;
  /** Lifetime in seconds; sets `expires_time` relative to `created_time`. */
  ttlSeconds?: number;
}

/**
 * Build a plain message with a UUIDv7 id and Unix-seconds timestamps,
 * ready to hand to `pack`.
 */
export function createPlainMessage<T>(init: PlainMessageInit<T>, now: Date = new Date()): PlainMessage<T> {
  const createdTime = Math.floor(now.getTime() / 1000);
  const message: PlainMessage<T> = {
    id: uuidv7(),
    typ: DIDCOMM_PLAIN,
    type: init.type,
    created_time: createdTime,
    body: init.body,
  };
  if (init.from !== undefined) message.from = init.from;
  if (init.to !== undefined) message.to = [...init.to];
  if (init.thid !== undefined) message.thid = init.thid;
  if (init.ttlSeconds !== undefined) message.expires_time = createdTime + init.ttlSeconds;
  return message;
}
