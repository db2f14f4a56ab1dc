import type { InboundEvent } from '../utils/validators.js';

export type DeliveryState = 'PENDING' | 'SENDING' | 'RETRYING' | 'DELIVERED' | 'FAILED';

export type DeliveryTask = {
  /** correlation id, shared with the inbound request */
  id: string;
  event: InboundEvent;
  /** failed attempts so far that were followed by a retry */
  retries: number;
  state: DeliveryState;
  enqueuedAt: number;
  lastError?: string;
  messageId?: number;
};

export function newDeliveryTask(id: string, event: InboundEvent, now = Date.now()): DeliveryTask {
  return { id, event, retries: 0, state: 'PENDING', enqueuedAt: now };
}
