/**
 * Message delivery status machine.
 *
 *   SENDING   -> SENT | FAILED
 *   FAILED    -> SENDING (user retry) | SENT (late echo of an earlier attempt)
 *   SENT      -> DELIVERED | READ
 *   DELIVERED -> READ
 *   READ      terminal
 */

import type { Message, MessageStatus } from './types';

const TRANSITIONS: Record<MessageStatus, readonly MessageStatus[]> = {
  SENDING: ['SENT', 'FAILED'],
  FAILED: ['SENDING', 'SENT'],
  SENT: ['DELIVERED', 'READ'],
  DELIVERED: ['READ'],
  READ: []
};

/** Position on the confirmed path; SENDING and FAILED are both unconfirmed. */
const RANK: Record<MessageStatus, number> = {
  SENDING: 0,
  FAILED: 0,
  SENT: 1,
  DELIVERED: 2,
  READ: 3
};

export function canTransition(from: MessageStatus, to: MessageStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Apply a transition.
 *
 * @throws {Error} When `from -> to` is not an edge of the machine.
 */
export function advanceStatus(from: MessageStatus, to: MessageStatus): MessageStatus {
  if (!canTransition(from, to)) {
    throw new Error(`Illegal message status transition ${from} -> ${to}`);
  }
  return to;
}

/**
 * Status as seen from the remote copy of a message: READ once any non-sender
 * has read it, DELIVERED once any non-sender acknowledged it, SENT otherwise.
 */
export function deriveRemoteStatus(
  message: Pick<Message, 'senderId' | 'readBy' | 'deliveredTo'>
): MessageStatus {
  const others = (map: Record<string, number>) => Object.keys(map).some((id) => id !== message.senderId);
  if (others(message.readBy)) return 'READ';
  if (others(message.deliveredTo)) return 'DELIVERED';
  return 'SENT';
}

/**
 * Combine the local status with the remote-derived one. Confirmed statuses
 * never move backwards; an unconfirmed local status is lifted to whatever the
 * server shows.
 */
export function mergeStatus(local: MessageStatus, remote: MessageStatus): MessageStatus {
  return RANK[remote] > RANK[local] ? remote : local;
}
