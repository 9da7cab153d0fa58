import { get, writable } from 'svelte/store';

/** Conversation currently on screen, or `null` when none is. */
export const activeConversation = writable<string | null>(null);

/** Incoming-message notifications are suppressed for the conversation on screen. */
export function shouldSuppressNotification(conversationId: string): boolean {
  return get(activeConversation) === conversationId;
}
