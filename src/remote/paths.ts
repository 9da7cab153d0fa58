/**
 * Remote document paths.
 *
 *   users/{userId}
 *   conversations/{conversationId}
 *   conversations/{conversationId}/messages/{messageId}
 *   conversations/{conversationId}/typing/{userId}
 */

import { RemoteStoreError } from '../errors';

export type ParsedPath =
  | { kind: 'users' }
  | { kind: 'user'; userId: string }
  | { kind: 'conversations' }
  | { kind: 'conversation'; conversationId: string }
  | { kind: 'messages'; conversationId: string }
  | { kind: 'message'; conversationId: string; messageId: string }
  | { kind: 'typingCollection'; conversationId: string }
  | { kind: 'typing'; conversationId: string; userId: string };

/**
 * Ids end up both as path segments and as dotted map keys (`readBy.{userId}`),
 * so neither separator may appear in them.
 */
export function assertValidSegment(segment: string): void {
  if (!segment || segment.includes('/') || segment.includes('.')) {
    throw new RemoteStoreError('invalid-argument', `Invalid path segment: "${segment}"`);
  }
}

function join(...segments: string[]): string {
  for (const s of segments) assertValidSegment(s);
  return segments.join('/');
}

export const paths = {
  users: () => 'users',
  user: (userId: string) => join('users', userId),
  conversations: () => 'conversations',
  conversation: (conversationId: string) => join('conversations', conversationId),
  messages: (conversationId: string) => join('conversations', conversationId, 'messages'),
  message: (conversationId: string, messageId: string) =>
    join('conversations', conversationId, 'messages', messageId),
  typingCollection: (conversationId: string) => join('conversations', conversationId, 'typing'),
  typing: (conversationId: string, userId: string) =>
    join('conversations', conversationId, 'typing', userId)
};

/**
 * Parse a path into its typed form.
 *
 * @throws {RemoteStoreError} `invalid-argument` for anything outside the layout above.
 */
export function parsePath(path: string): ParsedPath {
  const s = path.split('/');
  if (s.some((seg) => seg === '')) {
    throw new RemoteStoreError('invalid-argument', `Invalid path: "${path}"`);
  }

  if (s[0] === 'users') {
    if (s.length === 1) return { kind: 'users' };
    if (s.length === 2) return { kind: 'user', userId: s[1] };
  }

  if (s[0] === 'conversations') {
    if (s.length === 1) return { kind: 'conversations' };
    if (s.length === 2) return { kind: 'conversation', conversationId: s[1] };
    if (s[2] === 'messages') {
      if (s.length === 3) return { kind: 'messages', conversationId: s[1] };
      if (s.length === 4) return { kind: 'message', conversationId: s[1], messageId: s[3] };
    }
    if (s[2] === 'typing') {
      if (s.length === 3) return { kind: 'typingCollection', conversationId: s[1] };
      if (s.length === 4) return { kind: 'typing', conversationId: s[1], userId: s[3] };
    }
  }

  throw new RemoteStoreError('invalid-argument', `Unknown path: "${path}"`);
}

export function isCollection(parsed: ParsedPath): boolean {
  return (
    parsed.kind === 'users' ||
    parsed.kind === 'conversations' ||
    parsed.kind === 'messages' ||
    parsed.kind === 'typingCollection'
  );
}

/** Collection path a document path belongs to (`a/b/c/d` -> `a/b/c`). */
export function parentPath(path: string): string {
  const idx = path.lastIndexOf('/');
  return idx === -1 ? '' : path.slice(0, idx);
}

/** Last segment of a path. */
export function lastSegment(path: string): string {
  const idx = path.lastIndexOf('/');
  return idx === -1 ? path : path.slice(idx + 1);
}
