/**
 * Feature settings resolution.
 *
 * A feature is resolved in three layers, first match wins:
 *   1. the conversation override, when it is `'on'` or `'off'`
 *   2. the user's own default
 *   3. the system default ({@link SYSTEM_DEFAULTS})
 *
 * The two writable layers live in different documents
 * (`conversations/{id}.settingsOverride` and `users/{id}.userLevelDefaults`);
 * see {@link data.ts} for the intents that write them.
 */

import type { Conversation, Feature, OverrideState, User } from './types';

export const SYSTEM_DEFAULTS: Readonly<Record<Feature, boolean>> = {
  autoTranslate: false,
  smartReplies: true
};

export function effective(
  feature: Feature,
  conversationOverride: OverrideState | undefined,
  userDefault: boolean | undefined
): boolean {
  if (conversationOverride === 'on') return true;
  if (conversationOverride === 'off') return false;
  return userDefault ?? SYSTEM_DEFAULTS[feature];
}

export type ResolvedSettings = Record<Feature, boolean>;

/** Resolve every feature for a conversation as seen by `user`. */
export function resolveSettings(
  conversation: Pick<Conversation, 'settingsOverride'> | undefined,
  user: Pick<User, 'userLevelDefaults'> | undefined
): ResolvedSettings {
  const resolve = (feature: Feature) =>
    effective(feature, conversation?.settingsOverride[feature], user?.userLevelDefaults[feature]);
  return {
    autoTranslate: resolve('autoTranslate'),
    smartReplies: resolve('smartReplies')
  };
}
