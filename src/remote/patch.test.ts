import { describe, expect, it } from 'vitest';
import { applyPatch } from './patch';
import { arrayRemove, arrayUnion } from './types';

describe('applyPatch', () => {
  it('merges top-level fields and keeps the rest', () => {
    const base = { name: 'Old', kind: 'GROUP' };
    expect(applyPatch(base, { name: 'New' })).toEqual({ name: 'New', kind: 'GROUP' });
    expect(base).toEqual({ name: 'Old', kind: 'GROUP' });
  });

  it('addresses map entries with dotted keys', () => {
    const base = { readBy: { bob: 5 } };
    expect(applyPatch(base, { 'readBy.carol': 7 })).toEqual({ readBy: { bob: 5, carol: 7 } });
    expect(applyPatch(null, { 'settingsOverride.smartReplies': 'off' })).toEqual({
      settingsOverride: { smartReplies: 'off' }
    });
  });

  it('applies array transforms against the stored array', () => {
    const base = { participantIds: ['a', 'b'] };
    expect(applyPatch(base, { participantIds: arrayUnion('b', 'c', 'c') })).toEqual({
      participantIds: ['a', 'b', 'c']
    });
    expect(applyPatch(base, { participantIds: arrayRemove('a') })).toEqual({ participantIds: ['b'] });
    expect(applyPatch(null, { 'reactions.👍': arrayUnion('u1') })).toEqual({ reactions: { '👍': ['u1'] } });
  });

  it('skips undefined values', () => {
    expect(applyPatch({ text: 'hi' }, { text: undefined })).toEqual({ text: 'hi' });
  });
});
