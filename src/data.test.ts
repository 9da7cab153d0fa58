import { describe, expect, it } from 'vitest';
import { createDataLayer, directConversationId, type MediaUploader } from './data';
import { createOutbox } from './queue';
import { createSyncStatusStore } from './stores/sync';
import { UploadError, ValidationError } from './errors';
import { arrayRemove, arrayUnion } from './remote/types';
import { resolveSettings } from './settings';
import { makeConversation, makeMessage, makeUser, testStore } from './__tests__/fixtures';

async function setup(options: { mediaUploader?: MediaUploader } = {}) {
  const store = await testStore();
  const outbox = createOutbox(store);
  const status = createSyncStatusStore();
  const scheduled: string[] = [];
  const data = createDataLayer({
    store,
    outbox,
    pipeline: { schedule: (key) => scheduled.push(key) },
    userId: 'alice',
    now: () => 1000,
    mediaUploader: options.mediaUploader,
    status
  });
  await store.upsert('conversations', makeConversation());
  await store.upsert(
    'conversations',
    makeConversation({ id: 'g1', kind: 'GROUP', name: 'Team', participantIds: ['alice', 'bob'], version: 3 })
  );
  await store.upsert('users', makeUser());
  return { store, outbox, status, scheduled, data };
}

describe('sendMessage', () => {
  it('stores the message as SENDING, moves the local summary and queues the create', async () => {
    const { store, outbox, scheduled, data } = await setup();
    const message = await data.sendMessage({ conversationId: 'alice_bob', senderId: 'alice', text: '  hi  ' });

    expect(message).toMatchObject({ text: 'hi', status: 'SENDING', timestamp: 1000, version: 0, serverUpdatedAt: null });
    expect(await store.get('messages', message.id)).toEqual(message);
    const conversation = await store.get('conversations', 'alice_bob');
    expect(conversation?.lastMessageSummary).toEqual({
      messageId: message.id,
      senderId: 'alice',
      text: 'hi',
      timestamp: 1000,
      type: 'TEXT'
    });
    expect(conversation?.updatedAt).toBe(1000);

    const messageKey = `conversations/alice_bob/messages/${message.id}`;
    expect(scheduled).toEqual([messageKey]);
    const pending = await outbox.getPending();
    expect(pending.map((op) => [op.entityKey, op.operationType])).toEqual([[messageKey, 'create']]);
    await store.destroy();
  });

  it('keeps timestamps strictly increasing per sender under a frozen clock', async () => {
    const { store, data } = await setup();
    const first = await data.sendMessage({ conversationId: 'alice_bob', senderId: 'alice', text: 'one' });
    const second = await data.sendMessage({ conversationId: 'alice_bob', senderId: 'alice', text: 'two' });
    expect([first.timestamp, second.timestamp]).toEqual([1000, 1001]);
    expect(first.id).not.toBe(second.id);
    await store.destroy();
  });

  it('rejects empty text and outsiders before writing anything', async () => {
    const { store, outbox, data } = await setup();
    await expect(data.sendMessage({ conversationId: 'alice_bob', senderId: 'alice', text: '   ' })).rejects.toThrow(
      ValidationError
    );
    await expect(
      data.sendMessage({ conversationId: 'alice_bob', senderId: 'carol', text: 'hi' })
    ).rejects.toThrow('carol is not a participant of alice_bob');
    expect(await outbox.count()).toBe(0);
    expect(await store.db.messages.count()).toBe(0);
    await store.destroy();
  });
});

describe('media messages', () => {
  it('marks the message FAILED and queues nothing when the upload fails', async () => {
    const uploader: MediaUploader = {
      upload: async () => {
        throw new Error('quota exceeded');
      }
    };
    const { store, outbox, status, data } = await setup({ mediaUploader: uploader });

    await expect(
      data.sendMediaMessage({ conversationId: 'alice_bob', senderId: 'alice', type: 'IMAGE', blob: new Uint8Array([1]) })
    ).rejects.toThrow(UploadError);

    const [stored] = await store.db.messages.toArray();
    expect(stored).toMatchObject({ status: 'FAILED', uploadError: 'quota exceeded', mediaRef: null });
    expect(await outbox.count()).toBe(0);
    expect(status.get().syncErrors.map((e) => e.code)).toEqual(['upload']);

    await expect(data.retryMessage(stored.id)).rejects.toThrow(
      `Media for ${stored.id} was never uploaded; send it again`
    );
    await store.destroy();
  });

  it('queues the message with its media reference after a successful upload', async () => {
    const uploads: string[] = [];
    const uploader: MediaUploader = {
      upload: async ({ messageId }) => {
        uploads.push(messageId);
        return `media/${messageId}`;
      }
    };
    const { store, outbox, data } = await setup();

    const message = await data.sendMediaMessage({
      conversationId: 'alice_bob',
      senderId: 'alice',
      type: 'AUDIO',
      blob: new Uint8Array([1, 2]),
      text: ' caption ',
      uploader
    });

    expect(uploads).toEqual([message.id]);
    expect(message).toMatchObject({ mediaRef: `media/${message.id}`, text: 'caption', status: 'SENDING' });
    const [create] = await outbox.getPending();
    expect(create.value).toMatchObject({ type: 'AUDIO', mediaRef: `media/${message.id}` });
    await store.destroy();
  });
});

describe('retryMessage', () => {
  it('moves a FAILED message back to SENDING and queues it again', async () => {
    const { store, outbox, data } = await setup();
    await store.upsert('messages', makeMessage({ id: 'm9', status: 'FAILED', serverUpdatedAt: null }));

    const retried = await data.retryMessage('m9');
    expect(retried.status).toBe('SENDING');
    expect((await outbox.getPending()).map((op) => [op.entityKey, op.operationType])).toEqual([
      ['conversations/alice_bob/messages/m9', 'create']
    ]);
    await expect(data.retryMessage('m9')).rejects.toThrow('Message m9 is SENDING, not FAILED');
    await store.destroy();
  });
});

describe('receipts and reactions', () => {
  it('marks messages from others read and delivered, once', async () => {
    const { store, outbox, data } = await setup();
    await store.upsert('messages', makeMessage({ id: 'm1', senderId: 'bob' }));
    await store.upsert('messages', makeMessage({ id: 'm2', senderId: 'bob', deliveredTo: { alice: 5 } }));
    await store.upsert('messages', makeMessage({ id: 'm3', senderId: 'alice' }));

    expect(await data.markRead(['m1', 'm2', 'm3', 'missing'], 'alice')).toBe(2);
    expect((await store.get('messages', 'm1'))?.deliveredTo).toEqual({ alice: 1000 });
    expect((await store.get('messages', 'm2'))?.readBy).toEqual({ alice: 1000 });
    expect((await outbox.getPending()).map((op) => op.value)).toEqual([
      { 'readBy.alice': 1000, 'deliveredTo.alice': 1000 },
      { 'readBy.alice': 1000 }
    ]);

    expect(await data.markConversationRead('alice_bob', 'alice')).toBe(0);
    await expect(data.markRead(['m1'], 'bob')).rejects.toThrow('Cannot mark messages read for another user');
    await store.destroy();
  });

  it('acknowledges delivery of messages from others only', async () => {
    const { store, outbox, data } = await setup();
    await store.upsert('messages', makeMessage({ id: 'm1', senderId: 'bob' }));
    await store.upsert('messages', makeMessage({ id: 'm2', senderId: 'alice' }));

    await data.acknowledgeDelivery({ id: 'm1', conversationId: 'alice_bob' }, 'alice');
    await data.acknowledgeDelivery({ id: 'm1', conversationId: 'alice_bob' }, 'alice');
    await data.acknowledgeDelivery({ id: 'm2', conversationId: 'alice_bob' }, 'alice');

    expect((await store.get('messages', 'm1'))?.deliveredTo).toEqual({ alice: 1000 });
    expect((await outbox.getPending()).map((op) => op.value)).toEqual([{ 'deliveredTo.alice': 1000 }]);
    await store.destroy();
  });

  it('keeps one reaction per user', async () => {
    const { store, outbox, data } = await setup();
    await store.upsert('messages', makeMessage({ id: 'm1', senderId: 'bob', reactions: { '😂': ['bob'] } }));
    const ref = { id: 'm1', conversationId: 'alice_bob' };

    expect(await data.toggleReaction(ref, 'alice', '👍')).toEqual({ '😂': ['bob'], '👍': ['alice'] });
    expect(await data.toggleReaction(ref, 'alice', '❤️')).toEqual({ '😂': ['bob'], '❤️': ['alice'] });
    expect(await data.toggleReaction(ref, 'alice', '❤️')).toEqual({ '😂': ['bob'] });
    await expect(data.toggleReaction(ref, 'alice', '🔥')).rejects.toThrow('Unsupported emoji: 🔥');

    expect((await outbox.getPending()).map((op) => op.value)).toEqual([
      { 'reactions.👍': arrayUnion('alice') },
      { 'reactions.👍': arrayRemove('alice'), 'reactions.❤️': arrayUnion('alice') },
      { 'reactions.❤️': arrayRemove('alice') }
    ]);
    await store.destroy();
  });
});

describe('conversations', () => {
  it('guards membership changes with the conversation version', async () => {
    const { store, outbox, data } = await setup();

    const grown = await data.addParticipant('g1', 'carol');
    expect(grown.participantIds).toEqual(['alice', 'bob', 'carol']);
    const [op] = await outbox.getPending();
    expect(op.expectedVersion).toBe(3);
    expect(op.value).toEqual({ participantIds: arrayUnion('carol'), updatedAt: 1000 });

    await expect(data.addParticipant('g1', 'bob')).rejects.toThrow('bob is already in g1');
    await expect(data.addParticipant('alice_bob', 'carol')).rejects.toThrow('Conversation alice_bob is not a group');

    expect((await data.removeParticipant('g1', 'carol')).participantIds).toEqual(['alice', 'bob']);
    await expect(data.removeParticipant('g1', 'bob')).rejects.toThrow('A group needs at least two members');
    await store.destroy();
  });

  it('keeps direct conversation ids apart when user ids contain the separator', () => {
    expect(directConversationId('c', 'a_b')).toBe('a%5Fb_c');
    expect(directConversationId('a', 'b_c')).toBe('a_b%5Fc');
    expect(directConversationId('a%5Fb', 'c')).toBe('a%255Fb_c');
  });

  it('creates a direct conversation under the sorted pair id, once', async () => {
    const { store, outbox, data } = await setup();
    expect(directConversationId('zoe', 'carol')).toBe('carol_zoe');

    const created = await data.createDirectConversation('carol');
    expect(created).toMatchObject({ id: 'alice_carol', kind: 'DIRECT', participantIds: ['alice', 'carol'] });
    const again = await data.createDirectConversation('carol');
    expect(again).toEqual(created);

    const pending = await outbox.getPending();
    expect(pending).toHaveLength(1);
    expect(pending[0]).toMatchObject({ operationType: 'create', expectedVersion: 0 });
    await expect(data.createDirectConversation('alice')).rejects.toThrow(ValidationError);
    await store.destroy();
  });

  it('announces a new group with a SYSTEM message', async () => {
    const { store, outbox, data } = await setup();
    const group = await data.createGroup({ name: ' Crew ', participantIds: ['bob', 'carol', 'alice'] });

    expect(group).toMatchObject({ kind: 'GROUP', name: 'Crew', participantIds: ['alice', 'bob', 'carol'] });
    expect(group.lastMessageSummary).toMatchObject({ type: 'SYSTEM', text: 'created the group "Crew"', timestamp: 1000 });
    const pending = await outbox.getPending();
    expect(pending.map((op) => [op.table, op.operationType])).toEqual([
      ['conversations', 'create'],
      ['messages', 'create']
    ]);
    expect(pending[0].value.lastMessageSummary).toBeNull();

    await expect(data.createGroup({ name: 'Solo', participantIds: [] })).rejects.toThrow(
      'A group needs at least two members'
    );
    const crowd = Array.from({ length: 50 }, (_, i) => `user${i}`);
    await expect(data.createGroup({ name: 'Crowd', participantIds: crowd })).rejects.toThrow(
      'Groups are limited to 50 members'
    );
    await store.destroy();
  });

  it('hides a conversation for oneself only', async () => {
    const { store, data } = await setup();
    const hidden = await data.hideConversation('alice_bob', 'alice');
    expect(hidden.perUserDeletedAt).toEqual({ alice: 1000 });
    await expect(data.hideConversation('alice_bob', 'bob')).rejects.toThrow(
      'Cannot hide a conversation for another user'
    );
    await store.destroy();
  });

  it('sets one nickname entry without touching the others', async () => {
    const { store, outbox, data } = await setup();
    await data.setNickname('alice_bob', 'alice', ' Al ');
    expect((await store.get('conversations', 'alice_bob'))?.perUserNickname).toEqual({ alice: 'Al' });
    expect((await outbox.getPending())[0].value).toEqual({ 'perUserNickname.alice': 'Al', updatedAt: 1000 });
    await store.destroy();
  });
});

describe('settings', () => {
  it('writes the override and the user default to separate documents', async () => {
    const { store, outbox, data } = await setup();
    await data.setConversationOverride('alice_bob', 'autoTranslate', 'on');
    await data.setUserDefault('alice', 'smartReplies', false);

    expect((await outbox.getPending()).map((op) => [op.entityKey, op.value])).toEqual([
      ['conversations/alice_bob', { 'settingsOverride.autoTranslate': 'on' }],
      ['users/alice', { 'userLevelDefaults.smartReplies': false }]
    ]);

    const conversation = await store.get('conversations', 'alice_bob');
    const user = await store.get('users', 'alice');
    expect(resolveSettings(conversation, user)).toEqual({ autoTranslate: true, smartReplies: false });

    await data.setConversationOverride('alice_bob', 'autoTranslate', 'unset');
    expect(resolveSettings(await store.get('conversations', 'alice_bob'), user)).toEqual({
      autoTranslate: false,
      smartReplies: false
    });
    await store.destroy();
  });

  it('updates the profile fields it is given', async () => {
    const { store, outbox, data } = await setup();
    const updated = await data.updateProfile('alice', { displayName: ' Alicia ', preferredLanguage: 'fr' });
    expect(updated).toMatchObject({ displayName: 'Alicia', preferredLanguage: 'fr', profilePictureUrl: null });
    expect((await outbox.getPending())[0].value).toEqual({ displayName: 'Alicia', preferredLanguage: 'fr' });
    await expect(data.updateProfile('alice', {})).rejects.toThrow('Nothing to update');
    await store.destroy();
  });
});
