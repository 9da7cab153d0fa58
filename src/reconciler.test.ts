import { describe, expect, it, vi } from 'vitest';
import { createReconciler } from './reconciler';
import { createRealtimeHub } from './realtime';
import { createOutbox } from './queue';
import { conversationDocument, conversationSetOperation } from './operations';
import { visibleMessages } from './queries';
import { createMemoryRemoteStore, type MemoryRemoteStore } from './remote/memory';
import { createSyncStatusStore } from './stores/sync';
import { delay } from './utils';
import type { Message } from './types';
import {
  conversationChange,
  makeConversation,
  makeMessage,
  messageChange,
  testStore
} from './__tests__/fixtures';

async function setup(memory: MemoryRemoteStore = createMemoryRemoteStore()) {
  const store = await testStore();
  const hub = createRealtimeHub(memory, { reconnectBaseMs: 10, reconnectMaxMs: 100 });
  const outbox = createOutbox(store);
  const status = createSyncStatusStore();
  const delivered: Message[] = [];
  const reconciler = createReconciler({
    store,
    hub,
    remote: memory,
    outbox,
    userId: 'alice',
    status,
    onDeliver: (message) => delivered.push(message)
  });
  return { store, hub, outbox, status, reconciler, delivered, memory };
}

describe('createReconciler', () => {
  it('applies a duplicated batch only once', async () => {
    const { store, reconciler } = await setup();
    await store.upsert('conversations', makeConversation());
    const changed: string[][] = [];
    store.onChange((tables) => changed.push([...tables]));

    const batch = [messageChange(makeMessage())];
    await reconciler.applyMessageChanges(batch);
    expect(changed).toEqual([['messages'], ['conversations']]);

    await reconciler.applyMessageChanges(batch);
    expect(changed).toHaveLength(2);
    expect(await store.get('messages', 'm1')).toEqual(makeMessage());
    expect((await store.get('conversations', 'alice_bob'))?.lastMessageSummary).toEqual({
      messageId: 'm1',
      senderId: 'alice',
      text: 'hello',
      timestamp: 200,
      type: 'TEXT'
    });
    await store.destroy();
  });

  it('renders by timestamp whatever order the messages arrive in', async () => {
    const { store, reconciler } = await setup();
    await store.upsert('conversations', makeConversation());

    await reconciler.applyMessageChanges([messageChange(makeMessage({ id: 'x', timestamp: 300 }))]);
    await reconciler.applyMessageChanges([messageChange(makeMessage({ id: 'y', timestamp: 100 }))]);
    await reconciler.applyMessageChanges([messageChange(makeMessage({ id: 'z', timestamp: 200 }))]);

    const rendered = await visibleMessages('alice_bob', 'alice').run(store.db);
    expect(rendered.map((m) => m.id)).toEqual(['y', 'z', 'x']);
    expect((await store.get('conversations', 'alice_bob'))?.lastMessageSummary?.messageId).toBe('x');
    await store.destroy();
  });

  it('settles a concurrent group rename on the later server timestamp on every device', async () => {
    const base = makeConversation({ id: 'g1', kind: 'GROUP', name: 'Team' });
    const renamedA = conversationChange({ ...base, name: 'A', version: 3, serverUpdatedAt: 1200 });
    const renamedB = conversationChange({ ...base, name: 'B', version: 2, serverUpdatedAt: 1100 });

    const first = await setup();
    await first.store.upsert('conversations', base);
    await first.reconciler.applyConversationChanges([renamedA]);
    await first.reconciler.applyConversationChanges([renamedB]);

    const second = await setup();
    await second.store.upsert('conversations', base);
    await second.reconciler.applyConversationChanges([renamedB]);
    await second.reconciler.applyConversationChanges([renamedA]);

    for (const { store } of [first, second]) {
      const stored = await store.get('conversations', 'g1');
      expect(stored?.name).toBe('A');
      expect(stored?.version).toBe(3);
      expect(stored?.serverUpdatedAt).toBe(1200);
      await store.destroy();
    }
  });

  it('keeps a field with a pending local write and records the conflict', async () => {
    const { store, outbox, reconciler } = await setup();
    const base = makeConversation({ id: 'g1', kind: 'GROUP', name: 'Mine' });
    await store.upsert('conversations', base);
    await outbox.enqueue(conversationSetOperation('g1', { name: 'Mine' }));

    await reconciler.applyConversationChanges([
      conversationChange({ ...base, name: 'Theirs', iconUrl: 'icon.png', version: 2, serverUpdatedAt: 1500 })
    ]);

    const stored = await store.get('conversations', 'g1');
    expect(stored?.name).toBe('Mine');
    expect(stored?.iconUrl).toBe('icon.png');
    expect(stored?.version).toBe(1);
    expect(stored?.serverUpdatedAt).toBe(1000);

    const history = await store.db.conflictHistory.where('entityId').equals('g1').toArray();
    expect(history.map((h) => [h.field, h.winner, h.strategy])).toEqual([
      ['name', 'local', 'local_pending'],
      ['iconUrl', 'remote', 'last_write']
    ]);
    await store.destroy();
  });

  it('re-reads a held-back document once its pending write is gone', async () => {
    const memory = createMemoryRemoteStore({ now: () => 2000 });
    const { store, outbox, reconciler } = await setup(memory);
    const base = makeConversation({ id: 'g1', kind: 'GROUP', name: 'Team' });
    await store.upsert('conversations', { ...base, name: 'Mine' });
    const opId = await outbox.enqueue(conversationSetOperation('g1', { name: 'Mine' }));

    await memory.write('conversations/g1', { ...conversationDocument(base), name: 'Theirs' });
    const theirs = memory.get('conversations/g1');
    expect(theirs?.serverTimestamp).toBe(2000);
    await reconciler.applyConversationChanges([
      conversationChange({ ...base, name: 'Theirs', version: 1, serverUpdatedAt: 2000 })
    ]);
    expect((await store.get('conversations', 'g1'))?.name).toBe('Mine');

    await reconciler.refresh('conversations/g1');
    expect((await store.get('conversations', 'g1'))?.name).toBe('Mine');

    await outbox.remove(opId);
    await reconciler.refresh('conversations/g1');
    const stored = await store.get('conversations', 'g1');
    expect(stored?.name).toBe('Theirs');
    expect(stored?.serverUpdatedAt).toBe(2000);
    await store.destroy();
  });

  it('asks for a delivery receipt only for fresh messages from others', async () => {
    const { store, status, reconciler, delivered } = await setup();
    await store.upsert('conversations', makeConversation());

    await reconciler.applyMessageChanges([
      messageChange(makeMessage({ id: 'cached', senderId: 'bob' }), true),
      messageChange(makeMessage({ id: 'own', senderId: 'alice' }), true)
    ]);
    expect(status.get().lastSyncTime).toBeNull();

    await reconciler.applyMessageChanges([
      messageChange(makeMessage({ id: 'fresh', senderId: 'bob' })),
      messageChange(makeMessage({ id: 'acked', senderId: 'bob', deliveredTo: { alice: 5 } })),
      messageChange(makeMessage({ id: 'mine', senderId: 'alice' }))
    ]);

    expect(delivered.map((m) => m.id)).toEqual(['fresh']);
    expect(status.get().lastSyncTime).not.toBeNull();
    expect((await store.get('messages', 'acked'))?.status).toBe('DELIVERED');
    await store.destroy();
  });

  it('never deletes local data when a document leaves the subscription', async () => {
    const { store, reconciler } = await setup();
    const conversation = makeConversation();
    await store.upsert('conversations', conversation);

    await reconciler.applyConversationChanges([{ ...conversationChange(conversation), data: null }]);
    expect(await store.get('conversations', 'alice_bob')).toEqual(conversation);
    await store.destroy();
  });

  it('follows a live conversation until the watch is closed', async () => {
    const memory = createMemoryRemoteStore({ now: () => 5000 });
    await memory.write('conversations/alice_bob', {
      kind: 'DIRECT',
      participantIds: ['alice', 'bob'],
      createdBy: 'bob',
      createdAt: 100
    });
    await memory.write('conversations/alice_bob/messages/b1', {
      conversationId: 'alice_bob',
      senderId: 'bob',
      type: 'TEXT',
      text: 'first',
      timestamp: 400
    });
    const { store, hub, reconciler, delivered } = await setup(memory);

    const watch = reconciler.watchConversation('alice_bob');
    await vi.waitFor(async () => expect((await store.get('messages', 'b1'))?.text).toBe('first'));
    expect(hub.getConnectionState()).toBe('connected');

    await memory.write('conversations/alice_bob/messages/b2', {
      conversationId: 'alice_bob',
      senderId: 'bob',
      type: 'TEXT',
      text: 'second',
      timestamp: 500
    });
    await vi.waitFor(async () => expect((await store.get('messages', 'b2'))?.serverUpdatedAt).toBe(5002));
    await reconciler.idle();
    expect(delivered.map((m) => m.id)).toEqual(['b1', 'b2']);
    expect((await store.get('conversations', 'alice_bob'))?.lastMessageSummary?.text).toBe('second');

    watch.close();
    expect(hub.getConnectionState()).toBe('disconnected');
    await memory.write('conversations/alice_bob/messages/b3', {
      conversationId: 'alice_bob',
      senderId: 'bob',
      type: 'TEXT',
      text: 'unseen',
      timestamp: 600
    });
    await delay(10);
    await reconciler.idle();
    expect(await store.get('messages', 'b3')).toBeUndefined();
    await store.destroy();
  });
});
