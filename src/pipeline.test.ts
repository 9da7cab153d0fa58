import { describe, expect, it, vi } from 'vitest';
import { createWritePipeline } from './pipeline';
import { createDataLayer } from './data';
import { createOutbox } from './queue';
import { createMemoryRemoteStore } from './remote/memory';
import { createNetworkStore } from './stores/network';
import { createSyncStatusStore } from './stores/sync';
import { delay } from './utils';
import type { RemoteStore } from './remote/types';
import { makeConversation, testStore } from './__tests__/fixtures';

async function setup(options: { remote?: RemoteStore; retryDelaysMs?: number[] } = {}) {
  const store = await testStore();
  const memory = createMemoryRemoteStore();
  const network = createNetworkStore(true);
  const status = createSyncStatusStore();
  const outbox = createOutbox(store, status);
  const pipeline = createWritePipeline({
    store,
    outbox,
    remote: options.remote ?? memory,
    network,
    status,
    retryDelaysMs: options.retryDelaysMs ?? [1, 1],
    maxConflictRetries: 3
  });
  const data = createDataLayer({ store, outbox, pipeline, userId: 'alice', now: () => 1000, status });
  await store.upsert('conversations', makeConversation());
  await store.upsert(
    'conversations',
    makeConversation({ id: 'g1', kind: 'GROUP', name: 'Team', participantIds: ['alice', 'bob'], version: 1 })
  );
  return { store, memory, network, status, outbox, pipeline, data };
}

describe('createWritePipeline', () => {
  it('moves a sent message from SENDING to SENT once the remote accepts it', async () => {
    const { store, memory, outbox, pipeline, data } = await setup();
    const message = await data.sendMessage({ conversationId: 'alice_bob', senderId: 'alice', text: 'hi' });
    expect(message.status).toBe('SENDING');

    await pipeline.idle();
    expect((await store.get('messages', message.id))?.status).toBe('SENT');
    expect(memory.get(`conversations/alice_bob/messages/${message.id}`)?.data).toMatchObject({
      id: message.id,
      text: 'hi',
      senderId: 'alice'
    });
    expect(memory.get('conversations/alice_bob')?.data).toMatchObject({
      updatedAt: 1000,
      lastMessageSummary: { messageId: message.id, text: 'hi' }
    });
    expect(memory.writes().map((w) => w.path)).toEqual([
      `conversations/alice_bob/messages/${message.id}`,
      'conversations/alice_bob'
    ]);
    expect(await outbox.count()).toBe(0);
    await store.destroy();
  });

  it('parks while offline without spending attempts and delivers after reconnect', async () => {
    const { store, memory, network, status, outbox, pipeline, data } = await setup();
    await network.setOnline(false);

    const message = await data.sendMessage({ conversationId: 'alice_bob', senderId: 'alice', text: 'later' });
    await pipeline.idle();
    expect((await store.get('messages', message.id))?.status).toBe('SENDING');
    expect(memory.writes()).toHaveLength(0);
    expect((await outbox.getPending()).map((op) => op.retries)).toEqual([0]);
    await vi.waitFor(() => expect(status.get().status).toBe('offline'));

    await network.setOnline(true);
    await pipeline.idle();
    expect((await store.get('messages', message.id))?.status).toBe('SENT');
    expect(await outbox.count()).toBe(0);
    await store.destroy();
  });

  it('turns a message FAILED after the retry budget without publishing its summary', async () => {
    const { store, memory, status, outbox, pipeline, data } = await setup();
    /* three attempts for the message create */
    memory.failNextWrites(3);

    const message = await data.sendMessage({ conversationId: 'alice_bob', senderId: 'alice', text: 'doomed' });
    await pipeline.idle();

    expect((await store.get('messages', message.id))?.status).toBe('FAILED');
    expect(memory.writes()).toHaveLength(0);
    expect(memory.get('conversations/alice_bob')).toBeNull();
    expect(await outbox.count()).toBe(0);
    expect(status.get().syncErrors).toEqual([]);

    const retried = await data.retryMessage(message.id);
    expect(retried.status).toBe('SENDING');
    await pipeline.idle();
    expect((await store.get('messages', message.id))?.status).toBe('SENT');
    expect(memory.writes().map((w) => w.path)).toEqual([
      `conversations/alice_bob/messages/${message.id}`,
      'conversations/alice_bob'
    ]);
    expect(memory.get('conversations/alice_bob')?.data.lastMessageSummary).toMatchObject({ messageId: message.id });
    await store.destroy();
  });

  it('gives up on a permanent error without retrying', async () => {
    const { store, memory, status, outbox, pipeline, data } = await setup();
    memory.failNextWrites(1, 'permission-denied');

    await data.setUserDefault('alice', 'smartReplies', false);
    await pipeline.idle();

    expect(status.get().syncErrors).toMatchObject([
      { entityKey: 'users/alice', operation: 'set', code: 'permission-denied' }
    ]);
    expect(await outbox.count()).toBe(0);
    expect(memory.writes()).toHaveLength(0);
    await store.destroy();
  });

  it('re-reads and reapplies a guarded write on a version conflict', async () => {
    const { store, memory, outbox, pipeline, data } = await setup();
    await memory.write('conversations/g1', { kind: 'GROUP', participantIds: ['alice', 'bob'], createdBy: 'alice' });
    await memory.write('conversations/g1', { name: 'Renamed elsewhere' });

    await data.addParticipant('g1', 'carol');
    await pipeline.idle();

    const remote = memory.get('conversations/g1');
    expect(remote?.version).toBe(3);
    expect(remote?.data).toMatchObject({ participantIds: ['alice', 'bob', 'carol'], name: 'Renamed elsewhere' });
    expect(await outbox.count()).toBe(0);
    await store.destroy();
  });

  it('gives up after the conflict budget', async () => {
    const { store, memory, status, pipeline, data } = await setup();
    memory.failNextWrites(4, 'conflict');

    await data.renameGroup('g1', 'Contested');
    await pipeline.idle();

    expect(status.get().syncErrors).toMatchObject([{ entityKey: 'conversations/g1', code: 'conflict' }]);
    expect(memory.get('conversations/g1')).toBeNull();
    await store.destroy();
  });

  it('drops a create-if-absent whose document already exists', async () => {
    const { store, memory, status, outbox, pipeline, data } = await setup();
    await memory.write('conversations/alice_carol', {
      kind: 'DIRECT',
      participantIds: ['alice', 'carol'],
      createdBy: 'carol'
    });

    await data.createDirectConversation('carol');
    await pipeline.idle();

    expect(await outbox.count()).toBe(0);
    expect(status.get().syncErrors).toEqual([]);
    expect(memory.get('conversations/alice_carol')?.data).toMatchObject({ createdBy: 'carol' });
    await store.destroy();
  });

  it('keeps at most one write in flight per document, in order', async () => {
    const memory = createMemoryRemoteStore();
    const active = new Map<string, number>();
    let maxConcurrent = 0;
    const slow: RemoteStore = {
      read: (path) => memory.read(path),
      subscribe: (path, handlers, query) => memory.subscribe(path, handlers, query),
      async write(path, patch, options) {
        const n = (active.get(path) ?? 0) + 1;
        active.set(path, n);
        maxConcurrent = Math.max(maxConcurrent, n);
        await delay(5);
        active.set(path, n - 1);
        return memory.write(path, patch, options);
      }
    };
    const { store, pipeline, data } = await setup({ remote: slow });

    await data.renameGroup('g1', 'One');
    await data.renameGroup('g1', 'Two');
    await delay(2);
    await data.renameGroup('g1', 'Three');
    await pipeline.idle();

    expect(maxConcurrent).toBe(1);
    expect(memory.get('conversations/g1')?.data).toMatchObject({ name: 'Three' });
    await store.destroy();
  });

  it('leaves queued operations alone once stopped', async () => {
    const { store, memory, outbox, pipeline, data } = await setup();
    pipeline.stop();
    await data.sendMessage({ conversationId: 'alice_bob', senderId: 'alice', text: 'queued' });
    await pipeline.idle();

    expect(memory.writes()).toHaveLength(0);
    expect(await outbox.count()).toBe(1);
    await store.destroy();
  });

  it('hands every operation that left the outbox to the settle hook', async () => {
    const store = await testStore();
    const memory = createMemoryRemoteStore();
    const outbox = createOutbox(store);
    const settled: string[] = [];
    const pipeline = createWritePipeline({
      store,
      outbox,
      remote: memory,
      network: createNetworkStore(true),
      retryDelaysMs: [],
      maxConflictRetries: 0,
      onSettled: async (op) => {
        settled.push(`${op.operationType} ${op.entityKey}`);
      }
    });
    const data = createDataLayer({ store, outbox, pipeline, userId: 'alice', now: () => 1000 });
    await store.upsert('conversations', makeConversation({ id: 'g1', kind: 'GROUP', name: 'Team' }));
    memory.failNextWrites(1, 'permission-denied');

    await data.renameGroup('g1', 'Refused');
    await pipeline.idle();
    await data.renameGroup('g1', 'Accepted');
    await pipeline.idle();

    expect(settled).toEqual(['set conversations/g1', 'set conversations/g1']);
    expect(memory.get('conversations/g1')?.data).toMatchObject({ name: 'Accepted' });
    await store.destroy();
  });
});
