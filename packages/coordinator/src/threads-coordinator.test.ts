import { describe, it, expect, vi } from 'vitest';
import { MemoryThreadStore, PlainMessageFormatter, type Thread } from '@threadline/threads';
import type { Logger } from '@threadline/utils/logger';
import { NavigationRouter } from './navigation-router.js';
import { ThreadScreen, type Screen } from './screens.js';
import { ThreadsCoordinator } from './threads-coordinator.js';

const ROOM = '!room:example.org';

function makeThread(id: string): Thread {
  return {
    id,
    roomId: ROOM,
    rootMessage: { eventId: id, sender: '@alice:example.org', msgtype: 'text', body: `root ${id}`, timestamp: 0 },
    numberOfReplies: 1,
    isParticipated: false,
  };
}

function quietLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function setup(options: { baseScreen?: boolean } = {}) {
  const store = new MemoryThreadStore();
  store.addRoom({ roomId: ROOM, displayName: 'Design' });
  store.setThreads(ROOM, [makeThread('$a'), makeThread('$b')]);

  const router = new NavigationRouter();
  const base: Screen = { id: 'room', kind: 'room' };
  if (options.baseScreen) {
    router.setRootModule(base);
  }

  const logger = quietLogger();
  const coordinator = new ThreadsCoordinator({
    roomId: ROOM,
    router,
    store,
    rooms: store,
    users: store,
    formatter: new PlainMessageFormatter(),
    logger,
  });

  return { store, router, base, coordinator, logger };
}

async function startAndSelect(ctx: ReturnType<typeof setup>, index: number) {
  await ctx.coordinator.start();
  ctx.coordinator.threadListScreen?.engine.selectThreadAt(index);
}

describe('ThreadsCoordinator', () => {
  describe('start', () => {
    it('sets the thread list as root on an empty router and loads it', async () => {
      const { coordinator, router } = setup();

      await coordinator.start();

      const list = coordinator.threadListScreen;
      expect(router.modules).toEqual([list]);
      expect(list?.id).toBe(`thread-list:${ROOM}`);
      expect(list?.engine.viewState.type).toBe('loaded');
      expect(list?.engine.numberOfThreads).toBe(2);
    });

    it('pushes the thread list above an existing screen', async () => {
      const { coordinator, router, base } = setup({ baseScreen: true });

      await coordinator.start();

      expect(router.modules).toEqual([base, coordinator.threadListScreen]);
    });

    it('only starts once', async () => {
      const { coordinator, router, logger } = setup();

      await coordinator.start();
      await coordinator.start();

      expect(router.modules).toHaveLength(1);
      expect(coordinator.childScreens).toHaveLength(1);
      expect(logger.warn).toHaveBeenCalledWith('Coordinator already started', { roomId: ROOM });
    });
  });

  describe('thread selection', () => {
    it('pushes a thread screen for the selected thread', async () => {
      const ctx = setup({ baseScreen: true });
      const selected = vi.fn();
      ctx.coordinator.on('threadSelected', selected);

      await startAndSelect(ctx, 1);

      const top = ctx.router.topModule;
      expect(top).toBeInstanceOf(ThreadScreen);
      expect(top).toBe(ctx.coordinator.selectedThreadScreen);
      expect(top instanceof ThreadScreen ? top.threadId : undefined).toBe('$b');
      expect(top?.id).toBe('thread:$b');
      expect(selected).toHaveBeenCalledWith({ threadId: '$b' });
      expect(ctx.coordinator.childScreens).toHaveLength(2);
    });

    it('uses the provided thread screen factory', async () => {
      const ctx = setup();
      const createThreadScreen = vi.fn((params: { threadId: string }): Screen => ({
        id: `custom:${params.threadId}`,
        kind: 'thread',
      }));
      const coordinator = new ThreadsCoordinator({
        roomId: ROOM,
        router: ctx.router,
        store: ctx.store,
        rooms: ctx.store,
        users: ctx.store,
        formatter: new PlainMessageFormatter(),
        createThreadScreen,
        logger: quietLogger(),
      });

      await coordinator.start();
      coordinator.threadListScreen?.engine.selectThreadAt(0);

      expect(createThreadScreen).toHaveBeenCalledWith(expect.objectContaining({ roomId: ROOM, threadId: '$a' }));
      expect(ctx.router.topModule?.id).toBe('custom:$a');
    });

    it('forwards room selection from a thread screen', async () => {
      const ctx = setup();
      const selectRoom = vi.fn();
      ctx.coordinator.on('selectRoom', selectRoom);

      await startAndSelect(ctx, 0);
      const top = ctx.router.topModule;
      if (top instanceof ThreadScreen) {
        top.selectRoom('!other:example.org', '$event');
      }

      expect(selectRoom).toHaveBeenCalledWith({ roomId: '!other:example.org', eventId: '$event' });
    });

    it('clears the selection when the thread screen is popped', async () => {
      const ctx = setup();

      await startAndSelect(ctx, 0);
      ctx.router.popModule();

      expect(ctx.coordinator.selectedThreadScreen).toBeUndefined();
      expect(ctx.coordinator.childScreens).toEqual([ctx.coordinator.threadListScreen]);
    });
  });

  describe('stop', () => {
    it('pops back below the thread list when a thread is open', async () => {
      const ctx = setup({ baseScreen: true });
      await startAndSelect(ctx, 0);
      const engine = ctx.coordinator.threadListScreen?.engine;

      ctx.coordinator.stop();

      expect(ctx.router.modules).toEqual([ctx.base]);
      expect(ctx.coordinator.selectedThreadScreen).toBeUndefined();
      expect(ctx.coordinator.childScreens).toEqual([]);
      expect(engine?.isDisposed).toBe(true);
      expect(ctx.store.subscriberCount).toBe(0);
    });

    it('does nothing with an open thread but fewer than three modules', async () => {
      const ctx = setup();
      await startAndSelect(ctx, 0);

      ctx.coordinator.stop();

      expect(ctx.router.modules).toHaveLength(2);
    });

    it('pops the thread list when no thread is open', async () => {
      const ctx = setup({ baseScreen: true });
      await ctx.coordinator.start();

      ctx.coordinator.stop();

      expect(ctx.router.modules).toEqual([ctx.base]);
      expect(ctx.coordinator.threadListScreen).toBeUndefined();
      expect(ctx.store.subscriberCount).toBe(0);
    });
  });

  describe('list intents', () => {
    it('emits complete when the list is cancelled', async () => {
      const { coordinator } = setup();
      const complete = vi.fn();
      coordinator.on('complete', complete);

      await coordinator.start();
      await coordinator.threadListScreen?.engine.process({ type: 'cancel' });

      expect(complete).toHaveBeenCalledTimes(1);
    });

    it('emits threadsLoaded when the list completes', async () => {
      const { coordinator } = setup();
      const loaded = vi.fn();
      coordinator.on('threadsLoaded', loaded);

      await coordinator.start();
      await coordinator.threadListScreen?.engine.process({ type: 'complete' });

      expect(loaded).toHaveBeenCalledTimes(1);
    });

    it('emits dismissedInteractively', () => {
      const { coordinator } = setup();
      const dismissed = vi.fn();
      coordinator.on('dismissedInteractively', dismissed);

      coordinator.handleInteractiveDismiss();

      expect(dismissed).toHaveBeenCalledTimes(1);
    });
  });

  describe('dispose', () => {
    it('detaches from the router and disposes child screens', async () => {
      const ctx = setup();
      await startAndSelect(ctx, 0);
      const engine = ctx.coordinator.threadListScreen?.engine;

      ctx.coordinator.dispose();

      expect(ctx.router.listenerCount(NavigationRouter.didPopModule)).toBe(0);
      expect(ctx.coordinator.childScreens).toEqual([]);
      expect(engine?.isDisposed).toBe(true);
      expect(ctx.store.subscriberCount).toBe(0);
    });
  });
});
