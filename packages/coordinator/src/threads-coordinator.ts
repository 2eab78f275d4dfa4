/**
 * Threads Coordinator
 *
 * Presents the thread list of a room and the thread timelines opened from
 * it. Child screens are tracked in a ScreenArena under the coordinator's own
 * entry; the router stack is only consulted to find where to pop back to.
 *
 * Events:
 * - `threadsLoaded`: the list reported it finished loading
 * - `threadSelected` ({ threadId }): a thread screen was pushed
 * - `complete`: the user cancelled the list
 * - `selectRoom` ({ roomId, eventId }): a thread asked to open a room
 * - `dismissedInteractively`: the presentation was swiped away
 */

import { EventEmitter } from 'events';
import type { ThreadListConfig } from '@threadline/config';
import {
  ThreadListEngine,
  type MessageFormatter,
  type NavigationHandoff,
  type RoomDirectory,
  type Thread,
  type ThreadStore,
  type UserDirectory,
} from '@threadline/threads';
import { createLogger, type Logger } from '@threadline/utils/logger';
import { NavigationRouter } from './navigation-router.js';
import { ScreenArena } from './screen-arena.js';
import {
  ThreadListScreen,
  createDefaultThreadScreen,
  type Screen,
  type ThreadScreenFactory,
} from './screens.js';

export interface ThreadsCoordinatorParams {
  roomId: string;
  router: NavigationRouter;
  store: ThreadStore;
  rooms: RoomDirectory;
  users: UserDirectory;
  formatter: MessageFormatter;
  config?: ThreadListConfig;
  createThreadScreen?: ThreadScreenFactory;
  logger?: Logger;
}

type ArenaNode =
  | { kind: 'coordinator'; roomId: string }
  | { kind: 'screen'; screen: Screen };

export class ThreadsCoordinator extends EventEmitter implements NavigationHandoff {
  private params: ThreadsCoordinatorParams;
  private log: Logger;
  private arena = new ScreenArena<ArenaNode>();
  private rootIndex: number;
  private listIndex: number | null = null;
  private selectedThreadIndex: number | null = null;
  private started = false;
  private createThreadScreen: ThreadScreenFactory;

  constructor(params: ThreadsCoordinatorParams) {
    super();
    this.params = params;
    this.log = params.logger ?? createLogger('threads-coordinator');
    this.createThreadScreen = params.createThreadScreen ?? createDefaultThreadScreen;
    this.rootIndex = this.arena.add({ kind: 'coordinator', roomId: params.roomId });
    this.params.router.on(NavigationRouter.didPopModule, this.handleDidPopModule);
  }

  private get router(): NavigationRouter {
    return this.params.router;
  }

  /** Live child screens, in the order they were added */
  get childScreens(): Screen[] {
    return this.arena.childrenOf(this.rootIndex).flatMap((index) => {
      const node = this.arena.get(index);
      return node.kind === 'screen' ? [node.screen] : [];
    });
  }

  get selectedThreadScreen(): Screen | undefined {
    return this.selectedThreadIndex === null ? undefined : this.screenAt(this.selectedThreadIndex);
  }

  get threadListScreen(): ThreadListScreen | undefined {
    if (this.listIndex === null) return undefined;
    const screen = this.screenAt(this.listIndex);
    return screen instanceof ThreadListScreen ? screen : undefined;
  }

  /**
   * Create the thread list, present it (as root when the router is empty)
   * and load its data.
   */
  async start(): Promise<void> {
    if (this.started) {
      this.log.warn('Coordinator already started', { roomId: this.params.roomId });
      return;
    }
    this.started = true;

    const { roomId, store, rooms, users, formatter, config } = this.params;
    const engine = new ThreadListEngine({ roomId, store, rooms, users, formatter, config, logger: this.params.logger });
    engine.setNavigationHandoff(this);

    const screen = new ThreadListScreen(`thread-list:${roomId}`, engine);
    const index = this.arena.add({ kind: 'screen', screen }, this.rootIndex);
    this.listIndex = index;
    const onPop = () => this.removeChild(index);

    if (this.router.modules.length > 0) {
      this.router.push(screen, onPop);
    } else {
      this.router.setRootModule(screen, onPop);
    }

    await screen.start();
  }

  /** Leave the threads flow, including an open thread */
  stop(): void {
    if (this.selectedThreadIndex !== null) {
      const modules = this.router.modules;
      if (modules.length < 3) {
        return;
      }
      this.router.popToModule(modules[modules.length - 3]);
    } else {
      this.router.popModule();
    }
  }

  handleInteractiveDismiss(): void {
    this.emit('dismissedInteractively');
  }

  /** Detach from the router and dispose every child screen */
  dispose(): void {
    this.router.off(NavigationRouter.didPopModule, this.handleDidPopModule);
    for (const index of this.arena.childrenOf(this.rootIndex)) {
      this.removeChild(index);
    }
    this.selectedThreadIndex = null;
    this.listIndex = null;
  }

  // NavigationHandoff

  threadListDidLoadThreads(_engine: ThreadListEngine): void {
    this.emit('threadsLoaded');
  }

  threadListDidSelectThread(_engine: ThreadListEngine, thread: Thread): void {
    const screen = this.createThreadScreen({
      roomId: this.params.roomId,
      threadId: thread.id,
      selectRoom: (roomId, eventId) => this.emit('selectRoom', { roomId, eventId }),
    });
    this.selectedThreadIndex = this.arena.add({ kind: 'screen', screen }, this.rootIndex);
    this.router.push(screen);
    this.emit('threadSelected', { threadId: thread.id });
  }

  threadListDidCancel(_engine: ThreadListEngine): void {
    this.emit('complete');
  }

  private handleDidPopModule = (screen: Screen): void => {
    // The thread list removes itself through its pop completion
    const index = this.arena.findIndex((node) => node.kind === 'screen' && node.screen === screen);
    if (index === -1 || index === this.listIndex) return;

    if (index === this.selectedThreadIndex) {
      this.selectedThreadIndex = null;
    }
    this.removeChild(index);
  };

  private screenAt(index: number): Screen | undefined {
    if (!this.arena.has(index)) return undefined;
    const node = this.arena.get(index);
    return node.kind === 'screen' ? node.screen : undefined;
  }

  private removeChild(index: number): void {
    if (!this.arena.has(index)) return;
    if (index === this.listIndex) {
      this.listIndex = null;
    }
    for (const node of this.arena.remove(index)) {
      if (node.kind === 'screen') {
        node.screen.dispose?.();
      }
    }
  }
}
