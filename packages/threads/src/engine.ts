/**
 * ThreadListEngine
 *
 * View model behind the threads screen of a room. Owns the filter selection
 * and the view state, fetches threads from the thread store, builds the row
 * view models and tells the navigation layer what the user picked.
 *
 * State machine:
 *   idle -> loading -> loaded | empty -> showingFilterOptions -> loading ...
 *
 * Every view-state assignment is delivered to the single view delegate.
 * Store change notifications reload without passing through `loading`.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { DEFAULT_THREAD_LIST_CONFIG, type ThreadListConfig } from '@threadline/config';
import { ThreadStoreUnavailableError } from '@threadline/utils/errors';
import { createLogger, type Logger } from '@threadline/utils/logger';
import type { RoomDirectory, Subscription, ThreadStore, UserDirectory } from './collaborators.js';
import type { MessageFormatter } from './formatter.js';
import type {
  FilterType,
  RoomState,
  RoomTitleViewModel,
  Thread,
  ThreadListViewAction,
  ThreadListViewState,
  ThreadViewModel,
} from './types.js';
import {
  buildEmptyViewModel,
  buildRoomTitleViewModel,
  buildThreadViewModel,
} from './view-models.js';

export interface ThreadListEngineParams {
  roomId: string;
  store: ThreadStore;
  rooms: RoomDirectory;
  users: UserDirectory;
  formatter: MessageFormatter;
  config?: ThreadListConfig;
  logger?: Logger;
}

/** Outbound intents for the coordinator that presented the list */
export interface NavigationHandoff {
  threadListDidLoadThreads(engine: ThreadListEngine): void;
  threadListDidSelectThread(engine: ThreadListEngine, thread: Thread): void;
  threadListDidCancel(engine: ThreadListEngine): void;
}

export type ThreadListViewDelegate = (state: ThreadListViewState) => void;

export interface ThreadListState {
  viewState: ThreadListViewState;
  filterType: FilterType;
  threads: readonly Thread[];
  rows: readonly ThreadViewModel[];
}

export class ThreadListEngine {
  readonly roomId: string;

  private store: ThreadStore;
  private rooms: RoomDirectory;
  private users: UserDirectory;
  private formatter: MessageFormatter;
  private config: ThreadListConfig;
  private log: Logger;

  private state: StoreApi<ThreadListState>;
  private storeSubscription: Subscription;
  private unsubscribeState: () => void;
  private currentOperation?: AbortController;
  private viewDelegate?: ThreadListViewDelegate;
  private handoff?: NavigationHandoff;
  private disposed = false;

  constructor(params: ThreadListEngineParams) {
    this.roomId = params.roomId;
    this.store = params.store;
    this.rooms = params.rooms;
    this.users = params.users;
    this.formatter = params.formatter;
    this.config = params.config ?? DEFAULT_THREAD_LIST_CONFIG;
    this.log = params.logger ?? createLogger('thread-list');

    this.state = createStore<ThreadListState>(() => ({
      viewState: { type: 'idle' },
      filterType: this.config.defaultFilter,
      threads: [],
      rows: [],
    }));

    this.unsubscribeState = this.state.subscribe((next, prev) => {
      if (next.viewState !== prev.viewState) {
        this.viewDelegate?.(next.viewState);
      }
    });

    // Paired with the single unsubscribe in dispose()
    this.storeSubscription = this.store.subscribe(() => {
      this.onStoreUpdated().catch((err: unknown) => {
        this.log.error('Background reload failed', {
          roomId: this.roomId,
          error: err instanceof Error ? err.message : String(err),
        });
      });
    });
  }

  get viewState(): ThreadListViewState {
    return this.state.getState().viewState;
  }

  get filterType(): FilterType {
    return this.state.getState().filterType;
  }

  get numberOfThreads(): number {
    return this.state.getState().threads.length;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get titleViewModel(): RoomTitleViewModel {
    return buildRoomTitleViewModel(this.rooms.room(this.roomId));
  }

  threadViewModel(index: number): ThreadViewModel | undefined {
    const { rows } = this.state.getState();
    if (!Number.isInteger(index) || index < 0 || index >= rows.length) {
      return undefined;
    }
    return rows[index];
  }

  /** Single subscriber; a new delegate replaces the previous one */
  setViewDelegate(delegate: ThreadListViewDelegate | undefined): void {
    this.viewDelegate = delegate;
  }

  setNavigationHandoff(handoff: NavigationHandoff | undefined): void {
    this.handoff = handoff;
  }

  async process(action: ThreadListViewAction): Promise<void> {
    switch (action.type) {
      case 'loadData':
        return this.loadData();
      case 'complete':
        this.complete();
        return;
      case 'showFilterTypes':
        this.showFilterOptions();
        return;
      case 'selectFilterType':
        return this.selectFilter(action.filterType);
      case 'selectThread':
        this.selectThreadAt(action.index);
        return;
      case 'cancel':
        this.cancel();
        return;
    }
  }

  /**
   * Fetch threads for the active filter and publish the resulting state.
   * A newer load or cancel() supersedes this one; its result is then dropped.
   */
  async loadData(showLoading = true): Promise<void> {
    if (this.guardDisposed('loadData')) return;

    this.currentOperation?.abort();
    const operation = new AbortController();
    this.currentOperation = operation;
    const { filterType } = this.state.getState();

    if (showLoading) {
      this.setViewState({ type: 'loading' });
    }

    let threads: Thread[];
    try {
      threads = filterType === 'all'
        ? await this.store.threads(this.roomId, { signal: operation.signal })
        : await this.store.participatedThreads(this.roomId, { signal: operation.signal });
    } catch (err) {
      if (operation.signal.aborted) return;
      const error = new ThreadStoreUnavailableError(this.roomId, err);
      this.log.warn('Thread fetch failed', { roomId: this.roomId, filterType, error: error.message });
      this.settle(operation);
      return;
    }
    if (operation.signal.aborted) return;

    if (threads.length === 0) {
      this.state.setState({
        threads: [],
        rows: [],
        viewState: { type: 'empty', emptyViewModel: buildEmptyViewModel(filterType, this.config.emptyState) },
      });
      this.settle(operation);
      return;
    }

    const room = this.rooms.room(this.roomId);
    const roomState = room ? await this.fetchRoomState(operation.signal) : undefined;
    if (operation.signal.aborted) return;

    const rows = threads.map((thread) =>
      buildThreadViewModel(thread, {
        users: this.users,
        formatter: room ? this.formatter : undefined,
        roomState,
        log: this.log,
      })
    );

    this.state.setState({ threads, rows, viewState: { type: 'loaded', rows } });
    this.log.debug('Threads loaded', { roomId: this.roomId, filterType, count: rows.length });
    this.settle(operation);
  }

  /**
   * Reselecting the active filter still reloads. Threads fetched for the
   * previous filter are dropped together with the filter change.
   */
  async selectFilter(type: FilterType): Promise<void> {
    if (this.guardDisposed('selectFilter')) return;
    this.state.setState({ filterType: type, threads: [], rows: [] });
    return this.loadData(true);
  }

  showFilterOptions(): void {
    if (this.guardDisposed('showFilterOptions')) return;
    this.setViewState({ type: 'showingFilterOptions' });
  }

  selectThreadAt(index: number): void {
    if (this.guardDisposed('selectThreadAt')) return;
    const { threads } = this.state.getState();
    if (!Number.isInteger(index) || index < 0 || index >= threads.length) {
      return;
    }
    this.handoff?.threadListDidSelectThread(this, threads[index]);
  }

  complete(): void {
    if (this.guardDisposed('complete')) return;
    this.handoff?.threadListDidLoadThreads(this);
  }

  cancel(): void {
    if (this.guardDisposed('cancel')) return;
    this.cancelOperations();
    this.handoff?.threadListDidCancel(this);
  }

  onStoreUpdated(): Promise<void> {
    return this.loadData(false);
  }

  /** Unsubscribe from the store and drop any in-flight fetch. Idempotent. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.cancelOperations();
    this.storeSubscription.unsubscribe();
    this.unsubscribeState();
    this.viewDelegate = undefined;
    this.handoff = undefined;
  }

  private setViewState(viewState: ThreadListViewState): void {
    this.state.setState({ viewState });
  }

  private async fetchRoomState(signal: AbortSignal): Promise<RoomState | undefined> {
    try {
      return await this.rooms.roomState(this.roomId, { signal });
    } catch (err) {
      if (!signal.aborted) {
        this.log.debug('Room state unavailable, formatting without it', {
          roomId: this.roomId,
          error: err instanceof Error ? err.message : String(err),
        });
      }
      return undefined;
    }
  }

  private settle(operation: AbortController): void {
    if (this.currentOperation === operation) {
      this.currentOperation = undefined;
    }
  }

  private cancelOperations(): void {
    this.currentOperation?.abort();
    this.currentOperation = undefined;
  }

  private guardDisposed(operation: string): boolean {
    if (this.disposed) {
      this.log.debug('Ignoring call on disposed thread list', { operation, roomId: this.roomId });
    }
    return this.disposed;
  }
}

/**
 * Run `fn` with a fresh engine and dispose it on every exit path.
 */
export async function withThreadListEngine<T>(
  params: ThreadListEngineParams,
  fn: (engine: ThreadListEngine) => T | Promise<T>
): Promise<T> {
  const engine = new ThreadListEngine(params);
  try {
    return await fn(engine);
  } finally {
    engine.dispose();
  }
}
