/**
 * @threadline/threads
 *
 * Thread list view model for a room: filtering, row assembly and the
 * view-state machine the renderer follows.
 *
 * ```typescript
 * import { ThreadListEngine, PlainMessageFormatter, MemoryThreadStore } from '@threadline/threads';
 *
 * const store = new MemoryThreadStore();
 * const engine = new ThreadListEngine({
 *   roomId: '!room:example.org',
 *   store,
 *   rooms: store,
 *   users: store,
 *   formatter: new PlainMessageFormatter(),
 * });
 * engine.setViewDelegate((state) => render(state));
 * await engine.process({ type: 'loadData' });
 * ```
 */

export {
  ThreadListEngine,
  withThreadListEngine,
  type ThreadListEngineParams,
  type NavigationHandoff,
  type ThreadListViewDelegate,
  type ThreadListState,
} from './engine.js';

export {
  PlainMessageFormatter,
  formatted,
  unavailable,
  type MessageFormatter,
  type FormatResult,
  type PlainMessageFormatterOptions,
} from './formatter.js';

export {
  EMPTY_ROOM_TITLE,
  buildAvatar,
  buildEmptyViewModel,
  buildRoomTitleViewModel,
  buildThreadViewModel,
  fallbackInitial,
  type RowContext,
} from './view-models.js';

export { MemoryThreadStore } from './memory-store.js';

export type {
  FetchOptions,
  Subscription,
  ThreadStore,
  RoomDirectory,
  UserDirectory,
} from './collaborators.js';

export type * from './types.js';
