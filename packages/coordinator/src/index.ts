export { ScreenArena } from './screen-arena.js';
export { NavigationRouter } from './navigation-router.js';
export {
  ThreadListScreen,
  ThreadScreen,
  createDefaultThreadScreen,
  type Screen,
  type ScreenKind,
  type ThreadScreenFactory,
  type ThreadScreenParams,
} from './screens.js';
export { ThreadsCoordinator, type ThreadsCoordinatorParams } from './threads-coordinator.js';
