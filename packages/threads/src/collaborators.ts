/**
 * Contracts for the messaging SDK pieces the thread list consumes.
 * Implementations live outside this package; MemoryThreadStore covers tests.
 */

import type { RoomState, RoomSummary, Thread, UserProfile } from './types.js';

export interface FetchOptions {
  signal?: AbortSignal;
}

/** Handle returned by a subscription; calling unsubscribe more than once is harmless */
export interface Subscription {
  unsubscribe(): void;
}

export interface ThreadStore {
  threads(roomId: string, options?: FetchOptions): Promise<Thread[]>;
  participatedThreads(roomId: string, options?: FetchOptions): Promise<Thread[]>;
  subscribe(listener: () => void): Subscription;
}

export interface RoomDirectory {
  room(roomId: string): RoomSummary | undefined;
  roomState(roomId: string, options?: FetchOptions): Promise<RoomState | undefined>;
}

export interface UserDirectory {
  user(userId: string): UserProfile | undefined;
}
