import type { FetchOptions, RoomDirectory, Subscription, ThreadStore, UserDirectory } from './collaborators.js';
import type { RoomState, RoomSummary, Thread, UserProfile } from './types.js';

/**
 * In-process thread store, room and user directory.
 * Useful for testing and for hosts without a messaging SDK.
 */
export class MemoryThreadStore implements ThreadStore, RoomDirectory, UserDirectory {
  private threadsByRoom = new Map<string, Thread[]>();
  private rooms = new Map<string, RoomSummary>();
  private roomStates = new Map<string, RoomState>();
  private users = new Map<string, UserProfile>();
  private listeners = new Set<{ listener: () => void }>();
  private pendingFailure?: Error;

  get subscriberCount(): number {
    return this.listeners.size;
  }

  addRoom(summary: RoomSummary, state?: RoomState): void {
    this.rooms.set(summary.roomId, summary);
    if (state) {
      this.roomStates.set(summary.roomId, state);
    }
  }

  addUser(profile: UserProfile): void {
    this.users.set(profile.userId, profile);
  }

  /** Replace the threads of a room and notify subscribers */
  setThreads(roomId: string, threads: Thread[]): void {
    this.threadsByRoom.set(roomId, [...threads]);
    this.notify();
  }

  /** Make the next thread fetch reject with the given error */
  failNextFetch(error: Error): void {
    this.pendingFailure = error;
  }

  notify(): void {
    for (const entry of [...this.listeners]) {
      entry.listener();
    }
  }

  async threads(roomId: string, options?: FetchOptions): Promise<Thread[]> {
    return this.fetch(roomId, options);
  }

  async participatedThreads(roomId: string, options?: FetchOptions): Promise<Thread[]> {
    const threads = await this.fetch(roomId, options);
    return threads.filter((thread) => thread.isParticipated);
  }

  subscribe(listener: () => void): Subscription {
    // Wrapped so the same function can hold independent subscriptions
    const entry = { listener };
    this.listeners.add(entry);
    return {
      unsubscribe: () => {
        this.listeners.delete(entry);
      },
    };
  }

  room(roomId: string): RoomSummary | undefined {
    return this.rooms.get(roomId);
  }

  async roomState(roomId: string, options?: FetchOptions): Promise<RoomState | undefined> {
    options?.signal?.throwIfAborted();
    return this.roomStates.get(roomId);
  }

  user(userId: string): UserProfile | undefined {
    return this.users.get(userId);
  }

  private async fetch(roomId: string, options?: FetchOptions): Promise<Thread[]> {
    options?.signal?.throwIfAborted();
    const failure = this.pendingFailure;
    if (failure) {
      this.pendingFailure = undefined;
      throw failure;
    }
    return [...(this.threadsByRoom.get(roomId) ?? [])];
  }
}
