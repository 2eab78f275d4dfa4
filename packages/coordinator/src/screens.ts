import type { ThreadListEngine } from '@threadline/threads';

export type ScreenKind = 'room' | 'thread-list' | 'thread';

/** Something the navigation router can present */
export interface Screen {
  readonly id: string;
  readonly kind: ScreenKind;
  dispose?(): void;
}

/** Thread list screen; owns its engine and disposes it when torn down */
export class ThreadListScreen implements Screen {
  readonly kind = 'thread-list';

  constructor(readonly id: string, readonly engine: ThreadListEngine) {}

  start(): Promise<void> {
    return this.engine.process({ type: 'loadData' });
  }

  dispose(): void {
    this.engine.dispose();
  }
}

export interface ThreadScreenParams {
  roomId: string;
  threadId: string;
  /** Called when the thread timeline asks to jump to a room (e.g. a permalink) */
  selectRoom: (roomId: string, eventId?: string) => void;
}

export type ThreadScreenFactory = (params: ThreadScreenParams) => Screen;

/** Thread timeline placeholder; rendering belongs to the host */
export class ThreadScreen implements Screen {
  readonly kind = 'thread';
  readonly id: string;

  constructor(private params: ThreadScreenParams) {
    this.id = `thread:${params.threadId}`;
  }

  get roomId(): string {
    return this.params.roomId;
  }

  get threadId(): string {
    return this.params.threadId;
  }

  selectRoom(roomId: string, eventId?: string): void {
    this.params.selectRoom(roomId, eventId);
  }
}

export const createDefaultThreadScreen: ThreadScreenFactory = (params) => new ThreadScreen(params);
