import type { FilterTypeConfig } from '@threadline/config';

export type FilterType = FilterTypeConfig;

export type MessageType = 'text' | 'notice' | 'emote' | 'image' | 'file' | 'unknown';

export interface ThreadMessage {
  eventId: string;
  /** Sender user id; absent for events the store could not attribute */
  sender?: string;
  msgtype: MessageType;
  body: string;
  /** Origin server timestamp (epoch ms) */
  timestamp: number;
  redacted?: boolean;
}

/**
 * Snapshot of a thread as handed out by the thread store.
 * A freshly created thread may not have its root or last message yet.
 */
export interface Thread {
  readonly id: string;
  readonly roomId: string;
  readonly rootMessage?: Readonly<ThreadMessage>;
  readonly lastMessage?: Readonly<ThreadMessage>;
  readonly numberOfReplies: number;
  /** Whether the current user sent the root or a reply */
  readonly isParticipated: boolean;
}

export interface UserProfile {
  userId: string;
  displayName?: string;
  avatarUrl?: string;
}

export type EncryptionBadge = 'trusted' | 'warning' | 'normal';

export interface RoomSummary {
  roomId: string;
  displayName: string;
  avatarUrl?: string;
  /** Present only for encrypted rooms */
  encryptionTrust?: EncryptionBadge;
}

/** Room state needed to format events (member display names) */
export interface RoomState {
  roomId: string;
  members: Record<string, { displayName?: string }>;
}

export interface AvatarViewData {
  itemId: string;
  displayName?: string;
  avatarUrl?: string;
  /** Letter rendered when there is no avatar image */
  fallbackInitial: string;
}

export interface ThreadSummaryViewModel {
  numberOfReplies: number;
  lastMessageSenderAvatar?: AvatarViewData;
  lastMessageText?: string;
}

/** Display-ready projection of one thread for one render pass */
export interface ThreadViewModel {
  threadId: string;
  rootMessageSenderUserId?: string;
  rootMessageSenderAvatar?: AvatarViewData;
  rootMessageSenderDisplayName?: string;
  rootMessageText?: string;
  lastMessageTime?: string;
  summary: ThreadSummaryViewModel;
}

export type EmptyReason = 'noThreads' | 'noParticipatedThreads';

export interface ThreadListEmptyViewModel {
  reason: EmptyReason;
  title: string;
  info: string;
  tip: string;
  showAllThreadsButtonTitle: string;
  showAllThreadsButtonHidden: boolean;
}

export interface RoomTitleViewModel {
  roomAvatar?: AvatarViewData;
  roomDisplayName?: string;
  encryptionBadge?: EncryptionBadge;
}

export type ThreadListViewState =
  | { type: 'idle' }
  | { type: 'loading' }
  | { type: 'loaded'; rows: readonly ThreadViewModel[] }
  | { type: 'empty'; emptyViewModel: ThreadListEmptyViewModel }
  | { type: 'showingFilterOptions' };

export type ThreadListViewAction =
  | { type: 'loadData' }
  | { type: 'complete' }
  | { type: 'showFilterTypes' }
  | { type: 'selectFilterType'; filterType: FilterType }
  | { type: 'selectThread'; index: number }
  | { type: 'cancel' };
