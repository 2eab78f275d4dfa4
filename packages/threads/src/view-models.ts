/**
 * Builders for the display models the thread list hands to its renderer.
 */

import type { Logger } from '@threadline/utils/logger';
import type { EmptyStateCopy } from '@threadline/config';
import type { UserDirectory } from './collaborators.js';
import type { FormatResult, MessageFormatter } from './formatter.js';
import type {
  AvatarViewData,
  FilterType,
  RoomState,
  RoomSummary,
  RoomTitleViewModel,
  Thread,
  ThreadListEmptyViewModel,
  ThreadMessage,
  ThreadViewModel,
} from './types.js';

export const EMPTY_ROOM_TITLE: RoomTitleViewModel = Object.freeze({});

const SIGILS = new Set(['@', '#', '!', '+']);

export function fallbackInitial(itemId: string, displayName?: string): string {
  const source = displayName?.trim() || itemId;
  const chars = Array.from(source);
  const first = chars.length > 1 && SIGILS.has(chars[0]) ? chars[1] : chars[0];
  return first ? first.toUpperCase() : '';
}

export function buildAvatar(itemId: string, displayName?: string, avatarUrl?: string): AvatarViewData {
  return {
    itemId,
    displayName,
    avatarUrl,
    fallbackInitial: fallbackInitial(itemId, displayName),
  };
}

export function buildEmptyViewModel(filterType: FilterType, copy: EmptyStateCopy): ThreadListEmptyViewModel {
  const all = filterType === 'all';
  return {
    reason: all ? 'noThreads' : 'noParticipatedThreads',
    title: copy.title,
    info: all ? copy.infoAll : copy.infoMine,
    tip: copy.tip,
    showAllThreadsButtonTitle: copy.showAllThreadsButtonTitle,
    // Offering "show all" only makes sense while a narrower filter is active
    showAllThreadsButtonHidden: all,
  };
}

export function buildRoomTitleViewModel(room: RoomSummary | undefined): RoomTitleViewModel {
  if (!room) {
    return EMPTY_ROOM_TITLE;
  }
  return {
    roomAvatar: buildAvatar(room.roomId, room.displayName, room.avatarUrl),
    roomDisplayName: room.displayName,
    encryptionBadge: room.encryptionTrust,
  };
}

export interface RowContext {
  users: UserDirectory;
  /** Absent until the room is known; rows are then built without text */
  formatter?: MessageFormatter;
  roomState?: RoomState;
  log?: Logger;
}

function textOf(result: () => FormatResult, message: ThreadMessage, log?: Logger): string | undefined {
  try {
    const outcome = result();
    if (outcome.kind === 'formatted') {
      return outcome.text;
    }
    log?.debug('Message text unavailable', { eventId: message.eventId, reason: outcome.reason });
  } catch (err) {
    log?.debug('Formatter failed', {
      eventId: message.eventId,
      error: err instanceof Error ? err.message : String(err),
    });
  }
  return undefined;
}

function senderAvatar(message: ThreadMessage | undefined, users: UserDirectory): AvatarViewData | undefined {
  if (!message?.sender) {
    return undefined;
  }
  const profile = users.user(message.sender);
  return buildAvatar(message.sender, profile?.displayName, profile?.avatarUrl);
}

export function buildThreadViewModel(thread: Thread, ctx: RowContext): ThreadViewModel {
  const { rootMessage, lastMessage } = thread;
  const { formatter, roomState, log } = ctx;

  const rootAvatar = senderAvatar(rootMessage, ctx.users);
  const lastAvatar = senderAvatar(lastMessage, ctx.users);

  const rootMessageText = rootMessage && formatter
    ? textOf(() => formatter.format(rootMessage, roomState), rootMessage, log)
    : undefined;
  const lastMessageText = lastMessage && formatter
    ? textOf(() => formatter.format(lastMessage, roomState), lastMessage, log)
    : undefined;
  const lastMessageTime = lastMessage && formatter
    ? textOf(() => formatter.formatTime(lastMessage), lastMessage, log)
    : undefined;

  return {
    threadId: thread.id,
    rootMessageSenderUserId: rootAvatar?.itemId,
    rootMessageSenderAvatar: rootAvatar,
    rootMessageSenderDisplayName: rootAvatar?.displayName,
    rootMessageText,
    lastMessageTime,
    summary: {
      numberOfReplies: thread.numberOfReplies,
      lastMessageSenderAvatar: lastAvatar,
      lastMessageText,
    },
  };
}
