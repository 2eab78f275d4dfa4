import type { RoomState, ThreadMessage } from './types.js';

export type FormatResult =
  | { kind: 'formatted'; text: string }
  | { kind: 'unavailable'; reason: string };

export interface MessageFormatter {
  format(message: ThreadMessage, roomState?: RoomState): FormatResult;
  /** Date string including the time of day */
  formatTime(message: ThreadMessage): FormatResult;
}

export const formatted = (text: string): FormatResult => ({ kind: 'formatted', text });
export const unavailable = (reason: string): FormatResult => ({ kind: 'unavailable', reason });

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

function isSameUtcDay(a: Date, b: Date): boolean {
  return a.getUTCFullYear() === b.getUTCFullYear()
    && a.getUTCMonth() === b.getUTCMonth()
    && a.getUTCDate() === b.getUTCDate();
}

export interface PlainMessageFormatterOptions {
  /** Clock used to decide whether a timestamp is from today (default: Date.now) */
  now?: () => number;
}

/**
 * Plain-text formatter for thread rows. Times are rendered in UTC:
 * `HH:mm` for today, `MMM d, HH:mm` otherwise.
 */
export class PlainMessageFormatter implements MessageFormatter {
  private now: () => number;

  constructor(options: PlainMessageFormatterOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  format(message: ThreadMessage, roomState?: RoomState): FormatResult {
    if (message.redacted) {
      return formatted('Message deleted');
    }

    switch (message.msgtype) {
      case 'emote': {
        const member = message.sender ? roomState?.members[message.sender] : undefined;
        const name = member?.displayName ?? message.sender ?? 'Someone';
        return formatted(`* ${name} ${message.body.trim()}`);
      }
      case 'image':
        return formatted('sent an image.');
      case 'file':
        return formatted('sent a file.');
      default: {
        const body = message.body.trim();
        return body ? formatted(body) : unavailable(`empty body for ${message.eventId}`);
      }
    }
  }

  formatTime(message: ThreadMessage): FormatResult {
    const date = new Date(message.timestamp);
    if (Number.isNaN(date.getTime())) {
      return unavailable(`invalid timestamp for ${message.eventId}`);
    }
    const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
    if (isSameUtcDay(date, new Date(this.now()))) {
      return formatted(time);
    }
    return formatted(`${MONTHS[date.getUTCMonth()]} ${date.getUTCDate()}, ${time}`);
  }
}
