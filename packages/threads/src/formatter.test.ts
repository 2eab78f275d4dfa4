import { describe, it, expect } from 'vitest';
import { PlainMessageFormatter } from './formatter.js';
import type { RoomState, ThreadMessage } from './types.js';

const NOW = Date.UTC(2026, 2, 5, 18, 0);

function message(overrides: Partial<ThreadMessage> = {}): ThreadMessage {
  return {
    eventId: '$event',
    sender: '@alice:example.org',
    msgtype: 'text',
    body: 'Hello there',
    timestamp: Date.UTC(2026, 2, 5, 14, 7),
    ...overrides,
  };
}

describe('PlainMessageFormatter', () => {
  const formatter = new PlainMessageFormatter({ now: () => NOW });
  const roomState: RoomState = {
    roomId: '!room:example.org',
    members: { '@alice:example.org': { displayName: 'Alice' } },
  };

  describe('format', () => {
    it('returns the trimmed body for text messages', () => {
      expect(formatter.format(message({ body: '  Hello there \n' }))).toEqual({ kind: 'formatted', text: 'Hello there' });
    });

    it('uses the member display name for emotes', () => {
      expect(formatter.format(message({ msgtype: 'emote', body: 'waves' }), roomState))
        .toEqual({ kind: 'formatted', text: '* Alice waves' });
    });

    it('falls back to the sender id for emotes without room state', () => {
      expect(formatter.format(message({ msgtype: 'emote', body: 'waves' })))
        .toEqual({ kind: 'formatted', text: '* @alice:example.org waves' });
    });

    it('describes media messages', () => {
      expect(formatter.format(message({ msgtype: 'image' }))).toEqual({ kind: 'formatted', text: 'sent an image.' });
      expect(formatter.format(message({ msgtype: 'file' }))).toEqual({ kind: 'formatted', text: 'sent a file.' });
    });

    it('renders redacted messages as deleted', () => {
      expect(formatter.format(message({ redacted: true }))).toEqual({ kind: 'formatted', text: 'Message deleted' });
    });

    it('reports an empty body as unavailable', () => {
      expect(formatter.format(message({ body: '   ' }))).toEqual({
        kind: 'unavailable',
        reason: 'empty body for $event',
      });
    });
  });

  describe('formatTime', () => {
    it('shows only the time for messages from today', () => {
      expect(formatter.formatTime(message())).toEqual({ kind: 'formatted', text: '14:07' });
    });

    it('prefixes the date for older messages', () => {
      expect(formatter.formatTime(message({ timestamp: Date.UTC(2026, 0, 9, 8, 5) })))
        .toEqual({ kind: 'formatted', text: 'Jan 9, 08:05' });
    });

    it('reports invalid timestamps as unavailable', () => {
      expect(formatter.formatTime(message({ timestamp: Number.NaN })).kind).toBe('unavailable');
    });

    it('reports timestamps outside the date range as unavailable', () => {
      expect(formatter.formatTime(message({ timestamp: 1e16 }))).toEqual({
        kind: 'unavailable',
        reason: 'invalid timestamp for $event',
      });
    });
  });
});
