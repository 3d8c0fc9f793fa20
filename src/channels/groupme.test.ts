import { describe, expect, it, vi } from 'vitest';
import { GROUPME_POST_URL, GroupMeReplySender, parseGroupMeCallback } from './groupme.js';

describe('parseGroupMeCallback', () => {
  it('normalizes a user message with mentions', () => {
    const payload = {
      attachments: [{ type: 'mentions', user_ids: ['24680'], loci: [[0, 10]] }],
      avatar_url: null,
      group_id: '123',
      id: '171234567890123',
      name: 'Sam',
      sender_type: 'user',
      text: '@PirateBot add mod @Jess',
      user_id: '1001',
    };

    expect(parseGroupMeCallback(payload)).toEqual({
      text: '@PirateBot add mod @Jess',
      senderName: 'Sam',
      userId: '1001',
      senderType: 'user',
      attachments: [{ type: 'mentions', userIds: ['24680'], loci: [[0, 10]] }],
    });
  });

  it('keeps bot messages so the handler can skip them', () => {
    const msg = parseGroupMeCallback({ text: 'Go team', name: 'PirateBot', user_id: '2002', sender_type: 'bot' });
    expect(msg?.senderType).toBe('bot');
    expect(msg?.attachments).toEqual([]);
  });

  it('fills in missing attachment fields and drops untyped ones', () => {
    const msg = parseGroupMeCallback({
      text: 'pic',
      name: 'Sam',
      user_id: 1001,
      sender_type: 'user',
      attachments: [{ type: 'image', url: 'https://example.com/a.png' }, { user_ids: ['1'] }, 'junk'],
    });
    expect(msg?.userId).toBe('1001');
    expect(msg?.attachments).toEqual([{ type: 'image', userIds: [], loci: [] }]);
  });

  it('returns null for malformed payloads', () => {
    expect(parseGroupMeCallback(null)).toBeNull();
    expect(parseGroupMeCallback('hello')).toBeNull();
    expect(parseGroupMeCallback({ text: 'hi', name: 'Sam', sender_type: 'user' })).toBeNull();
    expect(parseGroupMeCallback({ text: 'hi', name: 'Sam', user_id: '1', sender_type: 'robot' })).toBeNull();
    expect(parseGroupMeCallback({ name: 'Sam', user_id: '1', sender_type: 'user' })).toBeNull();
  });
});

describe('GroupMeReplySender', () => {
  it('posts the bot id and text', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 202 }));
    const sender = new GroupMeReplySender('test-bot-id', fetchMock);

    await sender.sendMessage('⚾ Next game is Saturday');

    expect(fetchMock).toHaveBeenCalledWith(GROUPME_POST_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ bot_id: 'test-bot-id', text: '⚾ Next game is Saturday' }),
    });
  });

  it('throws with status and body on failure', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('bad bot id', { status: 400 }));
    const sender = new GroupMeReplySender('test-bot-id', fetchMock);

    await expect(sender.sendMessage('hi')).rejects.toThrow('GroupMe post failed: 400 bad bot id');
  });

  it('requires a bot id', () => {
    expect(() => new GroupMeReplySender('')).toThrow('GroupMe bot id is required to send messages');
  });
});
