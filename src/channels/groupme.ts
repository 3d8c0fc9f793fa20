/**
 * GroupMe Channel
 *
 * Inbound: the bot callback GroupMe POSTs for every group message.
 * Outbound: posts replies through the bots API.
 *
 * Reference: https://dev.groupme.com/tutorials/bots
 */

import type { Attachment, GroupMessage, ReplySender } from '../core/types.js';
import { createLogger } from '../logger.js';

const log = createLogger('GroupMe');

export const GROUPME_POST_URL = 'https://api.groupme.com/v3/bots/post';

const SENDER_TYPES = ['user', 'bot', 'system'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isLoci(value: unknown): value is number[][] {
  return Array.isArray(value)
    && value.every((pair) => Array.isArray(pair) && pair.every((n) => typeof n === 'number'));
}

function parseSenderType(value: unknown): GroupMessage['senderType'] | undefined {
  return SENDER_TYPES.find((type) => type === value);
}

/**
 * Attachments without a string type are dropped; missing or malformed
 * user_ids / loci become empty lists.
 */
function parseAttachments(value: unknown): Attachment[] {
  if (!Array.isArray(value)) return [];
  const attachments: Attachment[] = [];
  for (const raw of value) {
    if (!isRecord(raw) || typeof raw.type !== 'string') continue;
    attachments.push({
      type: raw.type,
      userIds: isStringArray(raw.user_ids) ? raw.user_ids : [],
      loci: isLoci(raw.loci) ? raw.loci : [],
    });
  }
  return attachments;
}

/**
 * Normalize a GroupMe bot callback. Returns null for anything that is
 * not a message callback.
 */
export function parseGroupMeCallback(payload: unknown): GroupMessage | null {
  if (!isRecord(payload)) return null;

  const { text, name, user_id: userId } = payload;
  const senderType = parseSenderType(payload.sender_type);
  if (typeof text !== 'string' || typeof name !== 'string' || senderType === undefined) {
    return null;
  }
  // user ids are strings in practice, numbers in some older payloads
  if (typeof userId !== 'string' && typeof userId !== 'number') {
    return null;
  }

  return {
    text,
    senderName: name,
    userId: String(userId),
    senderType,
    attachments: parseAttachments(payload.attachments),
  };
}

/**
 * Posts bot replies to the group the bot is registered in
 */
export class GroupMeReplySender implements ReplySender {
  private botId: string;
  private fetchFn: typeof fetch;

  constructor(botId: string, fetchFn?: typeof fetch) {
    if (!botId) {
      throw new Error('GroupMe bot id is required to send messages');
    }
    this.botId = botId;
    this.fetchFn = fetchFn || globalThis.fetch;
  }

  async sendMessage(text: string): Promise<void> {
    const response = await this.fetchFn(GROUPME_POST_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ bot_id: this.botId, text }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`GroupMe post failed: ${response.status} ${body}`);
    }
    log.debug(`Posted ${text.length} chars`);
  }
}
