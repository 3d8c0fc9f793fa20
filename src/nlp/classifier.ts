/**
 * IntentClassifier - chat text to ParsedIntent
 *
 * Rule-based: ordered keyword checks, first match wins. The order is a
 * priority policy (admin commands before volunteering, volunteering
 * before game questions...), so new rules must be slotted in deliberately.
 */

import type { Attachment, Clock, ParsedIntent } from '../core/types.js';
import {
  ROLE_FAMILIES,
  extractDate,
  extractGameCategory,
  extractGameCount,
  extractPersonName,
  extractRelativeGame,
  extractRelativeTime,
  extractRoles,
} from './extractors.js';
import { conversationalResponse } from './responses.js';

const VOLUNTEER_PHRASES = [
  "i've got", 'i have', "i'll bring", 'i can do', 'i can bring',
  'put me down', 'sign me up', "i'll do", "i'll take",
  'count me in', 'i got', "i'm doing", 'volunteer', 'i can',
  'have got', 'has got', 'will bring', 'will do',
];

const ROLE_KEYWORDS = [
  ...ROLE_FAMILIES.flatMap(({ keywords }) => keywords),
  'snack', 'score', 'stream',
];

const GAME_QUERY_KEYWORDS = [
  'next game', 'next', 'when', 'what time', 'where', 'location',
  'schedule', 'upcoming', 'games',
];

const VOLUNTEER_QUERY_WORDS = [
  'who', "who's", 'volunteers', 'volunteer status', 'need', 'needed',
  'available', 'open', 'assignments',
];

const VOLUNTEER_QUERY_CONTEXT = ['snacks', 'livestream', 'scoreboard', 'pitchcount', 'volunteer'];

const TEAM_SPIRIT_KEYWORDS = [
  "let's go", 'lets go', 'go pirates', 'pirates', 'spirit',
  'hype', 'pump', 'motivation', 'fact',
];

const HELP_KEYWORDS = ['help', 'commands', 'what can you do', 'how'];

const SMALL_TALK_KEYWORDS = ['scared', 'fear', 'thank', 'thanks', 'hi', 'hello', 'funny', 'lol'];

const DEFAULT_LIST_COUNT = 10;
const DEFAULT_CLEAN_COUNT = 5;

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

function words(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

function firstInteger(text: string): number | undefined {
  for (const word of words(text)) {
    if (/^\d+$/.test(word)) {
      const value = Number(word);
      if (Number.isSafeInteger(value)) return value;
    }
  }
  return undefined;
}

/**
 * Split "<verb> <person...> <keyword> <role>" around the first token equal
 * to `keyword`. A name containing the keyword as a whole word splits in
 * the wrong place; callers accept that.
 */
function splitAroundKeyword(text: string, keyword: string): { person: string; role: string } {
  const tokens = words(text);
  const idx = tokens.indexOf(keyword);
  if (idx === -1) {
    return { person: '', role: '' };
  }
  return {
    person: idx > 1 ? tokens.slice(1, idx).join(' ') : '',
    role: tokens[idx + 1] ?? '',
  };
}

/**
 * Moderator target: first user of the first mentions attachment, else the
 * last word of the message.
 */
function moderatorTarget(text: string, attachments: readonly Attachment[]): string {
  const mentions = attachments.find((attachment) => attachment.type === 'mentions');
  const mentioned = mentions?.userIds[0];
  if (mentioned) return mentioned;
  const tokens = words(text);
  return tokens[tokens.length - 1] ?? '';
}

export class IntentClassifier {
  private mention: string;
  private clock: Clock;

  constructor(botName: string, clock: Clock = () => new Date()) {
    this.mention = `@${botName}`.toLowerCase();
    this.clock = clock;
  }

  /**
   * Whether the raw text mentions the bot (case-insensitive)
   */
  isMentioned(text: string): boolean {
    return text.toLowerCase().includes(this.mention);
  }

  /**
   * Classify a message addressed to the bot. Returns undefined when the
   * bot is not mentioned; a bare mention means "help".
   */
  parseMessage(text: string, senderName: string | undefined, attachments: readonly Attachment[]): ParsedIntent | undefined {
    const trimmed = text.trim();
    const lower = trimmed.toLowerCase();
    if (!lower.includes(this.mention)) {
      return undefined;
    }

    const cleaned = lower.split(this.mention).join('').trim();
    if (!cleaned) {
      return { kind: 'help' };
    }

    return this.detectIntent(cleaned, trimmed, senderName, attachments);
  }

  /**
   * Classify a follow-up that does not mention the bot. Only called once
   * the confidence gate has accepted the message.
   */
  classifyContinuation(text: string, senderName: string | undefined, attachments: readonly Attachment[]): ParsedIntent | undefined {
    const trimmed = text.trim();
    if (!trimmed) return undefined;
    return this.detectIntent(trimmed.toLowerCase(), trimmed, senderName, attachments);
  }

  detectIntent(
    text: string,
    originalText: string,
    senderName: string | undefined,
    attachments: readonly Attachment[],
  ): ParsedIntent {
    // Admin commands
    if (text.includes('remove') && text.includes('from')) {
      return { kind: 'remove_volunteer', ...splitAroundKeyword(text, 'from') };
    }
    if (text.includes('assign') && text.includes('to')) {
      return { kind: 'assign_volunteer', ...splitAroundKeyword(text, 'to') };
    }
    if (containsAny(text, ['add moderator', 'add mod'])) {
      return { kind: 'add_moderator', userId: moderatorTarget(text, attachments) };
    }
    if (containsAny(text, ['remove moderator', 'remove mod'])) {
      return { kind: 'remove_moderator', userId: moderatorTarget(text, attachments) };
    }
    if (containsAny(text, ['list moderator', 'show moderator'])) {
      return { kind: 'list_moderators' };
    }

    // Bot message management
    if (text.includes('list') && text.includes('message')) {
      return { kind: 'list_bot_messages', count: firstInteger(text) ?? DEFAULT_LIST_COUNT };
    }
    if (text.includes('delete') && text.includes('message')) {
      const messageId = words(text).find((word) => word.length > 10 && /^\d+$/.test(word)) ?? '';
      return { kind: 'delete_bot_message', messageId };
    }
    if (text.includes('clean') && text.includes('message')) {
      return { kind: 'clean_bot_messages', count: firstInteger(text) ?? DEFAULT_CLEAN_COUNT };
    }

    if (containsAny(text, VOLUNTEER_PHRASES) || containsAny(text, ROLE_KEYWORDS)) {
      return this.parseVolunteer(text, originalText, senderName);
    }

    if (containsAny(text, GAME_QUERY_KEYWORDS)) {
      return {
        kind: 'game_query',
        category: extractGameCategory(text),
        count: extractGameCount(text),
        relative: extractRelativeTime(text),
      };
    }

    if (containsAny(text, VOLUNTEER_QUERY_WORDS) && containsAny(text, VOLUNTEER_QUERY_CONTEXT)) {
      return { kind: 'volunteer_query', date: extractDate(text, this.clock()) };
    }

    if (containsAny(text, TEAM_SPIRIT_KEYWORDS)) {
      return { kind: 'team_spirit' };
    }

    if (containsAny(text, HELP_KEYWORDS)) {
      return { kind: 'help' };
    }

    if (containsAny(text, SMALL_TALK_KEYWORDS)) {
      return { kind: 'conversational_response', message: conversationalResponse(text) };
    }

    return { kind: 'unknown' };
  }

  private parseVolunteer(text: string, originalText: string, senderName: string | undefined): ParsedIntent {
    return {
      kind: 'volunteer',
      roles: extractRoles(text),
      date: extractDate(text, this.clock()),
      person: extractPersonName(originalText) ?? (senderName || undefined),
      relativeGame: extractRelativeGame(text),
    };
  }
}
