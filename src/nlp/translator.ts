/**
 * ParsedIntent → BotCommand, or a reply when something is missing.
 */

import type { BotCommand, ParsedIntent, ParseResult, RandomSource } from '../core/types.js';
import {
  ASK_FOR_ROLE_AND_NAME,
  MISSING_MESSAGE_ID,
  askForName,
  askForRole,
  wittyResponse,
} from './responses.js';

export const MIN_GAME_COUNT = 1;
export const MAX_GAME_COUNT = 10;
export const DEFAULT_GAME_COUNT = 3;

export interface TranslateOptions {
  random?: RandomSource;
}

export type TranslationResult = Exclude<ParseResult, { type: 'ignored' }>;

function command(cmd: BotCommand): TranslationResult {
  return { type: 'command', command: cmd };
}

function clarify(text: string): TranslationResult {
  return { type: 'reply', reason: 'clarification', text };
}

export function translateIntent(intent: ParsedIntent, options: TranslateOptions = {}): TranslationResult {
  const random = options.random ?? Math.random;

  switch (intent.kind) {
    case 'volunteer': {
      const role = intent.roles[0];
      const { person, date } = intent;
      if (role && person) {
        // TODO: route relativeGame 1 and 2 to the game after next once the
        // executor can look games up by offset
        return date
          ? command({ type: 'volunteer', date, role, person })
          : command({ type: 'volunteer_next_game', role, person });
      }
      if (person) return clarify(askForRole(person));
      if (role) return clarify(askForName(role));
      return clarify(ASK_FOR_ROLE_AND_NAME);
    }

    case 'game_query':
      if (intent.category) {
        return command({ type: 'next_game_category', category: intent.category });
      }
      if (intent.count !== undefined) {
        const inRange = intent.count >= MIN_GAME_COUNT && intent.count <= MAX_GAME_COUNT;
        return command({ type: 'next_games', count: inRange ? intent.count : DEFAULT_GAME_COUNT });
      }
      return command({ type: 'next_game' });

    case 'volunteer_query':
      return command({ type: 'show_volunteers', date: intent.date });
    case 'team_spirit':
      return command({ type: 'lets_go', team: 'pirates' });
    case 'help':
      return command({ type: 'commands' });

    case 'remove_volunteer':
      return command({ type: 'remove_volunteer', person: intent.person, role: intent.role, date: intent.date });
    case 'assign_volunteer':
      return command({ type: 'assign_volunteer', person: intent.person, role: intent.role, date: intent.date });
    case 'add_moderator':
      return command({ type: 'add_moderator', userId: intent.userId });
    case 'remove_moderator':
      return command({ type: 'remove_moderator', userId: intent.userId });
    case 'list_moderators':
      return command({ type: 'list_moderators' });

    case 'list_bot_messages':
      return command({ type: 'list_bot_messages', count: intent.count });
    case 'delete_bot_message':
      return intent.messageId
        ? command({ type: 'delete_bot_message', messageId: intent.messageId })
        : clarify(MISSING_MESSAGE_ID);
    case 'clean_bot_messages':
      return command({ type: 'clean_bot_messages', count: intent.count });

    case 'conversational_response':
      return { type: 'reply', reason: 'conversational', text: intent.message };
    case 'unknown':
      return { type: 'reply', reason: 'unrecognized', text: wittyResponse(random) };
  }
}
