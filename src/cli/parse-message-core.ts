/**
 * Core of the dugoutbot-parse CLI, kept apart from the binary so it can
 * be tested without touching process.argv or config files.
 */

import type { Attachment, Clock, ParseResult, RandomSource } from '../core/types.js';
import { ConversationContextStore } from '../core/conversation-context.js';
import { CommandParser } from '../nlp/command-parser.js';
import { IntentClassifier } from '../nlp/classifier.js';
import { suggestFollowUp } from '../nlp/responses.js';

export interface ParseArgs {
  message: string;
  sender?: string;
  userId?: string;
  botName?: string;
}

const FLAGS = new Map<string, 'sender' | 'userId' | 'botName'>([
  ['--sender', 'sender'],
  ['--user', 'userId'],
  ['--bot', 'botName'],
]);

/**
 * Parse `"<message>" [--sender NAME] [--user ID] [--bot NAME]`.
 * Loose words are joined into the message, so quoting is optional.
 */
export function parseCliArgs(args: string[]): ParseArgs {
  const words: string[] = [];
  const parsed: Omit<ParseArgs, 'message'> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const key = FLAGS.get(arg);
    if (key === undefined) {
      words.push(arg);
      continue;
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for ${arg}`);
    }
    parsed[key] = value;
    i++;
  }

  const message = words.join(' ').trim();
  if (!message) {
    throw new Error('Missing message text');
  }
  return { message, ...parsed };
}

export interface RunParseOptions {
  sessionTimeoutMin?: number;
  attachments?: Attachment[];
  clock?: Clock;
  random?: RandomSource;
}

export interface ParseReport {
  result: ParseResult;
  suggestion?: string;
}

/**
 * Run one message through a fresh parser. The follow-up hint is only
 * given when the message was addressed to the bot.
 */
export async function runParse(args: ParseArgs, botName: string, options: RunParseOptions = {}): Promise<ParseReport> {
  const name = args.botName ?? botName;
  const contextStore = new ConversationContextStore({
    sessionTimeoutMin: options.sessionTimeoutMin,
    clock: options.clock,
  });
  const parser = new CommandParser({
    botName: name,
    contextStore,
    clock: options.clock,
    random: options.random,
  });

  const attachments = options.attachments ?? [];
  const result = await parser.parse(args.message, args.sender, args.userId, attachments);

  const classifier = new IntentClassifier(name, options.clock);
  const intent = classifier.parseMessage(args.message, args.sender, attachments);
  const suggestion = intent && result.type !== 'ignored' ? suggestFollowUp(intent) : undefined;

  return suggestion === undefined ? { result } : { result, suggestion };
}
