/**
 * DugoutBot Core - routes group messages through the parser
 *
 * Parser replies go straight back to the chat; commands go to the
 * executor and its answer goes back to the chat. Nothing thrown here
 * reaches the webhook caller.
 */

import type { BotCommand, Clock, CommandExecutor, GroupMessage, RandomSource, ReplyReason, ReplySender } from './types.js';
import type { DugoutBotConfig } from '../config/types.js';
import { CommandParser } from '../nlp/command-parser.js';
import { GroupMeReplySender } from '../channels/groupme.js';
import { ConversationContextStore } from './conversation-context.js';
import { ConfigError, formatCommandErrorForUser } from './errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('Bot');

export interface DugoutBotOptions {
  parser: CommandParser;
  executor: CommandExecutor;
  sender: ReplySender;
}

export type HandleOutcome =
  | { status: 'ignored'; reason: 'bot_sender' | 'not_addressed' }
  | { status: 'replied'; reason: ReplyReason; text: string }
  | { status: 'executed'; command: BotCommand; text: string }
  | { status: 'failed'; command: BotCommand; text: string };

export class DugoutBot {
  private parser: CommandParser;
  private executor: CommandExecutor;
  private sender: ReplySender;
  private messageQueue: GroupMessage[] = [];
  private processing: Promise<void> | null = null;

  constructor(options: DugoutBotOptions) {
    this.parser = options.parser;
    this.executor = options.executor;
    this.sender = options.sender;
  }

  /**
   * Queue a message from the webhook and return immediately.
   * Messages are handled one at a time, in arrival order.
   */
  enqueue(msg: GroupMessage): void {
    this.messageQueue.push(msg);
    if (!this.processing) {
      this.processing = this.processQueue().finally(() => {
        this.processing = null;
      });
    }
  }

  /**
   * Resolves once the queue is empty
   */
  async whenIdle(): Promise<void> {
    while (this.processing) {
      await this.processing;
    }
  }

  private async processQueue(): Promise<void> {
    let msg = this.messageQueue.shift();
    while (msg) {
      try {
        await this.handleMessage(msg);
      } catch (error) {
        log.error('Error processing message:', error);
      }
      msg = this.messageQueue.shift();
    }
  }

  async handleMessage(msg: GroupMessage): Promise<HandleOutcome> {
    if (msg.senderType === 'bot') {
      log.debug(`Skipping bot message from ${msg.senderName}`);
      return { status: 'ignored', reason: 'bot_sender' };
    }

    const result = await this.parser.parse(msg.text, msg.senderName, msg.userId, msg.attachments);

    switch (result.type) {
      case 'ignored':
        return { status: 'ignored', reason: 'not_addressed' };

      case 'reply':
        await this.deliver(result.text);
        return { status: 'replied', reason: result.reason, text: result.text };

      case 'command': {
        const { command } = result;
        log.info(`${msg.senderName} -> ${command.type}`);
        let text: string;
        try {
          text = await this.executor.execute(command, { senderName: msg.senderName, userId: msg.userId });
        } catch (error) {
          log.error(`Command ${command.type} failed:`, error);
          text = formatCommandErrorForUser(error);
          await this.deliver(text);
          return { status: 'failed', command, text };
        }
        await this.deliver(text);
        return { status: 'executed', command, text };
      }
    }
  }

  private async deliver(text: string): Promise<void> {
    if (!text.trim()) return;
    try {
      await this.sender.sendMessage(text);
    } catch (error) {
      log.error('Failed to send reply:', error);
    }
  }
}

export interface CreateDugoutBotOptions {
  fetchFn?: typeof fetch;
  clock?: Clock;
  random?: RandomSource;
}

/**
 * Wire a bot from loaded config: context store, parser and GroupMe sender
 */
export function createDugoutBot(
  config: DugoutBotConfig,
  executor: CommandExecutor,
  options: CreateDugoutBotOptions = {},
): DugoutBot {
  const botId = config.bot.groupmeBotId;
  if (!botId) {
    throw new ConfigError('"bot.groupmeBotId" is required to post replies', 'bot.groupmeBotId');
  }

  const contextStore = new ConversationContextStore({
    sessionTimeoutMin: config.conversation.sessionTimeoutMin,
    clock: options.clock,
  });
  const parser = new CommandParser({
    botName: config.bot.name,
    contextStore,
    clock: options.clock,
    random: options.random,
  });
  const sender = new GroupMeReplySender(botId, options.fetchFn);

  log.info(`Answering to @${config.bot.name}`);
  return new DugoutBot({ parser, executor, sender });
}
