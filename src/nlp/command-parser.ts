/**
 * Command Parser
 *
 * Entry point for one chat message: mention check, confidence gate,
 * classification, conversation-context bookkeeping and translation.
 */

import type { Attachment, Clock, ParseResult, RandomSource } from '../core/types.js';
import type { ConversationContextStore } from '../core/conversation-context.js';
import { IntentClassifier } from './classifier.js';
import { calculateVolunteerConfidence, shouldProcessMessage } from './confidence.js';
import { translateIntent } from './translator.js';
import { createLogger } from '../logger.js';

const log = createLogger('Parser');

export interface CommandParserOptions {
  botName: string;
  contextStore: ConversationContextStore;
  clock?: Clock;
  random?: RandomSource;
}

const IGNORED: ParseResult = { type: 'ignored' };

export class CommandParser {
  private classifier: IntentClassifier;
  private contextStore: ConversationContextStore;
  private random: RandomSource;

  constructor(options: CommandParserOptions) {
    if (!options.botName.trim()) {
      throw new Error('Bot name must not be empty');
    }
    this.classifier = new IntentClassifier(options.botName, options.clock);
    this.contextStore = options.contextStore;
    this.random = options.random ?? Math.random;
  }

  async parse(
    rawText: string,
    senderName?: string,
    userId?: string,
    attachments: readonly Attachment[] = [],
  ): Promise<ParseResult> {
    // Phone keyboards send curly apostrophes
    const text = rawText.trim().replace(/[‘’]/g, "'");
    if (!text) {
      return IGNORED;
    }

    const mentioned = this.classifier.isMentioned(text);
    const context = userId ? await this.contextStore.getActiveContext(userId) : undefined;
    const hasVolunteerContext = context?.volunteerIntent === true;

    const confidence = calculateVolunteerConfidence(text, hasVolunteerContext, mentioned);
    if (!shouldProcessMessage(mentioned, confidence, hasVolunteerContext)) {
      if (hasVolunteerContext) {
        log.debug(`Ignoring follow-up from ${userId}: confidence ${confidence}`);
      }
      return IGNORED;
    }

    const intent = mentioned
      ? this.classifier.parseMessage(text, senderName, attachments)
      : this.classifier.classifyContinuation(text, senderName, attachments);
    if (!intent) {
      return IGNORED;
    }

    log.debug(`Classified as ${intent.kind}`, { mentioned, confidence, userId });

    if (userId) {
      if (mentioned && intent.kind === 'volunteer') {
        await this.contextStore.createOrUpdateContext(userId, senderName || userId, true, true);
      } else if (hasVolunteerContext) {
        await this.contextStore.updateActivity(userId);
      }
    }

    return translateIntent(intent, { random: this.random });
  }
}
