/**
 * Core Types for DugoutBot
 */

// =============================================================================
// Inbound Message Types
// =============================================================================

/**
 * Attachment on an inbound group message.
 *
 * Only `mentions` attachments are inspected by the parser; other types
 * (image, location, emoji...) are carried through untouched.
 */
export interface Attachment {
  type: string;
  userIds: string[];
  loci: number[][];
}

/**
 * Inbound group-chat message, normalized from the webhook callback
 */
export interface GroupMessage {
  text: string;
  senderName: string;
  userId: string;
  senderType: 'user' | 'bot' | 'system';
  attachments: Attachment[];
}

/** Calendar date as `YYYY-MM-DD` */
export type IsoDate = string;

/** Clock source; tests pin "now" through this */
export type Clock = () => Date;

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

// =============================================================================
// Intents
// =============================================================================

export type VolunteerRole = 'snacks' | 'livestream' | 'scoreboard' | 'pitchcount';

export type RelativeTime = 'next' | 'upcoming';

/**
 * Classified meaning of a chat message, before resolution into a command.
 */
export type ParsedIntent =
  | { kind: 'volunteer'; roles: VolunteerRole[]; date?: IsoDate; person?: string; relativeGame?: number }
  | { kind: 'game_query'; category?: string; count?: number; relative?: RelativeTime }
  | { kind: 'volunteer_query'; date?: IsoDate }
  | { kind: 'team_spirit' }
  | { kind: 'help' }
  | { kind: 'unknown' }
  | { kind: 'remove_volunteer'; person: string; role: string; date?: IsoDate }
  | { kind: 'assign_volunteer'; person: string; role: string; date?: IsoDate }
  | { kind: 'add_moderator'; userId: string }
  | { kind: 'remove_moderator'; userId: string }
  | { kind: 'list_moderators' }
  | { kind: 'list_bot_messages'; count: number }
  | { kind: 'delete_bot_message'; messageId: string }
  | { kind: 'clean_bot_messages'; count: number }
  | { kind: 'conversational_response'; message: string };


// =============================================================================
// Commands
// =============================================================================

/**
 * Fully specified request handed to the command executor.
 * Built only by the translator.
 */
export type BotCommand =
  | { type: 'next_game' }
  | { type: 'next_games'; count: number }
  | { type: 'next_game_category'; category: string }
  | { type: 'lets_go'; team: string }
  | { type: 'volunteer'; date: IsoDate; role: string; person: string }
  | { type: 'volunteer_next_game'; role: string; person: string }
  | { type: 'show_volunteers'; date?: IsoDate }
  | { type: 'commands' }
  | { type: 'remove_volunteer'; person: string; role: string; date?: IsoDate }
  | { type: 'assign_volunteer'; person: string; role: string; date?: IsoDate }
  | { type: 'add_moderator'; userId: string }
  | { type: 'remove_moderator'; userId: string }
  | { type: 'list_moderators' }
  | { type: 'list_bot_messages'; count: number }
  | { type: 'delete_bot_message'; messageId: string }
  | { type: 'clean_bot_messages'; count: number };

/**
 * Why the parser answered with text instead of a command.
 * - 'clarification': intent recognized but a required field is missing
 * - 'unrecognized': nothing matched; text is a friendly non-answer
 * - 'conversational': small talk with a canned reply
 */
export type ReplyReason = 'clarification' | 'unrecognized' | 'conversational';

/**
 * Outcome of parsing one message. `reply` text is bot copy to post back
 * to the chat, not a fault to log.
 */
export type ParseResult =
  | { type: 'ignored' }
  | { type: 'command'; command: BotCommand }
  | { type: 'reply'; reason: ReplyReason; text: string };

// =============================================================================
// Conversation Context
// =============================================================================

/**
 * Short-lived memory that a user is mid volunteer sign-up
 */
export interface ConversationContext {
  userId: string;
  displayName: string;
  sessionStart: Date;
  lastActivity: Date;
  volunteerIntent: boolean;
  mentionedBot: boolean;
}

// =============================================================================
// Collaborators
// =============================================================================

export interface CommandSender {
  senderName?: string;
  userId?: string;
}

/**
 * Business layer behind the parser (spreadsheet, calendar, moderators).
 * Resolves to the reply text for the chat.
 */
export interface CommandExecutor {
  execute(command: BotCommand, sender: CommandSender): Promise<string>;
}

/**
 * Outbound delivery to the group chat
 */
export interface ReplySender {
  sendMessage(text: string): Promise<void>;
}
