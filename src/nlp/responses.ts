/**
 * Bot copy: small-talk replies, clarification prompts and the pool of
 * witty fallbacks for messages nobody could parse.
 */

import type { ParsedIntent, RandomSource } from '../core/types.js';

export const FEAR_RESPONSE = "🏴‍☠️ No need to fear! I'm just here to help with baseball. ⚾";
export const THANKS_RESPONSE = "🏴‍☠️ You're welcome! Happy to help. ⚾";
export const HUMOR_RESPONSE = '⚾ Humor setting: TARS level. 75% honesty. 🤖';
export const GREETING_RESPONSE = '🏴‍☠️ Hi! I help with schedules and volunteers. ⚾';

export const ROLE_CHOICES = 'snacks, livestream, scoreboard, or pitch count';

export const WITTY_RESPONSES: readonly string[] = [
  "🏴‍☠️ Ahoy! I'm not quite sure what you're asking, but I'm here to help! Try asking about the next game or volunteer to bring snacks! 🍪",
  "⚾ Hmm, that's a new one! Maybe ask me 'when's the next game?' or 'I've got snacks'? 🤔",
  "🏴‍☠️ I'm still learning pirate speak! Try asking me about games, volunteers, or say 'let's go Pirates!' 🏴‍☠️",
  "📱 Autocorrect strikes again? Shocking. Nobody could have predicted that. Try 'next game'! 💸",
  "⚾ Not quite sure what you mean, matey! Ask me about upcoming games or volunteer roles! 🏴‍☠️",
  "🏴‍☠️ Shiver me timbers! That's a puzzler. Try 'next game', 'I've got snacks', or 'let's go Pirates!' ⚾",
  "📱 Was that you or your phone's keyboard having a moment? Hard to tell. Try 'volunteers'! 🤡",
  "⚾ Arrr, I'm not sure what ye be sayin'! Ask about the next game or volunteer to help out! 🏴‍☠️",
  "📱 Sent from my phone (which explains everything). Try 'next game' - even a flip phone can handle that! 🙄",
  "⚾ I only speak baseball, and that wasn't it. Try 'show volunteers' or 'when is the next game?' 🎪",
];

/**
 * Uniformly choose one entry of a non-empty pool
 */
export function pickOne<T>(pool: readonly T[], random: RandomSource): T {
  if (pool.length === 0) {
    throw new Error('Cannot pick from an empty pool');
  }
  const index = Math.min(pool.length - 1, Math.max(0, Math.floor(random() * pool.length)));
  return pool[index];
}

export function wittyResponse(random: RandomSource): string {
  return pickOne(WITTY_RESPONSES, random);
}

/**
 * Canned reply for small talk, by priority: fear, thanks, humor, greeting
 */
export function conversationalResponse(text: string): string {
  if (text.includes('scared') || text.includes('fear')) return FEAR_RESPONSE;
  if (text.includes('thank')) return THANKS_RESPONSE;
  if (text.includes('funny') || text.includes('lol')) return HUMOR_RESPONSE;
  return GREETING_RESPONSE;
}

// Clarifications

export function askForRole(person: string): string {
  return `🏴‍☠️ Thanks ${person}! What would you like to volunteer for? (${ROLE_CHOICES})`;
}

export function askForName(role: string): string {
  return `🏴‍☠️ Great! Someone wants to do ${role}! Could you tell me your name?`;
}

export const ASK_FOR_ROLE_AND_NAME =
  "🏴‍☠️ I think you want to volunteer! Tell me what role you'd like and your name, and I'll sign you up for the next game! 😊";

export const MISSING_MESSAGE_ID =
  "⚾ Please provide a message ID to delete. Use 'list messages' to see message IDs.";

/**
 * Hint for a partially understood request: what else the user could say.
 */
export function suggestFollowUp(intent: ParsedIntent): string {
  switch (intent.kind) {
    case 'volunteer': {
      const missing: string[] = [];
      if (intent.roles.length === 0) {
        missing.push(`what you'd like to volunteer for (${ROLE_CHOICES})`);
      }
      if (intent.date === undefined && intent.relativeGame === undefined) {
        missing.push("which game (like 'next game' or 'Saturday')");
      }
      if (intent.person === undefined) {
        missing.push('your name');
      }
      return missing.length === 0
        ? '🏴‍☠️ I think you want to volunteer! Let me check on that...'
        : `🏴‍☠️ I think you want to volunteer! Could you also mention ${missing.join(' and ')}?`;
    }
    case 'game_query':
      return intent.category
        ? `⚾ Looking for ${intent.category} info? Here's what I found!`
        : "⚾ Looking for game info? Let me show you what's coming up!";
    default:
      return '🏴‍☠️ Let me show you what I can help with!';
  }
}
