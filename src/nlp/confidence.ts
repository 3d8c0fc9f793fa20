/**
 * Confidence gate for messages that do not mention the bot.
 *
 * Scores 0-100 how likely a message continues a volunteer sign-up.
 * A mention always passes; otherwise the sender needs a live volunteer
 * context and a score of at least CONFIDENCE_THRESHOLD.
 */

export const CONFIDENCE_THRESHOLD = 60;

const STRONG_PHRASES = [
  "i'll do", "i've got", 'i can do', "i'll bring",
  'put me down', 'sign me up', 'i got', 'i will do',
];

const WEAK_PHRASES = ['will do', 'can do', 'doing', 'bringing'];

const QUESTION_MARKERS = ['who', 'what', 'when', 'where', '?'];

const REFUSALS = ["can't", "won't", 'not doing', 'unable'];

export function calculateVolunteerConfidence(
  text: string,
  hasActiveVolunteerContext: boolean,
  mentionedBot: boolean,
): number {
  const lower = text.toLowerCase();
  let score = 0;

  if (mentionedBot) score += 50;
  if (hasActiveVolunteerContext) score += 30;

  if (STRONG_PHRASES.some((phrase) => lower.includes(phrase))) {
    score += 40;
  } else if (WEAK_PHRASES.some((phrase) => lower.includes(phrase))) {
    // A capital letter mid-conversation is most likely a name
    score += hasActiveVolunteerContext && /\p{Lu}/u.test(text) ? 40 : 20;
  }

  if (QUESTION_MARKERS.some((marker) => lower.includes(marker))) {
    score = Math.max(0, score - 30);
  }

  if (REFUSALS.some((refusal) => lower.includes(refusal))) {
    return 0;
  }

  return score;
}

export function shouldProcessMessage(
  mentionedBot: boolean,
  confidence: number,
  hasActiveVolunteerContext: boolean,
): boolean {
  return mentionedBot || (confidence >= CONFIDENCE_THRESHOLD && hasActiveVolunteerContext);
}
