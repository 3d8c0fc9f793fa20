import { describe, expect, it } from 'vitest';
import { IntentClassifier } from './classifier.js';
import type { Attachment } from '../core/types.js';
import { FEAR_RESPONSE, GREETING_RESPONSE, HUMOR_RESPONSE, THANKS_RESPONSE } from './responses.js';

// Wednesday
const clock = () => new Date('2026-10-14T12:00:00Z');

function createClassifier(): IntentClassifier {
  return new IntentClassifier('PirateBot', clock);
}

function mention(userId: string): Attachment {
  return { type: 'mentions', userIds: [userId], loci: [[0, 6]] };
}

describe('IntentClassifier.parseMessage', () => {
  const classifier = createClassifier();

  it('returns undefined without a mention', () => {
    expect(classifier.parseMessage("I've got snacks", 'Sam', [])).toBeUndefined();
  });

  it('matches the mention case-insensitively', () => {
    expect(classifier.parseMessage('@piratebot help', undefined, [])).toEqual({ kind: 'help' });
  });

  it('treats a bare mention as help', () => {
    expect(classifier.parseMessage('  @PirateBot  ', undefined, [])).toEqual({ kind: 'help' });
  });

  it('classifies a volunteer offer with date and name', () => {
    expect(classifier.parseMessage("@PirateBot I've got snacks for Saturday John", 'Sam', [])).toEqual({
      kind: 'volunteer',
      roles: ['snacks'],
      date: '2026-10-17',
      person: 'John',
      relativeGame: undefined,
    });
  });

  it('falls back to the sender name for volunteers', () => {
    expect(classifier.parseMessage('@PirateBot put me down for livestream next game', 'Sam', [])).toEqual({
      kind: 'volunteer',
      roles: ['livestream'],
      date: undefined,
      person: 'Sam',
      relativeGame: 0,
    });
  });

  it('reads games further out as relative games', () => {
    expect(classifier.parseMessage('@PirateBot snacks in 2 games', 'Sam', [])).toEqual({
      kind: 'volunteer',
      roles: ['snacks'],
      date: undefined,
      person: 'Sam',
      relativeGame: 1,
    });
    expect(classifier.parseMessage('@PirateBot scoreboard second game', 'Sam', [])).toEqual({
      kind: 'volunteer',
      roles: ['scoreboard'],
      date: undefined,
      person: 'Sam',
      relativeGame: 1,
    });
    expect(classifier.parseMessage('@PirateBot pitch count in 3 games', 'Sam', [])).toEqual({
      kind: 'volunteer',
      roles: ['pitchcount'],
      date: undefined,
      person: 'Sam',
      relativeGame: 2,
    });
  });

  it('classifies game queries', () => {
    expect(classifier.parseMessage("@PirateBot when's the next game?", 'Sam', [])).toEqual({
      kind: 'game_query',
      category: undefined,
      count: undefined,
      relative: 'next',
    });
    expect(classifier.parseMessage('@PirateBot next 3 games', 'Sam', [])).toEqual({
      kind: 'game_query',
      category: undefined,
      count: 3,
      relative: 'next',
    });
  });

  it('prefers volunteer offers over volunteer queries', () => {
    expect(classifier.parseMessage('@PirateBot who needs a volunteer saturday', 'Sam', [])).toEqual({
      kind: 'volunteer',
      roles: [],
      date: '2026-10-17',
      person: 'Sam',
      relativeGame: undefined,
    });
  });

  it('needs a context word for volunteer queries', () => {
    expect(classifier.parseMessage('@PirateBot any assignments open', 'Sam', [])).toEqual({ kind: 'unknown' });
  });

  it('classifies team spirit and small talk', () => {
    expect(classifier.parseMessage("@PirateBot let's go pirates!", 'Sam', [])).toEqual({ kind: 'team_spirit' });
    expect(classifier.parseMessage('@PirateBot thank u', 'Sam', [])).toEqual({
      kind: 'conversational_response',
      message: THANKS_RESPONSE,
    });
    expect(classifier.parseMessage('@PirateBot are u scared', 'Sam', [])).toEqual({
      kind: 'conversational_response',
      message: FEAR_RESPONSE,
    });
    expect(classifier.parseMessage('@PirateBot lol', 'Sam', [])).toEqual({
      kind: 'conversational_response',
      message: HUMOR_RESPONSE,
    });
    expect(classifier.parseMessage('@PirateBot hello', 'Sam', [])).toEqual({
      kind: 'conversational_response',
      message: GREETING_RESPONSE,
    });
  });

  it('returns unknown when nothing matches', () => {
    expect(classifier.parseMessage('@PirateBot blah blah random stuff', 'Sam', [])).toEqual({ kind: 'unknown' });
  });
});

describe('IntentClassifier admin commands', () => {
  const classifier = createClassifier();

  it('splits remove and assign around the keyword', () => {
    expect(classifier.parseMessage('@PirateBot remove jane doe from snacks', 'Coach', [])).toEqual({
      kind: 'remove_volunteer',
      person: 'jane doe',
      role: 'snacks',
    });
    expect(classifier.parseMessage('@PirateBot assign sam to scoreboard', 'Coach', [])).toEqual({
      kind: 'assign_volunteer',
      person: 'sam',
      role: 'scoreboard',
    });
  });

  it('leaves person and role empty when the keyword is only a substring', () => {
    expect(classifier.parseMessage('@PirateBot assign toby', 'Coach', [])).toEqual({
      kind: 'assign_volunteer',
      person: '',
      role: '',
    });
  });

  it('targets the mentioned user for moderator commands', () => {
    expect(classifier.parseMessage('@PirateBot add moderator @Jess', 'Coach', [mention('24680')])).toEqual({
      kind: 'add_moderator',
      userId: '24680',
    });
    expect(classifier.parseMessage('@PirateBot add mod 13579', 'Coach', [])).toEqual({
      kind: 'add_moderator',
      userId: '13579',
    });
    expect(classifier.parseMessage('@PirateBot remove mod @Jess', 'Coach', [mention('24680')])).toEqual({
      kind: 'remove_moderator',
      userId: '24680',
    });
    expect(classifier.parseMessage('@PirateBot remove moderator 13579', 'Coach', [])).toEqual({
      kind: 'remove_moderator',
      userId: '13579',
    });
    expect(classifier.parseMessage('@PirateBot list moderators', 'Coach', [])).toEqual({ kind: 'list_moderators' });
  });

  it('parses message management counts and ids', () => {
    expect(classifier.parseMessage('@PirateBot list messages', 'Coach', [])).toEqual({
      kind: 'list_bot_messages',
      count: 10,
    });
    expect(classifier.parseMessage('@PirateBot list 4 messages', 'Coach', [])).toEqual({
      kind: 'list_bot_messages',
      count: 4,
    });
    expect(classifier.parseMessage('@PirateBot clean messages', 'Coach', [])).toEqual({
      kind: 'clean_bot_messages',
      count: 5,
    });
    expect(classifier.parseMessage('@PirateBot delete message 171234567890123', 'Coach', [])).toEqual({
      kind: 'delete_bot_message',
      messageId: '171234567890123',
    });
    expect(classifier.parseMessage('@PirateBot delete message 12345', 'Coach', [])).toEqual({
      kind: 'delete_bot_message',
      messageId: '',
    });
  });
});

describe('IntentClassifier.classifyContinuation', () => {
  const classifier = createClassifier();

  it('classifies mention-free follow-ups', () => {
    expect(classifier.classifyContinuation("I'll do it - Sarah", 'Sam', [])).toEqual({
      kind: 'volunteer',
      roles: [],
      date: undefined,
      person: 'Sarah',
      relativeGame: undefined,
    });
  });

  it('returns undefined for empty text', () => {
    expect(classifier.classifyContinuation('   ', 'Sam', [])).toBeUndefined();
  });
});
