import { describe, expect, it } from 'vitest';
import { parseCliArgs, runParse } from './parse-message-core.js';

const clock = () => new Date('2026-10-14T12:00:00Z');

describe('parseCliArgs', () => {
  it('parses the message and flags', () => {
    expect(parseCliArgs(['@PirateBot next game', '--sender', 'Sam', '--user', '1001', '--bot', 'CaptainBot'])).toEqual({
      message: '@PirateBot next game',
      sender: 'Sam',
      userId: '1001',
      botName: 'CaptainBot',
    });
  });

  it('joins loose words into the message', () => {
    expect(parseCliArgs(['@PirateBot', 'next', 'game'])).toEqual({ message: '@PirateBot next game' });
  });

  it('rejects a flag without a value', () => {
    expect(() => parseCliArgs(['hi', '--sender'])).toThrow('Missing value for --sender');
    expect(() => parseCliArgs(['hi', '--sender', '--user', '1'])).toThrow('Missing value for --sender');
  });

  it('rejects a missing message', () => {
    expect(() => parseCliArgs(['--sender', 'Sam'])).toThrow('Missing message text');
  });
});

describe('runParse', () => {
  it('reports the command and a follow-up hint', async () => {
    const report = await runParse({ message: '@PirateBot I can bring snacks', sender: 'Sam' }, 'PirateBot', { clock });

    expect(report).toEqual({
      result: {
        type: 'command',
        command: { type: 'volunteer_next_game', role: 'snacks', person: 'Sam' },
      },
      suggestion: "🏴‍☠️ I think you want to volunteer! Could you also mention which game (like 'next game' or 'Saturday')?",
    });
  });

  it('answers to the bot name given on the command line', async () => {
    const report = await runParse({ message: '@CaptainBot help', botName: 'CaptainBot' }, 'PirateBot', { clock });

    expect(report).toEqual({
      result: { type: 'command', command: { type: 'commands' } },
      suggestion: '🏴‍☠️ Let me show you what I can help with!',
    });
  });

  it('reports ignored messages without a hint', async () => {
    const report = await runParse({ message: 'see you saturday' }, 'PirateBot', { clock });
    expect(report).toEqual({ result: { type: 'ignored' } });
  });
});
