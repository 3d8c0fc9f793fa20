/**
 * DugoutBot Configuration Types
 */

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface DugoutBotConfig {
  bot: {
    // Mention token is "@" + name
    name: string;
    // GroupMe bot id used to post replies
    groupmeBotId?: string;
  };

  conversation: {
    // Minutes of silence before a volunteer conversation is forgotten
    sessionTimeoutMin: number;
  };

  server: {
    logLevel?: LogLevel;
  };
}

export const DEFAULT_CONFIG: DugoutBotConfig = {
  bot: {
    name: 'PirateBot',
  },
  conversation: {
    sessionTimeoutMin: 3,
  },
  server: {},
};

export function defaultConfig(): DugoutBotConfig {
  return {
    bot: { ...DEFAULT_CONFIG.bot },
    conversation: { ...DEFAULT_CONFIG.conversation },
    server: { ...DEFAULT_CONFIG.server },
  };
}
