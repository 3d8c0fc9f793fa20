#!/usr/bin/env node
/**
 * dugoutbot-parse - Run one chat message through the parser
 *
 * Usage:
 *   dugoutbot-parse "<message>" [--sender NAME] [--user ID] [--bot NAME]
 *
 * Prints what the bot would do with the message, as JSON.
 */

import { loadAppConfigOrExit } from '../config/runtime.js';
import { parseCliArgs, runParse } from './parse-message-core.js';

function showHelp(): void {
  console.log(`
dugoutbot-parse - Run one chat message through the parser

Usage:
  dugoutbot-parse "<message>" [options]

Options:
  --sender <name>     Display name of the sender
  --user <id>         User id of the sender (enables conversation context)
  --bot <name>        Bot name to answer to (default: bot.name from dugoutbot.yaml)
  --help, -h          Show this help

Examples:
  dugoutbot-parse "@PirateBot I've got snacks for Saturday" --sender "Sam"
  dugoutbot-parse "@PirateBot next 3 games"
  dugoutbot-parse "when is the next game?" --bot CaptainBot
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    showHelp();
    return;
  }

  const config = loadAppConfigOrExit();
  const parsed = parseCliArgs(args);
  const report = await runParse(parsed, config.bot.name, {
    sessionTimeoutMin: config.conversation.sessionTimeoutMin,
  });

  console.log(JSON.stringify(report.result, null, 2));
  if (report.suggestion) {
    console.log(`\n${report.suggestion}`);
  }
}

main().catch((err) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
