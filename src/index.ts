#!/usr/bin/env node

// Main entry point for movepeek
// Ties together the game service client, the terminal handle and the game loop

import fs from 'node:fs';
import termKit from 'terminal-kit';
import { type CliOptions, parseCliArgs, signalExitCode } from './config.js';
import { createFileLogger, DEBUG_LOG_PATH, silentLogger } from './debug-log.js';
import { ConfigError } from './errors.js';
import { playGame, resultMessage } from './game.js';
import { createGameService } from './game-service.js';
import { restoreTerminal } from './tui/terminal-cleanup.js';
import { createTerminalHandle, type TerminalHandle } from './tui/terminal.js';

/**
 * Get package.json version
 */
function getVersion(): string {
  const pkgPath = new URL('../package.json', import.meta.url);
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
movepeek - Play turn-based board games in the terminal

  Type the number of a move and see the board it leads to before you
  commit to it with Enter. Backspace edits, q quits.

USAGE
  movepeek [options] <service-url>

OPTIONS
  -h, --help            Show this help message
  -v, --version         Show version number
  --computer <player>   Let the service move for <player>
  --debug               Write a debug log to ${DEBUG_LOG_PATH}

ENVIRONMENT
  MOVEPEEK_SERVICE_URL  Service URL when none is given
  MOVEPEEK_DEBUG=1      Same as --debug

EXAMPLES
  movepeek http://localhost:9000/tictactoe
  movepeek --computer O http://localhost:9000/tictactoe
`);
}

async function play(options: CliOptions): Promise<void> {
  const logger = options.debug ? createFileLogger() : silentLogger;
  const service = createGameService(options.serviceUrl, { logger });
  const terminal: TerminalHandle = createTerminalHandle(termKit.terminal);
  let lastRow: number | undefined;

  // Note: raw mode is only on while waiting for a key, and terminal-kit
  // reports CTRL_C as a key then, so SIGINT arrives in cooked mode only
  const onSignal = (signal: NodeJS.Signals) => {
    terminal.release();
    restoreTerminal(lastRow);
    process.exit(signalExitCode(signal));
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  try {
    const result = await playGame({
      service,
      terminal,
      computerPlayer: options.computerPlayer,
      logger,
    });
    lastRow = result.lastRow;
    terminal.release();
    restoreTerminal(lastRow);
    console.log(resultMessage(result));
  } catch (error) {
    terminal.release();
    restoreTerminal(lastRow);
    logger.log({
      type: 'system',
      text: 'fatal error',
      details: { error: error instanceof Error ? error.message : String(error) },
    });
    throw error;
  } finally {
    process.off('SIGTERM', onSignal);
    process.off('SIGINT', onSignal);
  }
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  try {
    const command = parseCliArgs(process.argv.slice(2));

    if (command.action === 'help') {
      printHelp();
      return;
    }
    if (command.action === 'version') {
      console.log(getVersion());
      return;
    }

    await play(command);
    // terminal-kit keeps stdin referenced
    process.exit(0);
  } catch (error) {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    if (error instanceof ConfigError) {
      process.stderr.write('Run movepeek --help for usage\n');
      process.exit(2);
    }
    process.exit(1);
  }
}

// Self-executing entry point
void main();
