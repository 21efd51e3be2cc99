// Command-line configuration

import { z } from 'zod';
import { ConfigError } from './errors.js';

export interface CliOptions {
  action: 'play';
  serviceUrl: string;
  /** Player the service moves for, null when every player is human */
  computerPlayer: string | null;
  debug: boolean;
}

export type CliCommand = CliOptions | { action: 'help' } | { action: 'version' };

const ServiceUrlSchema = z
  .string()
  .url()
  .refine((url) => /^https?:\/\//.test(url), { message: 'must be an http(s) URL' });

/**
 * Parses command-line arguments (without node and script path).
 * Environment fallbacks: MOVEPEEK_SERVICE_URL, MOVEPEEK_DEBUG=1.
 */
export function parseCliArgs(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): CliCommand {
  if (args.includes('--help') || args.includes('-h')) {
    return { action: 'help' };
  }
  if (args.includes('--version') || args.includes('-v')) {
    return { action: 'version' };
  }

  let computerPlayer: string | null = null;
  let debug = env.MOVEPEEK_DEBUG === '1';
  const positionalArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--debug') {
      debug = true;
    } else if (arg === '--computer') {
      const player = args[i + 1];
      if (player === undefined || player.startsWith('-')) {
        throw new ConfigError('--computer needs a player, e.g. --computer O');
      }
      if ([...player].length !== 1) {
        throw new ConfigError(`Players are single characters, got \`${player}\``);
      }
      computerPlayer = player;
      i++;
    } else if (arg.startsWith('-')) {
      throw new ConfigError(`Unknown option ${arg}`);
    } else {
      positionalArgs.push(arg);
    }
  }

  if (positionalArgs.length > 1) {
    throw new ConfigError(`Expected one service URL, got ${positionalArgs.length} arguments`);
  }

  const rawUrl = positionalArgs[0] ?? env.MOVEPEEK_SERVICE_URL;
  if (!rawUrl) {
    throw new ConfigError('Need the base URL of the game service (argument or MOVEPEEK_SERVICE_URL)');
  }

  const parsed = ServiceUrlSchema.safeParse(rawUrl);
  if (!parsed.success) {
    throw new ConfigError(`Invalid service URL \`${rawUrl}\`: ${parsed.error.issues[0]?.message}`);
  }

  return { action: 'play', serviceUrl: parsed.data, computerPlayer, debug };
}

/**
 * Exit status after a signal: 130 for an interrupt, 0 for a polite
 * termination request
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  return signal === 'SIGINT' ? 130 : 0;
}
