/**
 * Option handling shared by every CLI command
 */

import path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { EventAgent } from '../agent/index.js';
import { loadConfig, loadConfigOrDefault, type Config } from '../config/index.js';

export interface CommonOptions {
  config?: string;
  events?: string;
  database?: string;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to a config file (default: nearest event-scout.config.json)')
    .option('-e, --events <path>', 'Path to the events CSV')
    .option('-d, --database <path>', 'Path to the ratings database');
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return parsed;
}

export async function resolveConfig(options: CommonOptions): Promise<Config> {
  if (options.config) {
    return loadConfig(options.config);
  }
  return loadConfigOrDefault(process.cwd());
}

/**
 * Flags win over environment variables, which win over the config file
 */
export function resolvePaths(options: CommonOptions, config: Config): { eventsPath: string; databasePath: string } {
  const eventsPath = options.events
    ?? process.env['EVENT_SCOUT_EVENTS']
    ?? config.data.eventsCsv;

  const databasePath = options.database
    ?? process.env['EVENT_SCOUT_DATABASE']
    ?? config.output.database;

  return {
    eventsPath: path.resolve(eventsPath),
    databasePath: path.resolve(databasePath),
  };
}

export async function openAgent(options: CommonOptions): Promise<EventAgent> {
  const config = await resolveConfig(options);
  const { eventsPath, databasePath } = resolvePaths(options, config);

  const agent = new EventAgent({ eventsPath, databasePath, config });
  await agent.initialize();
  return agent;
}

export function errorMessage(error: unknown): unknown {
  return error instanceof Error ? error.message : error;
}
