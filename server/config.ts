import path from 'path';
import { GAME_CONSTANTS, validateParticipants } from '@shared';

export interface ServerConfig {
  port: number;
  clientUrl: string;
  dataDir: string;
  dataFile: string;
  participants: string[];
  debug: boolean;
  production: boolean;
  clientDist: string;
}

export class ConfigError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid configuration:\n  - ${errors.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

export function parseParticipants(value: string | undefined): string[] {
  if (value === undefined || value.trim().length === 0) {
    return [...GAME_CONSTANTS.DEFAULT_PARTICIPANTS];
  }
  return value
    .split(',')
    .map(name => name.trim())
    .filter(name => name.length > 0);
}

/** Reads settings from the environment (dotenv has already filled it by the time this runs). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const errors: string[] = [];

  const port = Number(env['PORT'] || '3000');
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    errors.push(`PORT must be an integer between 1 and 65535, got "${env['PORT']}"`);
  }

  const dataFile = env['DATA_FILE'] || 'data.json';
  if (path.basename(dataFile) !== dataFile) {
    errors.push(`DATA_FILE must be a file name without directories, got "${dataFile}"`);
  }

  const participants = parseParticipants(env['PARTICIPANTS']);
  const validation = validateParticipants(participants);
  errors.push(...validation.errors);

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  return {
    port,
    clientUrl: env['CLIENT_URL'] || 'http://localhost:5173',
    dataDir: env['DATA_DIR'] || './data',
    dataFile,
    participants,
    debug: env['DEBUG'] === 'true',
    production: env['NODE_ENV'] === 'production',
    clientDist: path.resolve(env['CLIENT_DIST'] || 'dist/client'),
  };
}
