import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { Ajv } from 'ajv';
import { ConfigError, formatErrors } from '../configManager.js';
import type { AgentProfile } from '../interfaces/WorldInterface.js';
import { InMemoryAgentDirectory } from './InMemoryAgentDirectory.js';
import { MockActionExecutor } from './MockActionExecutor.js';
import { MockWorldSensor, MockWorldSensorOptions } from './MockWorldSensor.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const ROSTER_PATH = path.join(__dirname, '..', '..', 'config', 'roster.json');
const ROSTER_SCHEMA_PATH = path.join(__dirname, '..', '..', 'config', 'rosterSchema.json');

const ajv = new Ajv({ allErrors: true, strict: false });
const validateRoster = ajv.compile<AgentProfile[]>(JSON.parse(fs.readFileSync(ROSTER_SCHEMA_PATH, 'utf-8')));

export function loadRoster(file: string = ROSTER_PATH): AgentProfile[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Failed to read roster ${file}`, [e instanceof Error ? e.message : String(e)]);
  }
  if (!validateRoster(parsed)) {
    throw new ConfigError(`Invalid roster ${file}`, formatErrors(validateRoster.errors));
  }
  return parsed;
}

export interface MockWorld {
  sensor: MockWorldSensor;
  executor: MockActionExecutor;
  directory: InMemoryAgentDirectory;
  /** Toggled by hosts and tests to simulate loading screens or battles. */
  ready: boolean;
  isWorldReady: () => boolean;
}

export function createMockWorld(options: MockWorldSensorOptions & { roster?: AgentProfile[] } = {}): MockWorld {
  const world: MockWorld = {
    sensor: new MockWorldSensor(options),
    executor: new MockActionExecutor(),
    directory: new InMemoryAgentDirectory(options.roster ?? loadRoster()),
    ready: true,
    isWorldReady: () => world.ready
  };
  return world;
}
