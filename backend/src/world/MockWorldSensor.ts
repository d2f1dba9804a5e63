import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { createLogger, NAMESPACES } from '../logging.js';
import type { WorldSensor } from '../interfaces/WorldInterface.js';
import { createPerception, Perception, WeatherCondition } from '../types/Perception.js';
import { raceAbort } from '../utils/abort.js';
import { Archetype, archetypeOf } from './archetypes.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const sensorLog = createLogger(NAMESPACES.world.sensor);

type Range = [number, number];

interface Scenario {
  weather?: WeatherCondition;
  economy: { prosperity: Range; foodSupply: Range; taxRate: Range };
  relations: Record<string, Range>;
  location?: string;
}

export interface ScenarioBook {
  scenarios: Record<Archetype, Scenario>;
  randomWeather: { types: string[]; temperature: Range };
  factionSeats: Record<string, string>;
  defaultSeat: string;
}

export const SCENARIO_PATH = path.join(__dirname, '..', '..', 'config', 'scenarios.json');

export function loadScenarioBook(file: string = SCENARIO_PATH): ScenarioBook {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

/** Integer in [min, max); a degenerate range yields min. */
export function randomInRange([min, max]: Range, random: () => number): number {
  if (max <= min) return min;
  return min + Math.floor(random() * (max - min));
}

export interface MockWorldSensorOptions {
  random?: () => number;
  now?: () => number;
  latencyMs?: number;
  scenarios?: ScenarioBook;
}

/**
 * Produces a plausible snapshot from the agent's archetype: rulers sit at their
 * faction's seat, merchants at market, and so on. Numbers are drawn from the
 * scenario ranges with the injected random source.
 */
export class MockWorldSensor implements WorldSensor {
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly latencyMs: number;
  private readonly book: ScenarioBook;

  constructor(options: MockWorldSensorOptions = {}) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.latencyMs = options.latencyMs ?? 0;
    this.book = options.scenarios ?? loadScenarioBook();
  }

  async perceive(agentId: string, signal?: AbortSignal): Promise<Perception> {
    signal?.throwIfAborted();
    if (this.latencyMs > 0) {
      await raceAbort(new Promise<void>(resolve => setTimeout(resolve, this.latencyMs)), signal);
    }
    const archetype = archetypeOf(agentId);
    const scenario = this.book.scenarios[archetype];

    const relations: Record<string, number> = {};
    for (const [name, range] of Object.entries(scenario.relations)) {
      relations[name] = randomInRange(range, this.random);
    }

    const perception = createPerception({
      timestamp: new Date(this.now()),
      location: archetype === 'ruler' ? this.seatFor(agentId) : scenario.location ?? this.book.defaultSeat,
      weather: scenario.weather ?? this.randomWeather(),
      economy: {
        prosperity: randomInRange(scenario.economy.prosperity, this.random),
        foodSupply: randomInRange(scenario.economy.foodSupply, this.random),
        taxRate: randomInRange(scenario.economy.taxRate, this.random)
      },
      relations
    });
    sensorLog('%s (%s) perceives %s', agentId, archetype, perception.location);
    return perception;
  }

  seatFor(agentId: string): string {
    for (const [faction, seat] of Object.entries(this.book.factionSeats)) {
      if (agentId.includes(faction)) return seat;
    }
    return this.book.defaultSeat;
  }

  private randomWeather(): WeatherCondition {
    const { types, temperature } = this.book.randomWeather;
    const type = types[randomInRange([0, types.length], this.random)] ?? 'Clear';
    return { type, temperature: randomInRange(temperature, this.random) };
  }
}
