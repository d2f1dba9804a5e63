export interface WeatherCondition {
  type: string;
  temperature: number; // Celsius
}

export interface EconomicState {
  prosperity: number;
  foodSupply: number;
  taxRate: number; // percent
}

/**
 * Snapshot of the world as one agent sees it at one instant.
 * Produced fresh for every workflow cycle and frozen on creation.
 */
export interface Perception {
  readonly timestamp: Date;
  readonly location: string;
  readonly weather: Readonly<WeatherCondition>;
  readonly economy: Readonly<EconomicState>;
  readonly relations: Readonly<Record<string, number>>;
}

export interface PerceptionInit {
  timestamp?: Date;
  location: string;
  weather?: Partial<WeatherCondition>;
  economy: EconomicState;
  relations: Record<string, number>;
}

export function createPerception(init: PerceptionInit): Perception {
  const relations: Record<string, number> = {};
  for (const [name, score] of Object.entries(init.relations)) {
    relations[name] = Math.trunc(score);
  }
  return Object.freeze({
    timestamp: new Date((init.timestamp ?? new Date()).getTime()),
    location: init.location,
    weather: Object.freeze({
      type: init.weather?.type || 'Clear',
      temperature: init.weather?.temperature ?? 20
    }),
    economy: Object.freeze({ ...init.economy }),
    relations: Object.freeze(relations)
  });
}

export type RelationStance = 'Allied' | 'Neutral' | 'Tense' | 'Hostile';

export function describeRelation(score: number): RelationStance {
  if (score >= 50) return 'Allied';
  if (score >= 0) return 'Neutral';
  if (score >= -50) return 'Tense';
  return 'Hostile';
}

export function formatWeather(weather: WeatherCondition): string {
  return `${weather.type} (${weather.temperature}°C)`;
}
