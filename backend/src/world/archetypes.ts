export type Archetype = 'ruler' | 'merchant' | 'commander' | 'peasant' | 'soldier' | 'wanderer';

const KEYWORDS: ReadonlyArray<readonly [Archetype, readonly string[]]> = [
  ['ruler', ['king', 'queen', 'lord', 'lady', 'ruler']],
  ['merchant', ['merchant', 'trader']],
  ['commander', ['commander', 'general']],
  ['peasant', ['villager', 'peasant']],
  ['soldier', ['archer', 'soldier']]
];

/** Guesses an agent's role from its id, e.g. "Lord_Aldric_Vlandia" -> ruler. */
export function archetypeOf(agentId: string): Archetype {
  const lower = agentId.toLowerCase();
  for (const [archetype, words] of KEYWORDS) {
    if (words.some(word => lower.includes(word))) return archetype;
  }
  return 'wanderer';
}
