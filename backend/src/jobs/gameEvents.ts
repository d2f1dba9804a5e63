// Events a host reports for an agent. The queue accepts any kind string;
// these are the ones the prompts and the mock world know about.
export const GAME_EVENT_KINDS = [
  'WarDeclared',
  'PeaceMade',
  'BattleWon',
  'BattleLost',
  'SiegeStarted',
  'SettlementUnderSiege',
  'SettlementCaptured',
  'SettlementLost',
  'VillageRaided',
  'AllyDied',
  'EnemyCaptured',
  'AllyCaptured',
  'Released',
  'VassalDefected',
  'NewVassal'
] as const;

export type GameEventKind = typeof GAME_EVENT_KINDS[number];

export function isGameEventKind(value: string): value is GameEventKind {
  return GAME_EVENT_KINDS.some(kind => kind === value);
}

const DEFAULT_DESCRIPTIONS: Record<GameEventKind, string> = {
  WarDeclared: 'War has been declared on your realm.',
  PeaceMade: 'Peace has been made with a former enemy.',
  BattleWon: 'Your forces won a battle.',
  BattleLost: 'Your forces were defeated in battle.',
  SiegeStarted: 'You have begun a siege.',
  SettlementUnderSiege: 'One of your settlements is under siege.',
  SettlementCaptured: 'You captured a settlement.',
  SettlementLost: 'You lost a settlement to the enemy.',
  VillageRaided: 'One of your villages was raided.',
  AllyDied: 'An ally has died.',
  EnemyCaptured: 'You captured an enemy lord.',
  AllyCaptured: 'An ally has been taken prisoner.',
  Released: 'You have been released from captivity.',
  VassalDefected: 'A vassal clan has defected to another realm.',
  NewVassal: 'A new clan has sworn fealty to your realm.'
};

/** Fallback text when a host reports a known event without a description. */
export function defaultEventDescription(kind: string): string {
  return isGameEventKind(kind) ? DEFAULT_DESCRIPTIONS[kind] : `Something happened: ${kind}.`;
}
