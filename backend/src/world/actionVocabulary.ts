// Action types the bundled executor understands and the prompts offer.
export const DEFAULT_ACTION_TYPES = [
  'Wait',
  'LogReasoning',
  'StartSiege',
  'GiveGold',
  'ChangeRelation',
  'MoveArmy',
  'RecruitTroops',
  'Trade',
  'Patrol',
  'Retreat',
  'Attack',
  'Defend',
  'Hide',
  'Work'
] as const;

export type DefaultActionType = typeof DEFAULT_ACTION_TYPES[number];
