export type Position = 'GK' | 'DF' | 'MF' | 'FW' | 'Unknown';

/** Display order for position pickers; anything unlisted sorts last. */
export const POSITION_ORDER: readonly Position[] = ['GK', 'DF', 'MF', 'FW', 'Unknown'];

export const PositionLabels: Record<Position, string> = {
  GK: 'Goalkeeper',
  DF: 'Defender',
  MF: 'Midfielder',
  FW: 'Forward',
  Unknown: 'Unknown',
};

/**
 * Statistics that every dataset must carry.
 */
export interface CoreStats {
  goals: number;
  assists: number;
  expectedGoals: number;
  expectedAssists: number;
  keyPasses: number;
  progressivePasses: number;
  successfulDribbles: number;
  progressiveCarries: number;
  tacklesWon: number;
  interceptions: number;
  shotCreatingActions: number;
  goalCreatingActions: number;
  passCompletionPct: number;  // Already a rate, never normalized
  shotsOnTargetPct: number;   // Already a rate, never normalized
}

/**
 * Statistics some exports leave out. Undefined when the column is absent.
 */
export interface OptionalStats {
  shots?: number;
}

export type PlayerStats = Readonly<CoreStats & OptionalStats>;

export type CoreStatKey = keyof CoreStats;
export type OptionalStatKey = keyof OptionalStats;
export type StatKey = CoreStatKey | OptionalStatKey;

export const OPTIONAL_STATS: readonly OptionalStatKey[] = ['shots'];

export function isOptionalStat(stat: StatKey): stat is OptionalStatKey {
  return OPTIONAL_STATS.some((optional) => optional === stat);
}

/**
 * One row per player per season-team.
 */
export interface PlayerRecord {
  readonly name: string;
  readonly team: string;
  /** Positions as listed in the source, e.g. ['FW', 'MF'] */
  readonly positions: readonly string[];
  readonly primaryPosition: Position;
  readonly age: number;
  readonly minutes: number;
  readonly stats: PlayerStats;
}

export function isPosition(value: string): value is Position {
  return POSITION_ORDER.some((position) => position === value);
}

/**
 * First listed position wins ("FW,MF" → FW). Blank or unrecognised → Unknown.
 */
export function getPrimaryPosition(positions: readonly string[]): Position {
  const first = positions[0]?.trim().toUpperCase() ?? '';
  return isPosition(first) ? first : 'Unknown';
}

export function getPositionLabel(position: Position): string {
  return PositionLabels[position] || 'Unknown';
}

export function sortPositions(positions: Iterable<Position>): Position[] {
  return Array.from(new Set(positions)).sort(
    (a, b) => POSITION_ORDER.indexOf(a) - POSITION_ORDER.indexOf(b)
  );
}

export function getStat(player: PlayerRecord, stat: StatKey): number | undefined {
  return player.stats[stat];
}
