/**
 * DatasetService: turns the processed season CSV into a Dataset.
 *
 * The column schema is fixed and checked once here; everything downstream
 * works on typed PlayerRecords.
 */

import Papa from 'papaparse';
import { CoreStatKey, CoreStats, PlayerRecord, getPrimaryPosition } from '../models/Player';
import { Dataset } from '../models/Dataset';
import { DatasetLoadError, ParseError, SchemaError } from '../models/Errors';

export const IDENTITY_COLUMNS = {
  name: 'Player',
  team: 'Squad',
  positions: 'Pos',
  age: 'Age',
  minutes: 'Min',
} as const;

export const STAT_COLUMNS: Record<CoreStatKey, string> = {
  goals: 'Gls',
  assists: 'Ast',
  expectedGoals: 'xG',
  expectedAssists: 'xAG',
  keyPasses: 'KP',
  progressivePasses: 'PrgP',
  successfulDribbles: 'Succ',
  progressiveCarries: 'PrgC',
  tacklesWon: 'TklW',
  interceptions: 'Int',
  shotCreatingActions: 'SCA',
  goalCreatingActions: 'GCA',
  passCompletionPct: 'Cmp%',
  shotsOnTargetPct: 'SoT%',
};

export const SHOTS_COLUMN = 'Sh';

export const REQUIRED_COLUMNS: readonly string[] = [
  ...Object.values(IDENTITY_COLUMNS),
  ...Object.values(STAT_COLUMNS),
];

type CsvRow = Record<string, string | undefined>;

/** Anything fetch-shaped; lets tests hand in a stub. */
export type FetchLike = (url: string) => Promise<Pick<Response, 'ok' | 'status' | 'text'>>;

/**
 * Parse header-row CSV text into a Dataset.
 *
 * @throws SchemaError when required columns are missing
 * @throws ParseError when a numeric cell holds something else
 */
export function parseDataset(text: string, source = 'dataset'): Dataset {
  const parsed = Papa.parse<CsvRow>(text, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim(),
  });

  const fields = parsed.meta.fields ?? [];
  const missing = REQUIRED_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new SchemaError(missing, source);
  }

  const structural = parsed.errors.find((error) => error.type === 'Quotes' || error.type === 'FieldMismatch');
  if (structural) {
    const row = structural.row === undefined ? '?' : String(structural.row + 1);
    throw new DatasetLoadError(`Row ${row}: ${structural.message}`, source);
  }

  const hasShots = fields.includes(SHOTS_COLUMN);
  if (!hasShots) {
    console.warn(`⚠️ ${source}: optional column "${SHOTS_COLUMN}" not found, shot metrics disabled`);
  }

  const records = parsed.data.map((row, index) => toPlayerRecord(row, index + 1, hasShots, source));
  console.log(`📊 Loaded ${records.length} player rows from ${source}`);

  return new Dataset(records, {
    source,
    availableStats: hasShots ? ['shots'] : [],
  });
}

/**
 * Browser path: fetch the CSV served from public/data and parse it.
 */
export async function fetchDataset(url: string, fetchFn: FetchLike = fetch): Promise<Dataset> {
  let response: Awaited<ReturnType<FetchLike>>;
  try {
    response = await fetchFn(url);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DatasetLoadError(`Could not fetch ${url}: ${reason}`, url);
  }

  if (!response.ok) {
    throw new DatasetLoadError(
      `The file ${url} was not found (HTTP ${response.status}). Make sure it is in the public/data directory.`,
      url
    );
  }

  return parseDataset(await response.text(), url);
}

function toPlayerRecord(row: CsvRow, rowNumber: number, hasShots: boolean, source: string): PlayerRecord {
  const read = (column: string): number => parseNumber(row[column], rowNumber, column, source);

  const minutes = read(IDENTITY_COLUMNS.minutes);
  if (!Number.isInteger(minutes) || minutes < 0) {
    throw new ParseError(
      rowNumber,
      IDENTITY_COLUMNS.minutes,
      (row[IDENTITY_COLUMNS.minutes] ?? '').trim(),
      source,
      'must be a non-negative whole number'
    );
  }

  const positions = parsePositions(row[IDENTITY_COLUMNS.positions]);
  const stats: CoreStats = readCoreStats(read);

  return {
    name: (row[IDENTITY_COLUMNS.name] ?? '').trim(),
    team: normalizeTeam(row[IDENTITY_COLUMNS.team]),
    positions,
    primaryPosition: getPrimaryPosition(positions),
    age: read(IDENTITY_COLUMNS.age),
    minutes,
    stats: Object.freeze(hasShots ? { ...stats, shots: read(SHOTS_COLUMN) } : stats),
  };
}

function readCoreStats(read: (column: string) => number): CoreStats {
  return {
    goals: read(STAT_COLUMNS.goals),
    assists: read(STAT_COLUMNS.assists),
    expectedGoals: read(STAT_COLUMNS.expectedGoals),
    expectedAssists: read(STAT_COLUMNS.expectedAssists),
    keyPasses: read(STAT_COLUMNS.keyPasses),
    progressivePasses: read(STAT_COLUMNS.progressivePasses),
    successfulDribbles: read(STAT_COLUMNS.successfulDribbles),
    progressiveCarries: read(STAT_COLUMNS.progressiveCarries),
    tacklesWon: read(STAT_COLUMNS.tacklesWon),
    interceptions: read(STAT_COLUMNS.interceptions),
    shotCreatingActions: read(STAT_COLUMNS.shotCreatingActions),
    goalCreatingActions: read(STAT_COLUMNS.goalCreatingActions),
    passCompletionPct: read(STAT_COLUMNS.passCompletionPct),
    shotsOnTargetPct: read(STAT_COLUMNS.shotsOnTargetPct),
  };
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

// Blank cells are zeros in the processed export. Anything other than a plain
// decimal (hex, binary, octal, Infinity) is rejected.
function parseNumber(raw: string | undefined, rowNumber: number, column: string, source: string): number {
  const text = (raw ?? '').trim();
  if (text === '') {
    return 0;
  }

  const value = DECIMAL_PATTERN.test(text) ? Number(text) : Number.NaN;
  if (!Number.isFinite(value)) {
    throw new ParseError(rowNumber, column, text, source);
  }
  return value;
}

function parsePositions(raw: string | undefined): readonly string[] {
  const text = (raw ?? '').trim();
  if (text === '' || text.toLowerCase() === 'nan') {
    return Object.freeze([]);
  }
  return Object.freeze(
    text
      .split(',')
      .map((position) => position.trim())
      .filter((position) => position.length > 0)
  );
}

function normalizeTeam(raw: string | undefined): string {
  const team = (raw ?? '').trim();
  return team === '' || team.toLowerCase() === 'nan' ? 'Unknown' : team;
}
