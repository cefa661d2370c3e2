import { DatasetLoadError, ParseError, SchemaError } from '../models/Errors';
import { FetchLike, REQUIRED_COLUMNS, fetchDataset, parseDataset } from './DatasetService';

// ============================================================================
// Helpers
// ============================================================================

type CsvRow = Record<string, string>;

const COLUMNS = [...REQUIRED_COLUMNS, 'Sh'];

function makeRow(overrides: CsvRow = {}): CsvRow {
  return {
    Player: 'Test Player',
    Squad: 'Test FC',
    Pos: 'FW',
    Age: '25',
    Min: '900',
    Gls: '5',
    Ast: '2',
    xG: '4.5',
    xAG: '1.8',
    Sh: '30',
    KP: '12',
    PrgP: '40',
    Succ: '10',
    PrgC: '25',
    TklW: '6',
    Int: '3',
    SCA: '45',
    GCA: '6',
    'Cmp%': '78.5',
    'SoT%': '40.0',
    ...overrides,
  };
}

function toCsv(rows: CsvRow[], columns: readonly string[] = COLUMNS): string {
  const quote = (value: string): string => (value.includes(',') ? `"${value}"` : value);
  return [columns.join(','), ...rows.map((row) => columns.map((column) => quote(row[column] ?? '')).join(','))].join('\n');
}

function stubFetch(response: { ok: boolean; status: number; body?: string }): FetchLike {
  return jest.fn(async () => ({
    ok: response.ok,
    status: response.status,
    text: async () => response.body ?? '',
  }));
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

// ============================================================================
// parseDataset
// ============================================================================

describe('parseDataset', () => {
  test('yields one record per data row, in file order', () => {
    const csv = toCsv([
      makeRow({ Player: 'Ana Ruiz' }),
      makeRow({ Player: 'Bea Soto' }),
      makeRow({ Player: 'Cris Mora' }),
    ]);

    const dataset = parseDataset(csv, 'season.csv');

    expect(dataset.size).toBe(3);
    expect(dataset.records.map((player) => player.name)).toEqual(['Ana Ruiz', 'Bea Soto', 'Cris Mora']);
    expect(dataset.source).toBe('season.csv');
  });

  test('maps columns to typed fields', () => {
    const dataset = parseDataset(toCsv([makeRow({ Pos: 'MF,FW', Min: '1350' })]));
    const [player] = dataset.records;

    expect(player.team).toBe('Test FC');
    expect(player.positions).toEqual(['MF', 'FW']);
    expect(player.primaryPosition).toBe('MF');
    expect(player.age).toBe(25);
    expect(player.minutes).toBe(1350);
    expect(player.stats.goals).toBe(5);
    expect(player.stats.expectedAssists).toBe(1.8);
    expect(player.stats.passCompletionPct).toBe(78.5);
    expect(player.stats.shots).toBe(30);
  });

  test('records are frozen', () => {
    const [player] = parseDataset(toCsv([makeRow()])).records;
    expect(Object.isFrozen(player)).toBe(true);
    expect(Object.isFrozen(player.stats)).toBe(true);
  });

  test('blank numeric cells read as zero', () => {
    const [player] = parseDataset(toCsv([makeRow({ Gls: '', Min: '' })])).records;
    expect(player.stats.goals).toBe(0);
    expect(player.minutes).toBe(0);
  });

  test('blank or nan squad becomes Unknown', () => {
    const dataset = parseDataset(toCsv([makeRow({ Squad: '' }), makeRow({ Squad: 'nan' })]));
    expect(dataset.records.map((player) => player.team)).toEqual(['Unknown', 'Unknown']);
  });

  test('missing or unrecognised position falls back to Unknown', () => {
    const dataset = parseDataset(toCsv([makeRow({ Pos: '' }), makeRow({ Pos: 'nan' }), makeRow({ Pos: 'ST' })]));
    expect(dataset.records.map((player) => player.primaryPosition)).toEqual(['Unknown', 'Unknown', 'Unknown']);
    expect(dataset.records[0].positions).toEqual([]);
    expect(dataset.records[2].positions).toEqual(['ST']);
  });

  test('header-only file is an empty dataset', () => {
    const dataset = parseDataset(COLUMNS.join(','));
    expect(dataset.size).toBe(0);
  });
});

// ============================================================================
// Schema and parse failures
// ============================================================================

describe('parseDataset failures', () => {
  test('missing required column raises SchemaError naming it', () => {
    const columns = COLUMNS.filter((column) => column !== 'xAG');

    expect(() => parseDataset(toCsv([makeRow()], columns), 'season.csv')).toThrow(SchemaError);
    try {
      parseDataset(toCsv([makeRow()], columns), 'season.csv');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaError);
      if (error instanceof SchemaError) {
        expect(error.missingColumns).toEqual(['xAG']);
        expect(error.message).toBe('Missing required column(s): xAG');
        expect(error.source).toBe('season.csv');
      }
    }
  });

  test('lists every missing column in schema order', () => {
    const columns = COLUMNS.filter((column) => column !== 'Min' && column !== 'Player');
    expect(() => parseDataset(toCsv([makeRow()], columns))).toThrow('Missing required column(s): Player, Min');
  });

  test('schema errors are dataset load errors', () => {
    const columns = COLUMNS.filter((column) => column !== 'Gls');
    expect(() => parseDataset(toCsv([makeRow()], columns))).toThrow(DatasetLoadError);
  });

  test('non-numeric cell raises ParseError with row and column', () => {
    const csv = toCsv([makeRow(), makeRow({ Gls: 'abc' })]);

    expect(() => parseDataset(csv)).toThrow(ParseError);
    expect(() => parseDataset(csv)).toThrow('Row 2, column "Gls": "abc" is not a number');
  });

  test('hex, binary and octal literals are not numbers', () => {
    expect(() => parseDataset(toCsv([makeRow({ Gls: '0x1F' })]))).toThrow(
      'Row 1, column "Gls": "0x1F" is not a number'
    );
    expect(() => parseDataset(toCsv([makeRow({ Ast: '0b11' })]))).toThrow(ParseError);
    expect(() => parseDataset(toCsv([makeRow({ KP: '0o7' })]))).toThrow(ParseError);
    expect(() => parseDataset(toCsv([makeRow({ xG: 'Infinity' })]))).toThrow(ParseError);
  });

  test('signed, fractional and exponent decimals are accepted', () => {
    const [player] = parseDataset(toCsv([makeRow({ Gls: '+5', xG: '.5', PrgP: '1e2' })])).records;
    expect(player.stats.goals).toBe(5);
    expect(player.stats.expectedGoals).toBe(0.5);
    expect(player.stats.progressivePasses).toBe(100);
  });

  test('fractional or negative minutes are rejected', () => {
    expect(() => parseDataset(toCsv([makeRow({ Min: '90.5' })]))).toThrow(
      'Row 1, column "Min": "90.5" must be a non-negative whole number'
    );
    expect(() => parseDataset(toCsv([makeRow({ Min: '-10' })]))).toThrow(ParseError);
  });
});

// ============================================================================
// Optional shots column
// ============================================================================

describe('optional Sh column', () => {
  const columns = COLUMNS.filter((column) => column !== 'Sh');

  test('absent column leaves shots undefined and disables the stat', () => {
    const dataset = parseDataset(toCsv([makeRow()], columns));

    expect(dataset.records[0].stats.shots).toBeUndefined();
    expect(dataset.hasStat('shots')).toBe(false);
    expect(dataset.hasStat('goals')).toBe(true);
  });

  test('absent column logs a warning', () => {
    parseDataset(toCsv([makeRow()], columns), 'season.csv');
    expect(console.warn).toHaveBeenCalledWith('⚠️ season.csv: optional column "Sh" not found, shot metrics disabled');
  });

  test('present column enables the stat', () => {
    expect(parseDataset(toCsv([makeRow()])).hasStat('shots')).toBe(true);
  });
});

// ============================================================================
// fetchDataset
// ============================================================================

describe('fetchDataset', () => {
  test('parses the fetched text', async () => {
    const fetchFn = stubFetch({ ok: true, status: 200, body: toCsv([makeRow(), makeRow({ Player: 'Other' })]) });

    const dataset = await fetchDataset('/data/season.csv', fetchFn);

    expect(fetchFn).toHaveBeenCalledWith('/data/season.csv');
    expect(dataset.size).toBe(2);
    expect(dataset.source).toBe('/data/season.csv');
  });

  test('HTTP failure raises DatasetLoadError naming the file', async () => {
    const fetchFn = stubFetch({ ok: false, status: 404 });

    await expect(fetchDataset('/data/missing.csv', fetchFn)).rejects.toThrow(DatasetLoadError);
    await expect(fetchDataset('/data/missing.csv', fetchFn)).rejects.toThrow(
      'The file /data/missing.csv was not found (HTTP 404). Make sure it is in the public/data directory.'
    );
  });

  test('network failure raises DatasetLoadError', async () => {
    const fetchFn: FetchLike = jest.fn(async () => {
      throw new Error('connection refused');
    });

    await expect(fetchDataset('/data/season.csv', fetchFn)).rejects.toThrow(
      'Could not fetch /data/season.csv: connection refused'
    );
  });

  test('schema errors pass through', async () => {
    const fetchFn = stubFetch({ ok: true, status: 200, body: 'Player,Squad\nAna,Test FC' });
    await expect(fetchDataset('/data/season.csv', fetchFn)).rejects.toThrow(SchemaError);
  });
});
