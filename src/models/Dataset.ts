import {
  PlayerRecord,
  Position,
  OptionalStatKey,
  StatKey,
  isOptionalStat,
  sortPositions,
} from './Player';

/**
 * A derived, read-only subset of a dataset. The dataset's own records are a
 * view too, so every engine operation accepts either.
 */
export type FilteredView = readonly PlayerRecord[];

export interface DatasetOptions {
  /** Where the rows came from (file path or URL), for messages */
  source: string;
  /** Optional statistic columns present in the source */
  availableStats?: Iterable<OptionalStatKey>;
}

/**
 * The full season table, loaded once and shared read-only for a session.
 * Constructed explicitly and handed to whatever needs it.
 */
export class Dataset {
  readonly records: FilteredView;
  readonly source: string;
  private readonly optionalStats: ReadonlySet<OptionalStatKey>;

  constructor(records: readonly PlayerRecord[], options: DatasetOptions) {
    // Frozen copies; the caller's objects stay as they were
    this.records = Object.freeze(
      records.map((record) =>
        Object.freeze({
          ...record,
          positions: Object.freeze([...record.positions]),
          stats: Object.freeze({ ...record.stats }),
        })
      )
    );
    this.source = options.source;
    this.optionalStats = new Set(options.availableStats ?? []);
  }

  get size(): number {
    return this.records.length;
  }

  hasStat(stat: StatKey): boolean {
    return isOptionalStat(stat) ? this.optionalStats.has(stat) : true;
  }

  /**
   * Distinct team names, alphabetical, without the excluded pseudo-squads.
   */
  teams(excluded: readonly string[] = []): string[] {
    const teams = new Set<string>();
    for (const record of this.records) {
      if (!excluded.includes(record.team)) {
        teams.add(record.team);
      }
    }
    return Array.from(teams).sort((a, b) => a.localeCompare(b));
  }

  positions(): Position[] {
    return sortPositions(this.records.map((record) => record.primaryPosition));
  }

  maxMinutes(): number {
    return this.records.reduce((max, record) => Math.max(max, record.minutes), 0);
  }
}
