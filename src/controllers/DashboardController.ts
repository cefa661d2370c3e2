import { DashboardConfig, DEFAULT_DASHBOARD_CONFIG } from '../config/dashboard';
import { MetricDefinition, availableMetrics, requireMetric } from '../config/metrics';
import { Dataset, FilteredView } from '../models/Dataset';
import { PlayerNotFoundError } from '../models/Errors';
import { PlayerRecord, Position } from '../models/Player';
import { FilterCriteria, describeFilters, filterPlayers, listPlayerNames } from '../services/FilterService';
import {
  PlayerComparison,
  RankedPlayer,
  ScatterPoint,
  compare,
  rank,
  scatterPairs,
  squadOverview,
} from '../services/RankingService';

export type AnalysisMode = 'top-performers' | 'player-comparison' | 'opponent-analysis';

export const ANALYSIS_MODES: ReadonlyArray<{ id: AnalysisMode; label: string }> = [
  { id: 'top-performers', label: 'Identify Top Performers' },
  { id: 'player-comparison', label: 'Compare Players' },
  { id: 'opponent-analysis', label: 'Analyze Opponent' },
];

export interface DashboardState {
  mode: AnalysisMode;
  positions: Position[];
  minMinutes: number;
  scatterXMetric: string;
  scatterYMetric: string;
  barMetric: string;
  playerA: string | null;
  playerB: string | null;
  opponentTeam: string | null;
  squadMetric: string;
}

export type TopPerformersResult =
  | { status: 'empty'; message: string }
  | {
      status: 'ready';
      metricX: MetricDefinition;
      metricY: MetricDefinition;
      barMetric: MetricDefinition;
      points: ScatterPoint[];
      ranking: RankedPlayer[];
      rows: FilteredView;
    };

export type ComparisonResult =
  | { status: 'empty'; message: string }
  | { status: 'single'; playerNames: string[]; playerA: string; message: string }
  | { status: 'error'; playerNames: string[]; playerA: string; playerB: string; message: string }
  | { status: 'ready'; playerNames: string[]; playerA: string; playerB: string; comparison: PlayerComparison };

export type OpponentResult =
  | { status: 'empty'; teams: string[]; team: string | null; metric: MetricDefinition; message: string }
  | { status: 'ready'; teams: string[]; team: string; metric: MetricDefinition; squad: PlayerRecord[] };

export type StorageLike = Pick<Storage, 'getItem' | 'setItem'>;

export type StateCallback = (state: Readonly<DashboardState>, summary: string) => void;
export type TopPerformersCallback = (result: TopPerformersResult) => void;
export type ComparisonCallback = (result: ComparisonResult) => void;
export type OpponentCallback = (result: OpponentResult) => void;
export type ErrorCallback = (error: Error) => void;

export const MODE_PREF_KEY = 'dashboard-analysis-mode';

function isAnalysisMode(value: string | null): value is AnalysisMode {
  return ANALYSIS_MODES.some((mode) => mode.id === value);
}

/**
 * One session's selections. Every change recomputes the active mode's result
 * from the shared read-only dataset and pushes it to the views.
 */
export class DashboardController {
  private readonly dataset: Dataset;
  private readonly config: Readonly<DashboardConfig>;
  private readonly storage: StorageLike | null;
  private state: DashboardState;

  private onStateChange?: StateCallback;
  private onTopPerformers?: TopPerformersCallback;
  private onComparison?: ComparisonCallback;
  private onOpponent?: OpponentCallback;
  private onError?: ErrorCallback;

  constructor(
    dataset: Dataset,
    config: Readonly<DashboardConfig> = DEFAULT_DASHBOARD_CONFIG,
    storage: StorageLike | null = null
  ) {
    this.dataset = dataset;
    this.config = config;
    this.storage = storage;
    this.state = {
      mode: this.restoreMode(),
      positions: [...config.defaultPositions],
      minMinutes: config.defaultMinMinutes,
      scatterXMetric: config.scatterXMetric,
      scatterYMetric: config.scatterYMetric,
      barMetric: config.barMetric,
      playerA: null,
      playerB: null,
      opponentTeam: null,
      squadMetric: config.squadMetric,
    };
  }

  setCallbacks(callbacks: {
    onStateChange?: StateCallback;
    onTopPerformers?: TopPerformersCallback;
    onComparison?: ComparisonCallback;
    onOpponent?: OpponentCallback;
    onError?: ErrorCallback;
  }): void {
    this.onStateChange = callbacks.onStateChange;
    this.onTopPerformers = callbacks.onTopPerformers;
    this.onComparison = callbacks.onComparison;
    this.onOpponent = callbacks.onOpponent;
    this.onError = callbacks.onError;
  }

  getState(): Readonly<DashboardState> {
    return { ...this.state, positions: [...this.state.positions] };
  }

  getCriteria(): FilterCriteria {
    return { positions: this.state.positions, minMinutes: this.state.minMinutes };
  }

  getFilteredView(): FilteredView {
    return filterPlayers(this.dataset.records, this.getCriteria());
  }

  getMetrics(): MetricDefinition[] {
    return availableMetrics(this.dataset);
  }

  setMode(mode: AnalysisMode): void {
    this.state.mode = mode;
    this.saveMode(mode);
    this.refresh();
  }

  setPositions(positions: Position[]): void {
    this.state.positions = [...positions];
    this.dropStalePicks();
    this.refresh();
  }

  setMinMinutes(minMinutes: number): void {
    if (!Number.isFinite(minMinutes) || minMinutes < 0) {
      throw new Error(`Minimum minutes must be a non-negative number, got ${minMinutes}`);
    }
    this.state.minMinutes = minMinutes;
    this.dropStalePicks();
    this.refresh();
  }

  setScatterMetrics(xKey: string, yKey: string): void {
    requireMetric(xKey);
    requireMetric(yKey);
    this.state.scatterXMetric = xKey;
    this.state.scatterYMetric = yKey;
    this.refresh();
  }

  setBarMetric(key: string): void {
    requireMetric(key);
    this.state.barMetric = key;
    this.refresh();
  }

  selectPlayers(playerA: string | null, playerB: string | null): void {
    this.state.playerA = playerA;
    this.state.playerB = playerB;
    this.refresh();
  }

  setOpponentTeam(team: string): void {
    this.state.opponentTeam = team;
    this.refresh();
  }

  setSquadMetric(key: string): void {
    requireMetric(key);
    this.state.squadMetric = key;
    this.refresh();
  }

  /**
   * Recompute the active mode and notify listeners.
   */
  refresh(): void {
    try {
      this.onStateChange?.(this.getState(), describeFilters(this.getCriteria()));

      switch (this.state.mode) {
        case 'top-performers':
          this.onTopPerformers?.(this.computeTopPerformers());
          break;
        case 'player-comparison':
          this.onComparison?.(this.computeComparison());
          break;
        case 'opponent-analysis':
          this.onOpponent?.(this.computeOpponent());
          break;
      }
    } catch (error) {
      this.onError?.(error instanceof Error ? error : new Error(String(error)));
    }
  }

  computeTopPerformers(): TopPerformersResult {
    const metricX = requireMetric(this.state.scatterXMetric);
    const metricY = requireMetric(this.state.scatterYMetric);
    const barMetric = requireMetric(this.state.barMetric);

    if (![metricX, metricY, barMetric].every((metric) => this.dataset.hasStat(metric.stat))) {
      return { status: 'empty', message: 'One or more selected metrics are not available in this dataset.' };
    }

    const rows = this.getFilteredView();
    if (rows.length === 0) {
      return { status: 'empty', message: 'No players match the current filter criteria.' };
    }

    return {
      status: 'ready',
      metricX,
      metricY,
      barMetric,
      points: scatterPairs(rows, metricX, metricY),
      ranking: rank(rows, barMetric, this.config.topN),
      rows,
    };
  }

  computeComparison(): ComparisonResult {
    const view = this.getFilteredView();
    const playerNames = listPlayerNames(view);

    if (playerNames.length === 0) {
      return { status: 'empty', message: 'No players match the current filter criteria to compare.' };
    }

    const playerA = this.state.playerA ?? playerNames[0];
    const others = playerNames.filter((name) => name !== playerA);
    const playerB = this.state.playerB ?? others[0] ?? null;
    this.state.playerA = playerA;
    this.state.playerB = playerB;

    if (playerB === null) {
      return {
        status: 'single',
        playerNames,
        playerA,
        message: `Only ${playerA} matches the current filters. Select another player or adjust filters.`,
      };
    }

    try {
      const comparison = compare(view, playerA, playerB, this.getMetrics());
      return { status: 'ready', playerNames, playerA, playerB, comparison };
    } catch (error) {
      if (error instanceof PlayerNotFoundError) {
        console.warn(`⚠️ ${error.message}`);
        return { status: 'error', playerNames, playerA, playerB, message: error.message };
      }
      throw error;
    }
  }

  computeOpponent(): OpponentResult {
    const teams = this.dataset.teams(this.config.excludedTeams);
    const metric = requireMetric(this.state.squadMetric);
    const team = this.state.opponentTeam ?? teams[0] ?? null;
    this.state.opponentTeam = team;

    if (team === null) {
      return { status: 'empty', teams, team, metric, message: 'No teams available in this dataset.' };
    }

    if (!this.dataset.hasStat(metric.stat)) {
      return {
        status: 'empty',
        teams,
        team,
        metric,
        message: `Selected highlight metric '${metric.label}' is not available in this dataset.`,
      };
    }

    // Scouting an opponent looks at the whole squad, not the sidebar selection
    const squad = squadOverview(this.dataset.records, team, metric);
    if (squad.length === 0) {
      return { status: 'empty', teams, team, metric, message: `No data found for team: ${team}` };
    }

    return { status: 'ready', teams, team, metric, squad };
  }

  private dropStalePicks(): void {
    const names = new Set(this.getFilteredView().map((player) => player.name));
    if (this.state.playerA !== null && !names.has(this.state.playerA)) {
      this.state.playerA = null;
    }
    if (this.state.playerB !== null && !names.has(this.state.playerB)) {
      this.state.playerB = null;
    }
  }

  private restoreMode(): AnalysisMode {
    const saved = this.storage?.getItem(MODE_PREF_KEY) ?? null;
    return isAnalysisMode(saved) ? saved : 'top-performers';
  }

  private saveMode(mode: AnalysisMode): void {
    this.storage?.setItem(MODE_PREF_KEY, mode);
  }
}
