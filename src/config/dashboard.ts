import { Position, isPosition } from '../models/Player';
import { getMetric } from './metrics';

export interface DashboardConfig {
  leagueName: string;
  seasonLabel: string;
  defaultPositions: readonly Position[];
  defaultMinMinutes: number;
  minutesStep: number;
  topN: number;
  scatterXMetric: string;
  scatterYMetric: string;
  barMetric: string;
  /** Default sort/highlight metric for squad overviews */
  squadMetric: string;
  /** Pseudo-squads left out of team pickers ("TOT" = transfer totals) */
  excludedTeams: readonly string[];
}

const DEFAULTS: DashboardConfig = {
  leagueName: 'La Liga',
  seasonLabel: '2022-2023',
  defaultPositions: ['FW', 'MF', 'DF'],
  defaultMinMinutes: 500,
  minutesStep: 50,
  topN: 15,
  scatterXMetric: 'xg_per90',
  scatterYMetric: 'xa_per90',
  barMetric: 'goals_per90',
  squadMetric: 'xg_per90',
  excludedTeams: ['TOT', 'Unknown'],
};

export const DEFAULT_DASHBOARD_CONFIG: Readonly<DashboardConfig> = Object.freeze(DEFAULTS);

const METRIC_FIELDS = ['scatterXMetric', 'scatterYMetric', 'barMetric', 'squadMetric'] as const;

/**
 * Merge overrides onto the defaults and reject values the dashboard cannot use.
 */
export function createDashboardConfig(overrides: Partial<DashboardConfig> = {}): Readonly<DashboardConfig> {
  const config: DashboardConfig = { ...DEFAULT_DASHBOARD_CONFIG, ...overrides };

  for (const field of METRIC_FIELDS) {
    if (!getMetric(config[field])) {
      throw new Error(`Unknown metric key "${config[field]}" for ${field}`);
    }
  }

  if (!Number.isFinite(config.defaultMinMinutes) || config.defaultMinMinutes < 0) {
    throw new Error(`defaultMinMinutes must be a non-negative number, got ${config.defaultMinMinutes}`);
  }

  if (!Number.isInteger(config.topN) || config.topN <= 0) {
    throw new Error(`topN must be a positive integer, got ${config.topN}`);
  }

  if (!Number.isInteger(config.minutesStep) || config.minutesStep <= 0) {
    throw new Error(`minutesStep must be a positive integer, got ${config.minutesStep}`);
  }

  const badPosition = config.defaultPositions.find((position) => !isPosition(position));
  if (badPosition !== undefined) {
    throw new Error(`Unknown position "${badPosition}" in defaultPositions`);
  }

  return Object.freeze({
    ...config,
    defaultPositions: Object.freeze([...config.defaultPositions]),
    excludedTeams: Object.freeze([...config.excludedTeams]),
  });
}
