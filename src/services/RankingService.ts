/**
 * Ranking & comparison over a filtered view.
 *
 * Everything here is pure and recomputed per call; views are small enough
 * that nothing is cached.
 */

import { MetricDefinition, METRIC_DEFINITIONS, requireMetric } from '../config/metrics';
import { DEFAULT_DASHBOARD_CONFIG } from '../config/dashboard';
import { PlayerRecord, Position, getStat } from '../models/Player';
import type { FilteredView } from '../models/Dataset';
import { PlayerNotFoundError } from '../models/Errors';

export interface RankedPlayer {
  player: PlayerRecord;
  value: number;
}

export interface ScatterPoint {
  player: PlayerRecord;
  x: number;
  y: number;
}

export interface PlayerProfile {
  name: string;
  team: string;
  position: Position;
  positions: readonly string[];
  age: number;
  minutes: number;
  /** Metric key → value; undefined when the metric does not apply */
  metrics: Record<string, number | undefined>;
}

export interface ComparisonRow {
  metric: MetricDefinition;
  values: [number | undefined, number | undefined];
  /** Index of the higher value, null on a tie or a missing side */
  leader: 0 | 1 | null;
}

export interface PlayerComparison {
  profiles: [PlayerProfile, PlayerProfile];
  rows: ComparisonRow[];
}

const PER_90_MINUTES = 90;

/**
 * Value of one metric for one player. Per-90 values need minutes on the
 * pitch, so zero-minute players get undefined rather than zero.
 */
export function metricValue(player: PlayerRecord, metric: MetricDefinition): number | undefined {
  const raw = getStat(player, metric.stat);
  if (raw === undefined) {
    return undefined;
  }

  if (metric.mode === 'per90') {
    if (player.minutes <= 0) {
      return undefined;
    }
    return (raw * PER_90_MINUTES) / player.minutes;
  }

  return raw;
}

function compareByName(a: PlayerRecord, b: PlayerRecord): number {
  return a.name.localeCompare(b.name) || a.team.localeCompare(b.team);
}

/**
 * Top-N players by a metric, highest first; equal values fall back to name
 * order so the list is stable between renders.
 */
export function rank(view: FilteredView, metric: MetricDefinition, topN: number): RankedPlayer[] {
  if (!(topN > 0)) {
    return [];
  }

  const ranked: RankedPlayer[] = [];
  for (const player of view) {
    const value = metricValue(player, metric);
    if (value !== undefined) {
      ranked.push({ player, value });
    }
  }

  ranked.sort((a, b) => b.value - a.value || compareByName(a.player, b.player));
  return ranked.slice(0, Math.floor(topN));
}

export function scatterPairs(
  view: FilteredView,
  metricX: MetricDefinition,
  metricY: MetricDefinition
): ScatterPoint[] {
  const points: ScatterPoint[] = [];
  for (const player of view) {
    const x = metricValue(player, metricX);
    const y = metricValue(player, metricY);
    if (x !== undefined && y !== undefined) {
      points.push({ player, x, y });
    }
  }
  return points;
}

export function buildProfile(
  player: PlayerRecord,
  metrics: readonly MetricDefinition[] = METRIC_DEFINITIONS
): PlayerProfile {
  const values: Record<string, number | undefined> = {};
  for (const metric of metrics) {
    values[metric.key] = metricValue(player, metric);
  }

  return {
    name: player.name,
    team: player.team,
    position: player.primaryPosition,
    positions: player.positions,
    age: player.age,
    minutes: player.minutes,
    metrics: values,
  };
}

function findPlayer(view: FilteredView, name: string): PlayerRecord {
  const player = view.find((candidate) => candidate.name === name);
  if (!player) {
    throw new PlayerNotFoundError(name);
  }
  return player;
}

function leaderOf(a: number | undefined, b: number | undefined): 0 | 1 | null {
  if (a === undefined || b === undefined || a === b) {
    return null;
  }
  return a > b ? 0 : 1;
}

/**
 * Side-by-side profiles for two players of the view, aligned by metric.
 * A name listed more than once resolves to its first row in the view.
 *
 * @throws PlayerNotFoundError if either name is not in the view
 */
export function compare(
  view: FilteredView,
  playerA: string,
  playerB: string,
  metrics: readonly MetricDefinition[] = METRIC_DEFINITIONS
): PlayerComparison {
  const a = buildProfile(findPlayer(view, playerA), metrics);
  const b = buildProfile(findPlayer(view, playerB), metrics);

  const rows = metrics.map((metric): ComparisonRow => {
    const values: [number | undefined, number | undefined] = [a.metrics[metric.key], b.metrics[metric.key]];
    return { metric, values, leader: leaderOf(values[0], values[1]) };
  });

  return { profiles: [a, b], rows };
}

/**
 * One team's players ordered by a metric, highest first. Players the metric
 * does not apply to stay in the list, after the rest, in name order.
 */
export function squadOverview(
  view: FilteredView,
  team: string,
  metric: MetricDefinition = requireMetric(DEFAULT_DASHBOARD_CONFIG.squadMetric)
): PlayerRecord[] {
  const squad = view
    .filter((player) => player.team === team)
    .map((player) => ({ player, value: metricValue(player, metric) }));

  squad.sort((a, b) => {
    if (a.value === undefined || b.value === undefined) {
      if (a.value === b.value) return compareByName(a.player, b.player);
      return a.value === undefined ? 1 : -1;
    }
    return b.value - a.value || compareByName(a.player, b.player);
  });

  return squad.map((entry) => entry.player);
}
