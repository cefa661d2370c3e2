/**
 * Metric Catalog
 *
 * Maps the labels users pick from to a statistic and a normalization mode.
 * Adding a metric = adding an entry here; the views read the registry.
 */

import { StatKey } from '../models/Player';
import type { Dataset } from '../models/Dataset';

export type NormalizationMode = 'raw' | 'per90';

export type MetricFormat = 'number' | 'percentage';

export interface MetricDefinition {
  key: string;
  label: string;
  stat: StatKey;
  mode: NormalizationMode;
  format: MetricFormat;
  precision: number;
}

export type MetricRegistry = Record<string, MetricDefinition>;

function per90(key: string, label: string, stat: StatKey): MetricDefinition {
  return { key, label, stat, mode: 'per90', format: 'number', precision: 2 };
}

const METRICS_LIST: MetricDefinition[] = [
  per90('goals_per90', 'Goals per 90', 'goals'),
  per90('assists_per90', 'Assists per 90', 'assists'),
  per90('xg_per90', 'xG per 90', 'expectedGoals'),
  per90('xa_per90', 'xA per 90', 'expectedAssists'),
  per90('shots_per90', 'Shots per 90', 'shots'),
  per90('key_passes_per90', 'Key Passes per 90', 'keyPasses'),
  per90('prog_passes_per90', 'Prog Passes per 90', 'progressivePasses'),
  per90('dribbles_per90', 'Success Dribbles per 90', 'successfulDribbles'),
  per90('prog_carries_per90', 'Prog Carries per 90', 'progressiveCarries'),
  per90('tackles_won_per90', 'Tackles Won per 90', 'tacklesWon'),
  per90('interceptions_per90', 'Interceptions per 90', 'interceptions'),
  per90('sca_per90', 'SCA per 90', 'shotCreatingActions'),
  per90('gca_per90', 'GCA per 90', 'goalCreatingActions'),
  {
    key: 'pass_completion_pct',
    label: 'Pass Comp %',
    stat: 'passCompletionPct',
    mode: 'raw',
    format: 'percentage',
    precision: 1,
  },
  {
    key: 'shots_on_target_pct',
    label: 'Shot Target %',
    stat: 'shotsOnTargetPct',
    mode: 'raw',
    format: 'percentage',
    precision: 1,
  },
  // Season totals
  { key: 'goals', label: 'Goals', stat: 'goals', mode: 'raw', format: 'number', precision: 0 },
  { key: 'assists', label: 'Assists', stat: 'assists', mode: 'raw', format: 'number', precision: 0 },
  { key: 'xg', label: 'xG', stat: 'expectedGoals', mode: 'raw', format: 'number', precision: 1 },
];

export function createMetricsRegistry(metrics: MetricDefinition[]): MetricRegistry {
  return metrics.reduce<MetricRegistry>((registry, metric) => {
    if (registry[metric.key]) {
      throw new Error(`Duplicate metric key detected in registry: ${metric.key}`);
    }

    registry[metric.key] = Object.freeze({ ...metric });
    return registry;
  }, {});
}

export const METRICS_REGISTRY: Readonly<MetricRegistry> = Object.freeze(createMetricsRegistry(METRICS_LIST));

export const METRIC_DEFINITIONS: ReadonlyArray<MetricDefinition> = Object.freeze(Object.values(METRICS_REGISTRY));

export function getMetric(key: string): MetricDefinition | undefined {
  return METRICS_REGISTRY[key];
}

export function requireMetric(key: string): MetricDefinition {
  const metric = getMetric(key);
  if (!metric) {
    throw new Error(`Unknown metric key "${key}". Add the metric to config/metrics.ts first.`);
  }
  return metric;
}

export function getMetricByLabel(label: string): MetricDefinition | undefined {
  return METRIC_DEFINITIONS.find((metric) => metric.label === label);
}

/**
 * Catalog entries the dataset can actually answer (drops metrics built on an
 * optional column the file does not have).
 */
export function availableMetrics(dataset: Dataset): MetricDefinition[] {
  return METRIC_DEFINITIONS.filter((metric) => dataset.hasStat(metric.stat));
}

export function formatMetricValue(metric: MetricDefinition, value: number | null | undefined): string {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return '-';
  }

  const formatted = value.toFixed(metric.precision);
  return metric.format === 'percentage' ? `${formatted}%` : formatted;
}
