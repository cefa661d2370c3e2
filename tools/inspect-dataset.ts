/**
 * Inspect Dataset Tool
 *
 * Loads a season CSV with the dashboard's own loader and prints what the
 * dashboard would see: row count, squads, positions and a top-N ranking.
 *
 * Usage examples:
 *   npx tsx tools/inspect-dataset.ts --file=public/data/laliga_player_stats.csv
 *   npx tsx tools/inspect-dataset.ts --file=public/data/laliga_player_stats.csv --metric=xa_per90 --top=5
 *   npx tsx tools/inspect-dataset.ts --file=exports/season.csv --metric=tackles_won_per90 --minMinutes=900
 */

import { DEFAULT_DASHBOARD_CONFIG } from '../src/config/dashboard';
import { MetricDefinition, formatMetricValue, requireMetric } from '../src/config/metrics';
import { Dataset } from '../src/models';
import { filterPlayers } from '../src/services/FilterService';
import { rank } from '../src/services/RankingService';
import { loadDatasetFile } from './lib/datasetFile';

export interface InspectOptions {
  file: string;
  metric: MetricDefinition;
  top: number;
  minMinutes: number;
}

export function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const arg of argv) {
    if (!arg.startsWith('--')) continue;
    const [k, ...rest] = arg.slice(2).split('=');
    out[k] = rest.join('=');
  }
  return out;
}

function parseCount(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`--${name} must be a non-negative whole number, got "${raw}"`);
  }
  return value;
}

export function resolveOptions(args: Record<string, string>): InspectOptions {
  if (!args.file) {
    throw new Error('Missing --file=<path to CSV>');
  }

  return {
    file: args.file,
    metric: requireMetric(args.metric || DEFAULT_DASHBOARD_CONFIG.barMetric),
    top: parseCount(args.top, 'top', DEFAULT_DASHBOARD_CONFIG.topN),
    minMinutes: parseCount(args.minMinutes, 'minMinutes', DEFAULT_DASHBOARD_CONFIG.defaultMinMinutes),
  };
}

/**
 * Plain-text report lines for a loaded dataset.
 */
export function buildReport(dataset: Dataset, options: InspectOptions): string[] {
  const { metric, top, minMinutes } = options;
  const lines = [
    `Source:    ${dataset.source}`,
    `Rows:      ${dataset.size}`,
    `Teams:     ${dataset.teams().join(', ')}`,
    `Positions: ${dataset.positions().join(', ')}`,
    '',
  ];

  if (!dataset.hasStat(metric.stat)) {
    lines.push(`${metric.label} is not available in this dataset.`);
    return lines;
  }

  const view = filterPlayers(dataset.records, { minMinutes });
  const ranking = rank(view, metric, top);

  lines.push(`Top ${ranking.length} by ${metric.label} (min ${minMinutes} minutes, ${view.length} eligible):`);
  ranking.forEach((entry, index) => {
    const position = String(index + 1).padStart(3);
    lines.push(
      `${position}. ${entry.player.name.padEnd(24)} ${entry.player.team.padEnd(16)} ${formatMetricValue(metric, entry.value)}`
    );
  });

  return lines;
}

function main(): void {
  let options: InspectOptions;
  let dataset: Dataset;
  try {
    options = resolveOptions(parseArgs(process.argv.slice(2)));
    dataset = loadDatasetFile(options.file);
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  console.log(buildReport(dataset, options).join('\n'));
}

if (require.main === module) {
  main();
}
