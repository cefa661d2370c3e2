/**
 * @jest-environment jsdom
 */

import type ApexCharts from 'apexcharts';
import { POSITION_COLORS } from '../components/chartTheme';
import { requireMetric } from '../config/metrics';
import type { TopPerformersResult } from '../controllers/DashboardController';
import type { CoreStats, PlayerRecord, Position } from '../models/Player';
import { rank, scatterPairs } from '../services/RankingService';
import { TopPerformersView } from './TopPerformersView';

interface MockChart {
  element: Element;
  options: ApexCharts.ApexOptions;
  render: jest.Mock;
  destroy: jest.Mock;
}

const mockCharts: MockChart[] = [];

jest.mock('apexcharts', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation((element: Element, options: ApexCharts.ApexOptions) => {
    const chart: MockChart = { element, options, render: jest.fn(() => Promise.resolve()), destroy: jest.fn() };
    mockCharts.push(chart);
    return chart;
  }),
}));

// ============================================================================
// Helpers
// ============================================================================

const ZERO_STATS: CoreStats = {
  goals: 0,
  assists: 0,
  expectedGoals: 0,
  expectedAssists: 0,
  keyPasses: 0,
  progressivePasses: 0,
  successfulDribbles: 0,
  progressiveCarries: 0,
  tacklesWon: 0,
  interceptions: 0,
  shotCreatingActions: 0,
  goalCreatingActions: 0,
  passCompletionPct: 0,
  shotsOnTargetPct: 0,
};

function makePlayer(name: string, position: Position, minutes: number, goals: number, expectedGoals = 0): PlayerRecord {
  return {
    name,
    team: 'Test FC',
    positions: [position],
    primaryPosition: position,
    age: 24,
    minutes,
    stats: { ...ZERO_STATS, goals, expectedGoals },
  };
}

const goalsPer90 = requireMetric('goals_per90');
const xgPer90 = requireMetric('xg_per90');
const metrics = [goalsPer90, xgPer90];

// Goals per 90: Bea 0.3, Ana 0.45, Cris 0.1. xG per 90: Bea 0.2, Ana 0.3, Cris 0
const rows: readonly PlayerRecord[] = [
  makePlayer('Bea', 'MF', 900, 3, 2),
  makePlayer('Ana', 'FW', 1800, 9, 6),
  makePlayer('Cris', 'DF', 900, 1),
];

function readyResult(): TopPerformersResult {
  return {
    status: 'ready',
    metricX: xgPer90,
    metricY: goalsPer90,
    barMetric: goalsPer90,
    points: scatterPairs(rows, xgPer90, goalsPer90),
    ranking: rank(rows, goalsPer90, 15),
    rows,
  };
}

const selection = { scatterXMetric: 'xg_per90', scatterYMetric: 'goals_per90', barMetric: 'goals_per90' };

function setup() {
  const container = document.createElement('div');
  document.body.appendChild(container);
  const onScatterMetricsChange = jest.fn<void, [string, string]>();
  const onBarMetricChange = jest.fn<void, [string]>();
  const view = new TopPerformersView(container, { metrics, onScatterMetricsChange, onBarMetricChange });
  return { container, view, onScatterMetricsChange, onBarMetricChange };
}

function chartOfType(type: string): MockChart {
  const chart = mockCharts.find((candidate) => candidate.options.chart?.type === type);
  if (!chart) throw new Error(`no ${type} chart was created`);
  return chart;
}

beforeEach(() => {
  mockCharts.length = 0;
});

afterEach(() => {
  document.body.innerHTML = '';
});

// ============================================================================
// Charts
// ============================================================================

describe('TopPerformersView charts', () => {
  test('bar chart lists the ranking best first', () => {
    const { view } = setup();
    view.render(readyResult(), selection);

    const bar = chartOfType('bar');
    expect(bar.options.xaxis?.categories).toEqual(['Ana', 'Bea', 'Cris']);
    expect(bar.options.series).toEqual([{ name: 'Goals per 90', data: [0.45, 0.3, 0.1] }]);
    expect(bar.options.colors).toEqual([POSITION_COLORS.FW, POSITION_COLORS.MF, POSITION_COLORS.DF]);
    expect(bar.render).toHaveBeenCalledTimes(1);
  });

  test('bar labels use two decimals', () => {
    const { view } = setup();
    view.render(readyResult(), selection);

    expect(chartOfType('bar').options.dataLabels?.formatter?.(0.45)).toBe('0.45');
    expect(chartOfType('bar').options.dataLabels?.formatter?.(1)).toBe('1.00');
  });

  test('scatter chart has one series per position', () => {
    const { view } = setup();
    view.render(readyResult(), selection);

    const scatter = chartOfType('scatter');
    expect(scatter.options.series).toEqual([
      { name: 'DF', data: [{ x: 0, y: 0.1 }] },
      { name: 'MF', data: [{ x: 0.2, y: 0.3 }] },
      { name: 'FW', data: [{ x: 0.3, y: 0.45 }] },
    ]);
  });

  test('charts mount into their own containers', () => {
    const { container, view } = setup();
    view.render(readyResult(), selection);

    expect(chartOfType('scatter').element).toBe(container.querySelector('#top-performers-scatter'));
    expect(chartOfType('bar').element).toBe(container.querySelector('#top-performers-bar'));
  });

  test('rendering again replaces the old charts', () => {
    const { view } = setup();
    view.render(readyResult(), selection);
    const first = [...mockCharts];

    view.render(readyResult(), selection);

    first.forEach((chart) => expect(chart.destroy).toHaveBeenCalledTimes(1));
    expect(mockCharts).toHaveLength(4);
  });

  test('destroy clears the panel', () => {
    const { container, view } = setup();
    view.render(readyResult(), selection);

    view.destroy();

    mockCharts.forEach((chart) => expect(chart.destroy).toHaveBeenCalledTimes(1));
    expect(container.innerHTML).toBe('');
  });
});

// ============================================================================
// Headings and table
// ============================================================================

describe('TopPerformersView content', () => {
  test('titles name the chosen metrics', () => {
    const { container, view } = setup();
    view.render(readyResult(), selection);

    expect(Array.from(container.querySelectorAll('.chart-title')).map((title) => title.textContent)).toEqual([
      'Goals per 90 vs. xG per 90',
      'Top 3 Players by Goals per 90',
    ]);
  });

  test('filtered table sits in a collapsed details block', () => {
    const { container, view } = setup();
    view.render(readyResult(), selection);

    const details = container.querySelector<HTMLDetailsElement>('details.data-table-toggle');
    expect(details?.open).toBe(false);
    expect(details?.querySelector('summary')?.textContent).toBe('Show Filtered Data Table (3 players)');
    expect(details?.querySelectorAll('tbody tr')).toHaveLength(3);

    const firstRow = Array.from(details?.querySelectorAll('tbody tr:first-child td') ?? []).map((cell) => cell.textContent);
    expect(firstRow).toEqual(['Bea', 'Test FC', 'MF', '24', '900', '0.30', '0.20']);
  });

  test('empty result shows a warning and no charts', () => {
    const { container, view } = setup();
    view.render({ status: 'empty', message: 'No players match the current filter criteria.' }, selection);

    expect(container.querySelector('.notice-warning')?.textContent).toBe('No players match the current filter criteria.');
    expect(mockCharts).toHaveLength(0);
    expect(container.querySelector('#bar-metric')).not.toBeNull();
  });
});

// ============================================================================
// Metric pickers
// ============================================================================

describe('TopPerformersView pickers', () => {
  test('selects start on the current metrics', () => {
    const { container, view } = setup();
    view.render(readyResult(), selection);

    expect(container.querySelector<HTMLSelectElement>('#scatter-x-metric')?.value).toBe('xg_per90');
    expect(container.querySelector<HTMLSelectElement>('#scatter-y-metric')?.value).toBe('goals_per90');
    expect(container.querySelector<HTMLSelectElement>('#bar-metric')?.value).toBe('goals_per90');
  });

  test('changing an axis reports both axes', () => {
    const { container, view, onScatterMetricsChange } = setup();
    view.render(readyResult(), selection);

    const xSelect = container.querySelector<HTMLSelectElement>('#scatter-x-metric');
    if (!xSelect) throw new Error('x-axis picker missing');
    xSelect.value = 'goals_per90';
    xSelect.dispatchEvent(new Event('change'));

    expect(onScatterMetricsChange).toHaveBeenCalledWith('goals_per90', 'goals_per90');
  });

  test('changing the bar metric reports it', () => {
    const { container, view, onBarMetricChange } = setup();
    view.render({ status: 'empty', message: 'x' }, selection);

    const barSelect = container.querySelector<HTMLSelectElement>('#bar-metric');
    if (!barSelect) throw new Error('bar picker missing');
    barSelect.value = 'xg_per90';
    barSelect.dispatchEvent(new Event('change'));

    expect(onBarMetricChange).toHaveBeenCalledWith('xg_per90');
  });
});
