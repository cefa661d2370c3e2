import { Position } from '../models/Player';

export const POSITION_COLORS: Record<Position, string> = {
  GK: '#a855f7',
  DF: '#1d9bf0',
  MF: '#00ba7c',
  FW: '#f97316',
  Unknown: '#8b98a5',
};

export const CHART_FONT_FAMILY =
  '-apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, "Helvetica Neue", Arial, sans-serif';

export const CHART_FORE_COLOR = '#e7e9ea';
export const CHART_GRID_COLOR = '#38444d';
