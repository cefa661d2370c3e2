import { Position } from '../models/Player';
import type { FilteredView } from '../models/Dataset';

export interface FilterCriteria {
  /** Primary positions to keep; empty or absent keeps every position */
  positions?: Iterable<Position>;
  minMinutes: number;
  team?: string | null;
}

/**
 * Keep the records matching every active predicate, in their original order.
 * Never mutates the input; no match is an empty view, not an error.
 */
export function filterPlayers(view: FilteredView, criteria: FilterCriteria): FilteredView {
  const positions = new Set(criteria.positions ?? []);
  const team = criteria.team ?? null;

  return Object.freeze(
    view.filter((player) => {
      if (player.minutes < criteria.minMinutes) return false;
      if (positions.size > 0 && !positions.has(player.primaryPosition)) return false;
      if (team !== null && player.team !== team) return false;
      return true;
    })
  );
}

/**
 * Distinct player names in a view, alphabetical. Feeds the comparison pickers.
 */
export function listPlayerNames(view: FilteredView): string[] {
  return Array.from(new Set(view.map((player) => player.name))).sort((a, b) => a.localeCompare(b));
}

export function describeFilters(criteria: FilterCriteria): string {
  const positions = Array.from(criteria.positions ?? []);
  const positionText = positions.length > 0 ? positions.join(', ') : 'None';
  const teamText = criteria.team ? ` for ${criteria.team}` : '';
  return `Displaying data for players in positions: ${positionText} with at least ${criteria.minMinutes} minutes played${teamText}.`;
}
