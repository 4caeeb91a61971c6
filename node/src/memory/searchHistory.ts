// src/memory/searchHistory.ts: past recommendation cycles as listing rows
import type { RecommendationCycle, SearchHistoryEntry } from '@/types/core';

/** "2026-03-01T12:30:05.000Z" → "2026-03-01 12:30:05" (UTC). Unparseable input is returned as is. */
export function readableTime(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function toHistoryEntry(cycle: RecommendationCycle, index: number): SearchHistoryEntry {
  const query = cycle.query?.semanticText ?? '';
  const resultsCount = cycle.results.length;
  return {
    index,
    timestamp: cycle.at,
    readableTime: readableTime(cycle.at),
    query,
    resultsCount,
    preview: `Found ${resultsCount} recommendation${resultsCount === 1 ? '' : 's'} for '${query}'`,
  };
}

export function formatSearchHistory(cycles: readonly RecommendationCycle[]): SearchHistoryEntry[] {
  return cycles.map(toHistoryEntry);
}
