// core/paginator.ts
// Pure functions for splitting repeating data into main-page items and addendum batches

import type { OverflowConfig } from '../types/index.js';
import { InvalidOverflowConfigError } from '../types/index.js';

/**
 * Represents a chunk of items for a single page
 */
export interface ItemChunk<T> {
  items: T[];
  startIndex: number;
  endIndex: number;
  totalItems: number;
}

export interface OverflowPlan<T> {
  mainPageItems: T[];
  addendumBatches: T[][];
}

type OverflowLimits = Pick<OverflowConfig, 'maxItemsInMain' | 'itemsPerOverflowPage'>;

/**
 * Split items into consecutive chunks of `perPage`
 * Pure function - no side effects
 */
export function chunkItems<T>(items: readonly T[], perPage: number): ItemChunk<T>[] {
  if (!Number.isInteger(perPage) || perPage <= 0) {
    throw new InvalidOverflowConfigError(
      'Invalid itemsPerOverflowPage',
      'overflowConfigs',
      `itemsPerOverflowPage must be a positive integer, got ${perPage}`
    );
  }

  const chunks: ItemChunk<T>[] = [];
  const totalItems = items.length;

  for (let i = 0; i < totalItems; i += perPage) {
    const end = Math.min(i + perPage, totalItems);
    chunks.push({
      items: items.slice(i, end),
      startIndex: i,
      endIndex: end - 1,
      totalItems,
    });
  }

  return chunks;
}

/**
 * Main page gets the first min(maxItemsInMain, n) items; the rest are
 * batched by itemsPerOverflowPage. itemsPerOverflowPage is only checked
 * when there is a remainder.
 * Pure function - no side effects
 */
export function planOverflow<T>(items: readonly T[], config: OverflowLimits): OverflowPlan<T> {
  const { maxItemsInMain } = config;
  if (!Number.isInteger(maxItemsInMain) || maxItemsInMain < 0) {
    throw new InvalidOverflowConfigError(
      'Invalid maxItemsInMain',
      'overflowConfigs',
      `maxItemsInMain must be a non-negative integer, got ${maxItemsInMain}`
    );
  }

  const mainPageItems = items.slice(0, maxItemsInMain);
  const remainder = items.slice(maxItemsInMain);

  if (remainder.length === 0) {
    return { mainPageItems, addendumBatches: [] };
  }

  const addendumBatches = chunkItems(remainder, config.itemsPerOverflowPage).map(c => c.items);
  return { mainPageItems, addendumBatches };
}

/**
 * Metadata key that records an overflow indicator for a section's main page
 */
export function overflowIndicatorKey(sectionId: string, field: string): string {
  return `overflow:${sectionId}:${field}`;
}

/**
 * Indicator fields recorded for a section, as field -> value
 */
export function readOverflowIndicators(
  metadata: ReadonlyMap<string, string>,
  sectionId: string
): Record<string, string> {
  const prefix = overflowIndicatorKey(sectionId, '');
  const indicators: Record<string, string> = {};
  for (const [key, value] of metadata) {
    if (key.startsWith(prefix)) {
      indicators[key.slice(prefix.length)] = value;
    }
  }
  return indicators;
}
