/**
 * Rescaling of continuous columns when an interval is cut.
 */

import { DataError } from './errors.js';
import type { Cell } from './types.js';

/**
 * How durations are measured when proportioning.
 *
 * - `elapsed`: durations are `stop - start` (shared-endpoint rows).
 * - `inclusive`: both end days count, so a single-day row has duration 0
 *   but stands for one day; the ratio adds one to each side.
 */
export type ProportionMode = 'elapsed' | 'inclusive';

/**
 * The share of an original interval kept by a shorter one.
 * A zero-length original keeps its full value.
 */
export function proportionRatio(newDuration: number, originalDuration: number, mode: ProportionMode = 'elapsed'): number {
	if (mode === 'inclusive') {
		return (newDuration + 1) / (originalDuration + 1);
	}
	return originalDuration === 0 ? 1 : newDuration / originalDuration;
}

/**
 * Applies a ratio to a continuous cell. Missing stays missing.
 */
export function proportionCell(value: Cell, ratio: number, column: string): Cell {
	if (value === null) {
		return null;
	}
	if (typeof value !== 'number') {
		throw new DataError(`Continuous column "${column}" holds a non-numeric value: ${value}`, { column, value });
	}
	return value * ratio;
}
