/**
 * Per-subject pattern columns computed over the final rows.
 */

import type { Cell, ExposureState } from '@persontime/core';
import type { PartitionConfig } from './config.js';

export interface SubjectRow {
	start: number;
	stop: number;
	exposure: ExposureState;
	values: Record<string, Cell>;
}

export const SWITCHED_COLUMN = 'switched';
export const SWITCHING_PATTERN_COLUMN = 'switching_pattern';
export const STATETIME_COLUMN = 'statetime';

/**
 * Adds the requested pattern columns in place.
 */
export function addPatternColumns(rows: SubjectRow[], config: PartitionConfig): void {
	if (!config.switching && !config.switchingdetail && !config.statetime) return;

	const states = [...new Set(rows.map((row) => row.exposure))];
	const pattern = states.map(String).join('->');

	let runLength = 0;
	rows.forEach((row, i) => {
		const length = row.stop - row.start;
		runLength = i > 0 && rows[i - 1].exposure === row.exposure ? runLength + length : length;

		if (config.switching) row.values[SWITCHED_COLUMN] = states.length > 1 ? 1 : 0;
		if (config.switchingdetail) row.values[SWITCHING_PATTERN_COLUMN] = pattern;
		if (config.statetime) row.values[STATETIME_COLUMN] = runLength;
	});
}
