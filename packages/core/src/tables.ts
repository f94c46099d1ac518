/**
 * Reading external row tables through column bindings, and writing
 * intervals back out as rows.
 */

import { toDayNumber } from './days.js';
import { ConfigurationError, DataError } from './errors.js';
import type {
	Cell,
	Episode,
	ExposureValue,
	Interval,
	IntervalColumns,
	Row,
	StudyWindow,
	SubjectId,
} from './types.js';

// ============================================================================
// Bindings
// ============================================================================

/**
 * Column names of a cohort (study window) table.
 */
export interface CohortBindings {
	id: string;
	entry: string;
	exit: string;
	/** Cohort columns copied onto every output row */
	keep?: readonly string[];
}

/**
 * Column names of an episode table.
 */
export interface EpisodeBindings {
	id: string;
	start: string;
	/** Required unless the table is point-in-time */
	stop?: string;
	exposure: string;
	priority?: string;
	dose?: string;
}

/**
 * Column names of an interval table.
 */
export interface IntervalBindings extends IntervalColumns {
	/** Value columns to read; defaults to every other column */
	values?: readonly string[];
}

export const DEFAULT_INTERVAL_COLUMNS: Readonly<IntervalColumns> = {
	id: 'id',
	start: 'start',
	stop: 'stop',
	exposure: 'exposure',
};

// ============================================================================
// Cell Helpers
// ============================================================================

/**
 * Checks that every bound column exists on the first row of a table.
 */
export function requireColumns(rows: readonly Row[], columns: readonly string[], table: string): void {
	const first = rows[0];
	if (!first) {
		return;
	}
	const missing = columns.filter((column) => !(column in first));
	if (missing.length > 0) {
		throw new ConfigurationError(`Columns not found in ${table}: ${missing.join(', ')}`, {
			table,
			missing,
		});
	}
}

export function readSubjectId(value: unknown, field: string): SubjectId {
	if ((typeof value === 'number' && Number.isFinite(value)) || (typeof value === 'string' && value.length > 0)) {
		return value;
	}
	throw new DataError(`Column "${field}" holds an unusable subject id: ${String(value)}`, { field, value });
}

export function readCell(value: unknown, field: string): Cell {
	if (value === null || value === undefined) {
		return null;
	}
	if (typeof value === 'number') {
		return Number.isNaN(value) ? null : value;
	}
	if (typeof value === 'string') {
		return value;
	}
	if (typeof value === 'boolean') {
		return value ? 1 : 0;
	}
	if (value instanceof Date) {
		return toDayNumber(value, field);
	}
	throw new DataError(`Column "${field}" holds an unsupported value`, { field });
}

function readExposureValue(value: unknown, field: string): ExposureValue {
	if ((typeof value === 'number' && Number.isFinite(value)) || typeof value === 'string') {
		return value;
	}
	throw new DataError(`Column "${field}" holds a missing or unusable exposure value: ${String(value)}`, {
		field,
		value,
	});
}

function readOptionalNumber(value: unknown, field: string): number | undefined {
	if (value === null || value === undefined) {
		return undefined;
	}
	if (typeof value === 'number' && Number.isFinite(value)) {
		return value;
	}
	throw new DataError(`Column "${field}" must be numeric`, { field, value });
}

// ============================================================================
// Readers
// ============================================================================

/**
 * Reads study windows. Each subject may appear once and must have
 * entry <= exit.
 */
export function readStudyWindows(rows: readonly Row[], bindings: CohortBindings): StudyWindow[] {
	const keep = bindings.keep ?? [];
	requireColumns(rows, [bindings.id, bindings.entry, bindings.exit, ...keep], 'cohort table');

	const seen = new Set<SubjectId>();
	return rows.map((row) => {
		const id = readSubjectId(row[bindings.id], bindings.id);
		const entry = toDayNumber(row[bindings.entry], bindings.entry);
		const exit = toDayNumber(row[bindings.exit], bindings.exit);

		if (seen.has(id)) {
			throw new DataError(`Subject ${id} appears more than once in the cohort table`, { id });
		}
		seen.add(id);

		if (entry > exit) {
			throw new DataError(`Subject ${id} has entry after exit`, { id, entry, exit });
		}

		if (keep.length === 0) {
			return { id, entry, exit };
		}
		const attributes: Record<string, Cell> = {};
		for (const column of keep) {
			attributes[column] = readCell(row[column], column);
		}
		return { id, entry, exit, attributes };
	});
}

/**
 * Reads episodes. Point-in-time tables have no stop column; each episode
 * then covers its start day only.
 */
export function readEpisodes(
	rows: readonly Row[],
	bindings: EpisodeBindings,
	options: { pointTime?: boolean } = {},
): Episode[] {
	const { stop } = bindings;
	if (!options.pointTime && stop === undefined) {
		throw new ConfigurationError('A stop column is required unless episodes are point-in-time');
	}

	const columns = [bindings.id, bindings.start, bindings.exposure];
	if (!options.pointTime && stop !== undefined) columns.push(stop);
	if (bindings.priority) columns.push(bindings.priority);
	if (bindings.dose) columns.push(bindings.dose);
	requireColumns(rows, columns, 'episode table');

	return rows.map((row) => {
		const id = readSubjectId(row[bindings.id], bindings.id);
		const start = toDayNumber(row[bindings.start], bindings.start);
		const end = options.pointTime || stop === undefined ? start : toDayNumber(row[stop], stop);

		if (end < start) {
			throw new DataError(`Subject ${id} has an episode with stop before start`, { id, start, stop: end });
		}

		const episode: Episode = {
			id,
			start,
			stop: end,
			value: readExposureValue(row[bindings.exposure], bindings.exposure),
		};
		const priority = bindings.priority ? readOptionalNumber(row[bindings.priority], bindings.priority) : undefined;
		const dose = bindings.dose ? readOptionalNumber(row[bindings.dose], bindings.dose) : undefined;

		return {
			...episode,
			...(priority === undefined ? {} : { priority }),
			...(dose === undefined ? {} : { dose }),
		};
	});
}

/**
 * Reads a conforming interval table, such as one produced by `toRows`.
 */
export function fromRows(rows: readonly Row[], bindings: IntervalBindings = DEFAULT_INTERVAL_COLUMNS): Interval[] {
	const fixed = [bindings.id, bindings.start, bindings.stop, bindings.exposure];
	requireColumns(rows, [...fixed, ...(bindings.values ?? [])], 'interval table');

	return rows.map((row) => {
		const id = readSubjectId(row[bindings.id], bindings.id);
		const start = toDayNumber(row[bindings.start], bindings.start);
		const stop = toDayNumber(row[bindings.stop], bindings.stop);
		if (stop < start) {
			throw new DataError(`Subject ${id} has an interval with stop before start`, { id, start, stop });
		}

		const columns = bindings.values ?? Object.keys(row).filter((column) => !fixed.includes(column));
		const values: Record<string, Cell> = {};
		for (const column of columns) {
			values[column] = readCell(row[column], column);
		}

		return { id, start, stop, exposure: readCell(row[bindings.exposure], bindings.exposure), values };
	});
}

/**
 * Flattens intervals into rows: id, start, stop, the exposure column and
 * every value column. A value column sharing a name with one of the first
 * four is overwritten by it.
 */
export function toRows(
	intervals: readonly Interval[],
	columns: Partial<IntervalColumns> = {},
): Record<string, Cell>[] {
	const names = { ...DEFAULT_INTERVAL_COLUMNS, ...columns };
	return intervals.map((interval) => ({
		...interval.values,
		[names.id]: interval.id,
		[names.start]: interval.start,
		[names.stop]: interval.stop,
		[names.exposure]: interval.exposure,
	}));
}

// ============================================================================
// Grouping
// ============================================================================

/**
 * Orders subject ids: numbers first (ascending), then strings.
 */
export function compareSubjectIds(a: SubjectId, b: SubjectId): number {
	if (typeof a === 'number' && typeof b === 'number') {
		return a - b;
	}
	if (typeof a === 'number') return -1;
	if (typeof b === 'number') return 1;
	return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Groups records by subject, preserving input order within each group.
 * Subjects are returned in `compareSubjectIds` order.
 */
export function groupBySubject<T extends { readonly id: SubjectId }>(items: Iterable<T>): Map<SubjectId, T[]> {
	const groups = new Map<SubjectId, T[]>();
	for (const item of items) {
		const group = groups.get(item.id);
		if (group) {
			group.push(item);
		} else {
			groups.set(item.id, [item]);
		}
	}

	return new Map([...groups.entries()].sort(([a], [b]) => compareSubjectIds(a, b)));
}

/**
 * Sorts intervals by subject, start and stop without mutating the input.
 */
export function sortIntervals<T extends { readonly id: SubjectId; readonly start: number; readonly stop: number }>(
	intervals: readonly T[],
): T[] {
	return [...intervals].sort((a, b) => compareSubjectIds(a.id, b.id) || a.start - b.start || a.stop - b.stop);
}
