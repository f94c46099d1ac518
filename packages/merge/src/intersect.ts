/**
 * The interval intersector: several named interval tables in, one table of
 * joint states out.
 */

import {
	ColumnSchema,
	ConfigurationError,
	DataError,
	compareSubjectIds,
	componentLogger,
	findGaps,
	findOverlaps,
	fromRows,
	groupBySubject,
	parseOptions,
	proportionCell,
	proportionRatio,
	type Cell,
	type ExposureState,
	type GapFinding,
	type Interval,
	type IntervalBindings,
	type Logger,
	type OverlapFinding,
	type ProportionMode,
	type Row,
	type SubjectId,
} from '@persontime/core';
import { z } from 'zod';

// ============================================================================
// Types
// ============================================================================

/**
 * One named input table.
 */
export interface MergeSource {
	/** Input name; used for the exposure column and kept-column suffixes */
	name: string;
	intervals: readonly Interval[];
	/** Value columns copied to the output as `<column>_<name>` */
	keep?: readonly string[];
	/** Value columns rescaled when a row is shortened */
	continuous?: readonly string[];
}

export type MergeMode = 'columns' | 'combined';

export interface MergeOptions {
	/** `columns` also writes each input's state under its name */
	mode?: MergeMode;
	proportion?: ProportionMode;
	/** Process only the ids every input has instead of failing */
	force?: boolean;
	/** Report overlaps and gaps found in the inputs */
	check?: boolean;
	logger?: Logger;
}

export interface MergeDiagnostics {
	subjects: number;
	rows: number;
	meanRows: number;
	maxRows: number;
	overlaps?: (OverlapFinding & { source: string })[];
	gaps?: (GapFinding & { source: string })[];
}

export interface MergeResult {
	intervals: Interval[];
	diagnostics: MergeDiagnostics;
	warnings: string[];
}

// ============================================================================
// Validation
// ============================================================================

const MergeSourceSchema = z.object({
	name: ColumnSchema,
	intervals: z.array(z.unknown()),
	keep: z.array(ColumnSchema).optional(),
	continuous: z.array(ColumnSchema).optional(),
});

const MergeRequestSchema = z.object({
	sources: z
		.array(MergeSourceSchema)
		.min(2, 'at least two inputs are required')
		.refine((sources) => new Set(sources.map((source) => source.name)).size === sources.length, {
			message: 'input names must be unique',
		}),
	options: z.object({
		mode: z.enum(['columns', 'combined']).optional(),
		proportion: z.enum(['elapsed', 'inclusive']).optional(),
		force: z.boolean().optional(),
		check: z.boolean().optional(),
	}),
});

function requireValueColumns(source: MergeSource): void {
	const first = source.intervals[0];
	if (!first) return;

	const wanted = [...(source.keep ?? []), ...(source.continuous ?? [])];
	const missing = wanted.filter((column) => !(column in first.values));
	if (missing.length > 0) {
		throw new ConfigurationError(`Columns not found in input "${source.name}": ${missing.join(', ')}`, {
			source: source.name,
			missing,
		});
	}
}

/**
 * Reads a row table into a merge source.
 */
export function sourceFromRows(
	name: string,
	rows: readonly Row[],
	bindings: IntervalBindings,
	columns: Pick<MergeSource, 'keep' | 'continuous'> = {},
): MergeSource {
	return { name, intervals: fromRows(rows, bindings), ...columns };
}

// ============================================================================
// Intersection
// ============================================================================

/**
 * The row of an input covering [lo, hi]. When rows overlap, the one that
 * starts latest wins.
 */
function coveringRow(rows: readonly Interval[], lo: number, hi: number): Interval | undefined {
	let found: Interval | undefined;
	for (const row of rows) {
		if (row.start <= lo && row.stop >= hi && (!found || row.start >= found.start)) {
			found = row;
		}
	}
	return found;
}

export function jointLabel(states: readonly ExposureState[]): string {
	return states.map((state) => (state === null ? '.' : String(state))).join('|');
}

function buildRow(
	id: SubjectId,
	lo: number,
	hi: number,
	sources: readonly MergeSource[],
	matched: readonly Interval[],
	mode: MergeMode,
	proportion: ProportionMode,
): Interval {
	const values: Record<string, Cell> = {};

	sources.forEach((source, i) => {
		const row = matched[i];
		if (mode === 'columns') {
			values[source.name] = row.exposure;
		}
		for (const column of source.keep ?? []) {
			values[`${column}_${source.name}`] = row.values[column] ?? null;
		}
		const ratio = proportionRatio(hi - lo, row.stop - row.start, proportion);
		for (const column of source.continuous ?? []) {
			values[`${column}_${source.name}`] = proportionCell(row.values[column] ?? null, ratio, column);
		}
	});

	return { id, start: lo, stop: hi, exposure: jointLabel(matched.map((row) => row.exposure)), values };
}

/**
 * Intersects one subject's rows from every input.
 */
export function intersectSubject(
	id: SubjectId,
	sources: readonly MergeSource[],
	rowsBySource: readonly (readonly Interval[])[],
	mode: MergeMode = 'columns',
	proportion: ProportionMode = 'elapsed',
): Interval[] {
	if (rowsBySource.some((rows) => rows.length === 0)) return [];

	const lo = Math.max(...rowsBySource.map((rows) => Math.min(...rows.map((row) => row.start))));
	const hi = Math.min(...rowsBySource.map((rows) => Math.max(...rows.map((row) => row.stop))));
	if (lo > hi) return [];

	const collect = (start: number, stop: number): Interval[] | null => {
		const matched: Interval[] = [];
		for (const rows of rowsBySource) {
			const row = coveringRow(rows, start, stop);
			if (!row) return null;
			matched.push(row);
		}
		return matched;
	};

	if (lo === hi) {
		const matched = collect(lo, hi);
		return matched ? [buildRow(id, lo, hi, sources, matched, mode, proportion)] : [];
	}

	const points = new Set([lo, hi]);
	const instants = new Set<number>();
	for (const rows of rowsBySource) {
		for (const row of rows) {
			if (row.start > lo && row.start < hi) points.add(row.start);
			if (row.stop > lo && row.stop < hi) points.add(row.stop);
			if (row.start === row.stop && row.start > lo && row.start < hi) instants.add(row.start);
		}
	}
	const boundaries = [...points].sort((a, b) => a - b);

	// A zero-length input row is matched ahead of the rows that touch it
	const collectInstant = (at: number): Interval[] | null => {
		const matched: Interval[] = [];
		for (const rows of rowsBySource) {
			const row = rows.find((candidate) => candidate.start === at && candidate.stop === at) ?? coveringRow(rows, at, at);
			if (!row) return null;
			matched.push(row);
		}
		return matched;
	};

	const output: Interval[] = [];
	for (let i = 1; i < boundaries.length; i++) {
		if (instants.has(boundaries[i - 1])) {
			const matched = collectInstant(boundaries[i - 1]);
			if (matched) {
				output.push(buildRow(id, boundaries[i - 1], boundaries[i - 1], sources, matched, mode, proportion));
			}
		}
		const matched = collect(boundaries[i - 1], boundaries[i]);
		if (matched) {
			output.push(buildRow(id, boundaries[i - 1], boundaries[i], sources, matched, mode, proportion));
		}
	}
	return output;
}

/**
 * Intersects two or more named interval tables.
 *
 * @example
 * ```typescript
 * const { intervals } = mergeIntervals([
 *   { name: 'statin', intervals: statinIntervals },
 *   { name: 'aspirin', intervals: aspirinIntervals },
 * ]);
 * // intervals[0].exposure === '1|0'
 * ```
 */
export function mergeIntervals(sources: readonly MergeSource[], options: MergeOptions = {}): MergeResult {
	const { options: parsed } = parseOptions(MergeRequestSchema, { sources, options }, ['sources']);
	const logger = componentLogger('merge', options.logger);
	const mode = parsed.mode ?? 'columns';
	const proportion = parsed.proportion ?? 'elapsed';
	const warnings: string[] = [];

	for (const source of sources) {
		requireValueColumns(source);
	}

	const grouped = sources.map((source) => groupBySubject(source.intervals));
	const allIds = new Set(grouped.flatMap((groups) => [...groups.keys()]));
	const commonIds = [...allIds].filter((id) => grouped.every((groups) => groups.has(id)));

	if (commonIds.length < allIds.size) {
		const missing = [...allIds].filter((id) => !commonIds.includes(id));
		if (!parsed.force) {
			throw new DataError(`Subjects missing from some inputs: ${missing.join(', ')}`, { missing });
		}
		warnings.push(`${missing.length} subject(s) not present in every input were dropped: ${missing.join(', ')}`);
	}

	logger.debug({ inputs: sources.map((source) => source.name), subjects: commonIds.length }, 'merging intervals');

	const perSubject = commonIds.sort(compareSubjectIds).map((id) =>
		intersectSubject(
			id,
			sources,
			grouped.map((groups) => groups.get(id) ?? []),
			mode,
			proportion,
		),
	);
	const intervals = perSubject.flat();
	const rowCounts = perSubject.map((rows) => rows.length);

	const diagnostics: MergeDiagnostics = {
		subjects: perSubject.length,
		rows: intervals.length,
		meanRows: rowCounts.length === 0 ? 0 : intervals.length / rowCounts.length,
		maxRows: rowCounts.length === 0 ? 0 : Math.max(...rowCounts),
	};

	if (parsed.check) {
		diagnostics.overlaps = sources.flatMap((source) =>
			findOverlaps(source.intervals).map((finding) => ({ ...finding, source: source.name })),
		);
		diagnostics.gaps = sources.flatMap((source) =>
			findGaps(source.intervals).map((finding) => ({ ...finding, source: source.name })),
		);
		if (diagnostics.overlaps.length > 0 || diagnostics.gaps.length > 0) {
			warnings.push(
				`Inputs have ${diagnostics.overlaps.length} overlap(s) and ${diagnostics.gaps.length} gap(s)`,
			);
		}
	}

	for (const warning of warnings) {
		logger.warn(warning);
	}
	logger.info({ subjects: diagnostics.subjects, rows: diagnostics.rows }, 'merge complete');

	return { intervals, diagnostics, warnings };
}
