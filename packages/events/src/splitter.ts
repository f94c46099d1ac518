/**
 * The event splitter: cuts interval tables at outcome dates, flags the row
 * ending at each event and censors follow-up after a terminal event.
 */

import {
	ColumnSchema,
	ConfigurationError,
	TimeUnitSchema,
	UNIT_DAYS,
	componentLogger,
	groupBySubject,
	parseOptions,
	proportionCell,
	readCell,
	readSubjectId,
	requireColumns,
	sortIntervals,
	toOptionalDayNumber,
	type Cell,
	type Interval,
	type Logger,
	type Row,
	type SubjectId,
	type TimeUnit,
} from '@persontime/core';
import { z } from 'zod';

// ============================================================================
// Types
// ============================================================================

export type EventType = 'single' | 'recurring';

/**
 * Column names of an event table.
 */
export interface EventBindings {
	id: string;
	/** One column, or several for repeated event dates */
	date: string | readonly string[];
	/** Competing event date columns; single events only */
	compete?: readonly string[];
}

export interface SplitOptions {
	bindings: EventBindings;
	/** `single` (default) censors after the first event */
	type?: EventType;
	/** Value columns rescaled when a row is cut */
	continuous?: readonly string[];
	/** Status column name, default `failure` */
	generate?: string;
	/** Overwrite an existing status column */
	replace?: boolean;
	/** Adds a row duration column in the given unit */
	timegen?: { column: string; unit?: TimeUnit };
	/** Event-table columns copied onto every row of the subject */
	keep?: readonly string[];
	/** Overrides for the status labels */
	eventLabels?: Readonly<Record<number, string>>;
	logger?: Logger;
}

export interface SplitResult {
	intervals: Interval[];
	/** Rows flagged with a non-zero status */
	events: number;
	rows: number;
	type: EventType;
	labels: Record<number, string>;
}

/**
 * An event to apply to one subject: its day and the status it sets.
 */
export interface SubjectEvent {
	day: number;
	status: number;
}

// ============================================================================
// Validation
// ============================================================================

const SplitOptionsSchema = z
	.object({
		bindings: z.object({
			id: ColumnSchema,
			date: z.union([ColumnSchema, z.array(ColumnSchema).min(1)]),
			compete: z.array(ColumnSchema).optional(),
		}),
		type: z.enum(['single', 'recurring']).optional(),
		continuous: z.array(ColumnSchema).optional(),
		generate: ColumnSchema.optional(),
		replace: z.boolean().optional(),
		timegen: z.object({ column: ColumnSchema, unit: TimeUnitSchema.optional() }).optional(),
		keep: z.array(ColumnSchema).optional(),
		eventLabels: z.record(z.string()).optional(),
	})
	.superRefine((options, ctx) => {
		if (options.type === 'recurring' && options.bindings.compete && options.bindings.compete.length > 0) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['bindings', 'compete'],
				message: 'competing events require single events',
			});
		}
	});

const DEFAULT_STATUS_COLUMN = 'failure';

/**
 * Default status labels: 0 censored, 1 event, `k + 2` for the k-th competing column.
 */
export function defaultLabels(competing: number): Record<number, string> {
	const labels: Record<number, string> = { 0: 'Censored', 1: 'Event' };
	for (let k = 0; k < competing; k++) {
		labels[k + 2] = `Competing event ${k + 1}`;
	}
	return labels;
}

// ============================================================================
// Event Reading
// ============================================================================

function dateColumns(bindings: EventBindings): readonly string[] {
	return typeof bindings.date === 'string' ? [bindings.date] : bindings.date;
}

function earliest(days: readonly (number | null)[]): number | null {
	const present = days.filter((day): day is number => day !== null);
	return present.length === 0 ? null : Math.min(...present);
}

/**
 * The terminal event of each subject: the earliest primary or competing
 * date. The primary event wins ties, then the first competing column.
 */
export function singleEvents(events: readonly Row[], bindings: EventBindings): Map<SubjectId, SubjectEvent> {
	const dates = dateColumns(bindings);
	const compete = bindings.compete ?? [];
	const result = new Map<SubjectId, SubjectEvent>();

	const rowsById = groupBySubject(events.map((row) => ({ id: readSubjectId(row[bindings.id], bindings.id), row })));
	for (const [id, rows] of rowsById) {
		const candidates: SubjectEvent[] = [];

		const primary = earliest(rows.flatMap(({ row }) => dates.map((column) => toOptionalDayNumber(row[column], column))));
		if (primary !== null) candidates.push({ day: primary, status: 1 });

		compete.forEach((column, k) => {
			const day = earliest(rows.map(({ row }) => toOptionalDayNumber(row[column], column)));
			if (day !== null) candidates.push({ day, status: k + 2 });
		});

		if (candidates.length > 0) {
			result.set(
				id,
				candidates.reduce((best, candidate) => (candidate.day < best.day ? candidate : best)),
			);
		}
	}

	return result;
}

/**
 * Every distinct event date of each subject, in time order.
 */
export function recurringEvents(events: readonly Row[], bindings: EventBindings): Map<SubjectId, SubjectEvent[]> {
	const dates = dateColumns(bindings);
	const result = new Map<SubjectId, SubjectEvent[]>();

	for (const row of events) {
		const id = readSubjectId(row[bindings.id], bindings.id);
		const days = result.get(id) ?? [];
		for (const column of dates) {
			const day = toOptionalDayNumber(row[column], column);
			if (day !== null && !days.some((event) => event.day === day)) {
				days.push({ day, status: 1 });
			}
		}
		result.set(id, days);
	}

	for (const days of result.values()) {
		days.sort((a, b) => a.day - b.day);
	}
	return result;
}

// ============================================================================
// Splitting
// ============================================================================

interface WorkingRow {
	interval: Interval;
	status: number;
}

function cut(interval: Interval, start: number, stop: number, continuous: readonly string[]): Interval {
	const ratio = (stop - start) / (interval.stop - interval.start);
	const values: Record<string, Cell> = { ...interval.values };
	for (const column of continuous) {
		values[column] = proportionCell(interval.values[column] ?? null, ratio, column);
	}
	return { ...interval, start, stop, values };
}

/**
 * Applies one event to a subject's rows. A row containing the day is cut
 * there and its first part flagged; a row ending on the day is flagged.
 */
function applyEvent(rows: readonly WorkingRow[], event: SubjectEvent, continuous: readonly string[]): WorkingRow[] {
	return rows.flatMap((row): WorkingRow[] => {
		const { interval } = row;
		if (interval.start < event.day && event.day < interval.stop) {
			return [
				{ interval: cut(interval, interval.start, event.day, continuous), status: event.status },
				{ interval: cut(interval, event.day, interval.stop, continuous), status: 0 },
			];
		}
		if (interval.start < event.day && event.day === interval.stop) {
			return [{ interval, status: event.status }];
		}
		return [row];
	});
}

/**
 * Splits one subject's sorted rows at its events.
 */
export function splitSubject(
	intervals: readonly Interval[],
	events: readonly SubjectEvent[],
	type: EventType,
	continuous: readonly string[] = [],
): { interval: Interval; status: number }[] {
	let rows: WorkingRow[] = intervals.map((interval) => ({ interval, status: 0 }));

	for (const event of events) {
		rows = applyEvent(rows, event, continuous);

		if (type === 'single') {
			const flagged = rows.some((row) => row.status !== 0);
			if (flagged) {
				rows = rows.filter((row) => row.interval.stop <= event.day);
			}
		}
	}

	return rows;
}

function readKept(events: readonly Row[], bindings: EventBindings, keep: readonly string[]): Map<SubjectId, Row> {
	const kept = new Map<SubjectId, Row>();
	if (keep.length === 0) return kept;

	for (const row of events) {
		const id = readSubjectId(row[bindings.id], bindings.id);
		if (!kept.has(id)) kept.set(id, row);
	}
	return kept;
}

/**
 * Splits an interval table at the events of an event table.
 *
 * @example
 * ```typescript
 * const { intervals } = splitAtEvents(
 *   [{ id: 1, start: 0, stop: 100, exposure: 1, values: { dose: 100 } }],
 *   [{ id: 1, mi: 50 }],
 *   { bindings: { id: 'id', date: 'mi' }, continuous: ['dose'] },
 * );
 * // [{ id: 1, start: 0, stop: 50, exposure: 1, values: { dose: 50, failure: 1 } }]
 * ```
 */
export function splitAtEvents(
	intervals: readonly Interval[],
	events: readonly Row[],
	options: SplitOptions,
): SplitResult {
	const parsed = parseOptions(SplitOptionsSchema, options);
	const logger = componentLogger('events', options.logger);
	const { bindings } = options;
	const type = parsed.type ?? 'single';
	const generate = parsed.generate ?? DEFAULT_STATUS_COLUMN;
	const continuous = options.continuous ?? [];
	const keep = options.keep ?? [];

	requireColumns(events, [bindings.id, ...dateColumns(bindings), ...(bindings.compete ?? []), ...keep], 'event table');

	const first = intervals[0];
	if (first) {
		const missing = continuous.filter((column) => !(column in first.values));
		if (missing.length > 0) {
			throw new ConfigurationError(`Continuous columns not found in intervals: ${missing.join(', ')}`, { missing });
		}
		if (!parsed.replace && generate in first.values) {
			throw new ConfigurationError(`Column "${generate}" already exists; set replace to overwrite it`, {
				column: generate,
			});
		}
	}

	const eventsById: Map<SubjectId, readonly SubjectEvent[]> =
		type === 'single'
			? new Map([...singleEvents(events, bindings)].map(([id, event]): [SubjectId, SubjectEvent[]] => [id, [event]]))
			: recurringEvents(events, bindings);
	const kept = readKept(events, bindings, keep);

	logger.debug({ type, subjects: eventsById.size }, 'splitting at events');

	const output: Interval[] = [];
	let flagged = 0;

	for (const [id, rows] of groupBySubject(sortIntervals(intervals))) {
		const keptRow = kept.get(id);

		for (const { interval, status } of splitSubject(rows, eventsById.get(id) ?? [], type, continuous)) {
			const values: Record<string, Cell> = { ...interval.values, [generate]: status };
			for (const column of keep) {
				values[column] = keptRow ? readCell(keptRow[column], column) : null;
			}
			if (parsed.timegen) {
				values[parsed.timegen.column] = (interval.stop - interval.start) / UNIT_DAYS[parsed.timegen.unit ?? 'days'];
			}
			if (status !== 0) flagged++;
			output.push({ ...interval, values });
		}
	}

	const labels = { ...defaultLabels(bindings.compete?.length ?? 0), ...options.eventLabels };
	logger.info({ rows: output.length, events: flagged }, 'event split complete');

	return { intervals: output, events: flagged, rows: output.length, type, labels };
}
