/**
 * Overlap, gap and coverage checks shared by every component.
 * Diagnostics never change a table; they only describe it.
 */

import { ValidationError } from './errors.js';
import { groupBySubject, sortIntervals } from './tables.js';
import type { DayNumber, ExposureState, StudyWindow, SubjectId } from './types.js';

/**
 * The minimal shape diagnostics need.
 */
export interface TimedRow {
	readonly id: SubjectId;
	readonly start: DayNumber;
	readonly stop: DayNumber;
}

export interface OverlapFinding {
	id: SubjectId;
	/** The earlier row */
	first: { start: DayNumber; stop: DayNumber };
	/** The row that starts before `first` stops */
	second: { start: DayNumber; stop: DayNumber };
}

export interface GapFinding {
	id: SubjectId;
	/** Stop of the row before the gap */
	start: DayNumber;
	/** Start of the row after the gap */
	stop: DayNumber;
	length: number;
}

export interface CoverageReport {
	id: SubjectId;
	firstStart: DayNumber | null;
	lastStop: DayNumber | null;
	personTime: number;
	expected: number;
	gap: number;
	/** 100 for a fully covered window; zero-length windows count as covered */
	percentCovered: number;
}

export interface Diagnostics {
	coverage?: CoverageReport[];
	overlaps: OverlapFinding[];
	gaps: GapFinding[];
}

function* adjacentPairs<T extends TimedRow>(rows: readonly T[]): Generator<[T, T]> {
	for (const group of groupBySubject(sortIntervals(rows)).values()) {
		for (let i = 1; i < group.length; i++) {
			yield [group[i - 1], group[i]];
		}
	}
}

/**
 * Adjacent rows of one subject whose boundaries cross.
 */
export function findOverlaps(rows: readonly TimedRow[]): OverlapFinding[] {
	const findings: OverlapFinding[] = [];
	for (const [previous, next] of adjacentPairs(rows)) {
		if (next.start < previous.stop) {
			findings.push({
				id: previous.id,
				first: { start: previous.start, stop: previous.stop },
				second: { start: next.start, stop: next.stop },
			});
		}
	}
	return findings;
}

/**
 * Uncovered time between adjacent rows of one subject.
 */
export function findGaps(rows: readonly TimedRow[]): GapFinding[] {
	const findings: GapFinding[] = [];
	for (const [previous, next] of adjacentPairs(rows)) {
		if (next.start > previous.stop) {
			findings.push({
				id: previous.id,
				start: previous.stop,
				stop: next.start,
				length: next.start - previous.stop,
			});
		}
	}
	return findings;
}

/**
 * Total person-time of a table.
 */
export function personTime(rows: readonly TimedRow[]): number {
	return rows.reduce((total, row) => total + (row.stop - row.start), 0);
}

/**
 * Person-time per subject window, compared with the window length.
 */
export function checkCoverage(rows: readonly TimedRow[], windows: readonly StudyWindow[]): CoverageReport[] {
	const groups = groupBySubject(rows);

	return windows.map((window) => {
		const group = groups.get(window.id) ?? [];
		const covered = personTime(group);
		const expected = window.exit - window.entry;

		return {
			id: window.id,
			firstStart: group.length > 0 ? Math.min(...group.map((row) => row.start)) : null,
			lastStop: group.length > 0 ? Math.max(...group.map((row) => row.stop)) : null,
			personTime: covered,
			expected,
			gap: expected - covered,
			percentCovered: expected === 0 ? 100 : (100 * covered) / expected,
		};
	});
}

/**
 * Person-time spent in each exposure state, in first-seen order.
 */
export function summarizeStates(
	rows: readonly (TimedRow & { readonly exposure: ExposureState })[],
): Map<ExposureState, number> {
	const summary = new Map<ExposureState, number>();
	for (const row of rows) {
		summary.set(row.exposure, (summary.get(row.exposure) ?? 0) + (row.stop - row.start));
	}
	return summary;
}

/**
 * Throws unless every subject's rows are sorted, gapless and non-overlapping.
 */
export function assertCanonical(rows: readonly TimedRow[]): void {
	const bySubject = groupBySubject(rows);
	for (const [id, group] of bySubject) {
		for (let i = 1; i < group.length; i++) {
			const previous = group[i - 1];
			const next = group[i];
			if (next.start < previous.start) {
				throw new ValidationError(`Rows of subject ${id} are not sorted by start`, { id });
			}
			if (next.start !== previous.stop) {
				const kind = next.start < previous.stop ? 'overlap' : 'gap';
				throw new ValidationError(`Rows of subject ${id} have a ${kind} at day ${previous.stop}`, {
					id,
					kind,
					previous: { start: previous.start, stop: previous.stop },
					next: { start: next.start, stop: next.stop },
				});
			}
		}
	}
}

/**
 * Runs the overlap and gap checks, plus coverage when windows are known.
 */
export function diagnose(rows: readonly TimedRow[], windows?: readonly StudyWindow[]): Diagnostics {
	return {
		...(windows ? { coverage: checkCoverage(rows, windows) } : {}),
		overlaps: findOverlaps(rows),
		gaps: findGaps(rows),
	};
}
