/**
 * Arithmetic on day spans.
 * All spans are half-open [start, end): `start` is the first covered day and
 * `end` the first day after it.
 */

import type { DayNumber } from './types.js';

export interface Span {
	start: DayNumber;
	end: DayNumber;
}

/**
 * Checks if two spans strictly overlap (share at least one day).
 */
export function spansOverlap(a: Span, b: Span): boolean {
	return a.start < b.end && b.start < a.end;
}

/**
 * Merges overlapping or adjacent spans into a sorted list of disjoint spans.
 *
 * @param spans - Spans to merge (can be unsorted)
 * @returns Sorted disjoint spans covering the same days
 *
 * @example
 * ```typescript
 * mergeSpans([{ start: 0, end: 10 }, { start: 10, end: 20 }, { start: 30, end: 40 }]);
 * // [{ start: 0, end: 20 }, { start: 30, end: 40 }]
 * ```
 */
export function mergeSpans(spans: readonly Span[]): Span[] {
	const valid = spans
		.filter((span) => span.start < span.end)
		.map((span) => ({ start: span.start, end: span.end }));

	if (valid.length === 0) {
		return [];
	}

	valid.sort((a, b) => a.start - b.start || a.end - b.end);

	const merged: Span[] = [valid[0]];

	for (let i = 1; i < valid.length; i++) {
		const current = valid[i];
		const last = merged[merged.length - 1];

		// [a, b) and [b, c) are adjacent and merge
		if (current.start <= last.end) {
			last.end = Math.max(last.end, current.end);
		} else {
			merged.push(current);
		}
	}

	return merged;
}

/**
 * Removes all days covered by `subtract` from `from`.
 * May split spans when subtraction punches holes in the middle.
 *
 * @example
 * ```typescript
 * subtractSpans([{ start: 0, end: 100 }], [{ start: 40, end: 60 }]);
 * // [{ start: 0, end: 40 }, { start: 60, end: 100 }]
 * ```
 */
export function subtractSpans(from: readonly Span[], subtract: readonly Span[]): Span[] {
	const mergedFrom = mergeSpans(from);
	if (subtract.length === 0) {
		return mergedFrom;
	}

	const mergedSubtract = mergeSpans(subtract);
	const result: Span[] = [];

	for (const span of mergedFrom) {
		let remaining: Span[] = [span];

		for (const sub of mergedSubtract) {
			const next: Span[] = [];

			for (const rem of remaining) {
				if (!spansOverlap(rem, sub)) {
					next.push(rem);
					continue;
				}
				if (rem.start < sub.start) {
					next.push({ start: rem.start, end: sub.start });
				}
				if (rem.end > sub.end) {
					next.push({ start: sub.end, end: rem.end });
				}
			}

			remaining = next;
		}

		result.push(...remaining);
	}

	return result.sort((a, b) => a.start - b.start);
}
