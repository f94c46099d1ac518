/**
 * The boundary sweep and the passes that reshape its output.
 */

import { calendarBoundaries, type ExposureValue, type StudyWindow, type TimeUnit } from '@persontime/core';
import type { PartitionConfig } from './config.js';
import type { PreparedEpisode } from './episodes.js';
import { resolveActive, type Resolution } from './resolve.js';

/**
 * A span of one subject's window with a single resolved state.
 */
export interface Segment extends Resolution {
	start: number;
	stop: number;
	/** Total dose per day across every active episode */
	doseRate: number;
	/** Dose per day by exposure value */
	doseRates: ReadonlyMap<ExposureValue, number>;
}

function sumDoseRates(active: readonly PreparedEpisode[]): Map<ExposureValue, number> {
	const rates = new Map<ExposureValue, number>();
	for (const episode of active) {
		if (episode.doseRate === 0) continue;
		rates.set(episode.value, (rates.get(episode.value) ?? 0) + episode.doseRate);
	}
	return rates;
}

/**
 * Walks the distinct episode boundaries of a window and yields one segment
 * per elementary subinterval. A zero-length window yields one empty
 * reference segment.
 */
export function* sweepSegments(
	window: StudyWindow,
	episodes: readonly PreparedEpisode[],
	config: PartitionConfig,
): Generator<Segment> {
	if (window.entry === window.exit) {
		yield {
			start: window.entry,
			stop: window.exit,
			...resolveActive([], config.strategy, config.reference),
			doseRate: 0,
			doseRates: new Map(),
		};
		return;
	}

	const points = new Set([window.entry, window.exit]);
	for (const episode of episodes) {
		points.add(episode.start);
		points.add(episode.end);
	}
	const boundaries = [...points].sort((a, b) => a - b);

	for (let i = 1; i < boundaries.length; i++) {
		const start = boundaries[i - 1];
		const stop = boundaries[i];
		const active = episodes.filter((episode) => episode.start <= start && episode.end > start);
		const doseRates = sumDoseRates(active);

		yield {
			start,
			stop,
			...resolveActive(active, config.strategy, config.reference),
			doseRate: [...doseRates.values()].reduce((total, rate) => total + rate, 0),
			doseRates,
		};
	}
}

function sameValues(a: readonly ExposureValue[], b: readonly ExposureValue[]): boolean {
	return a.length === b.length && a.every((value, i) => value === b[i]);
}

function sameRates(a: ReadonlyMap<ExposureValue, number>, b: ReadonlyMap<ExposureValue, number>): boolean {
	return a.size === b.size && [...a].every(([value, rate]) => b.get(value) === rate);
}

function continues(previous: Segment, next: Segment): boolean {
	return (
		previous.stop === next.start &&
		previous.state === next.state &&
		previous.exposed === next.exposed &&
		previous.coOccurring === next.coOccurring &&
		previous.doseRate === next.doseRate &&
		sameValues(previous.values, next.values) &&
		sameRates(previous.doseRates, next.doseRates)
	);
}

/**
 * Merges adjacent segments that carry the same state and rates.
 */
export function coalesceSegments(segments: Iterable<Segment>): Segment[] {
	const result: Segment[] = [];
	for (const segment of segments) {
		const last = result.at(-1);
		if (last && continues(last, segment)) {
			result[result.length - 1] = { ...last, stop: segment.stop };
		} else {
			result.push(segment);
		}
	}
	return result;
}

/**
 * Extends the state before an unexposed gap over its first `days` days,
 * whether or not another exposure follows. Time before the first exposure
 * is left alone.
 */
export function carryForward(segments: readonly Segment[], days: number): Segment[] {
	if (days === 0) return [...segments];

	const result: Segment[] = [];

	segments.forEach((segment, i) => {
		const previous = segments[i - 1];
		const follows = !segment.exposed && previous?.exposed === true;
		if (!follows) {
			result.push(segment);
			return;
		}

		const carriedStop = Math.min(segment.start + days, segment.stop);
		result.push({ ...previous, start: segment.start, stop: carriedStop, doseRate: 0, doseRates: new Map() });
		if (carriedStop < segment.stop) {
			result.push({ ...segment, start: carriedStop });
		}
	});

	return coalesceSegments(result);
}

/**
 * Cuts a span at every point strictly inside it.
 */
export function splitAt<T extends { start: number; stop: number }>(item: T, points: readonly number[]): T[] {
	const inside = [...new Set(points)].filter((point) => point > item.start && point < item.stop).sort((a, b) => a - b);
	if (inside.length === 0) return [item];

	const edges = [item.start, ...inside, item.stop];
	return edges.slice(1).map((stop, i) => ({ ...item, start: edges[i], stop }));
}

/**
 * Cuts segments at calendar boundaries of `unit`.
 */
export function expandSegments(segments: readonly Segment[], unit: TimeUnit): Segment[] {
	return segments.flatMap((segment) => splitAt(segment, calendarBoundaries(segment.start, segment.stop, unit)));
}
