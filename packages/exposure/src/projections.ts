/**
 * Exposure definitions derived from the resolved timeline.
 *
 * Each projection runs in two phases. `crossingPoints` simulates the
 * projection over the segments to find the days where a category changes
 * inside a segment; the caller cuts there. `evaluateTrack` then walks the
 * cut pieces in order and assigns each its value.
 */

import { UNIT_DAYS, type Cell, type ExposureValue } from '@persontime/core';
import type { Projection } from './config.js';
import type { Segment } from './sweep.js';

const EPSILON = 1e-9;

/**
 * One exposure history to project: the whole state, or a single value.
 */
export interface Track {
	exposedIn(segment: Segment): boolean;
	doseRateIn(segment: Segment): number;
}

export const overallTrack: Track = {
	exposedIn: (segment) => segment.exposed,
	doseRateIn: (segment) => segment.doseRate,
};

export function valueTrack(value: ExposureValue): Track {
	return {
		exposedIn: (segment) => segment.values.includes(value),
		doseRateIn: (segment) => segment.doseRates.get(value) ?? 0,
	};
}

/**
 * Category thresholds on the projection's own scale: days of exposure,
 * days since exposure, or cumulative dose.
 */
function thresholds(projection: Projection): readonly number[] {
	switch (projection.kind) {
		case 'duration':
		case 'recency':
			return projection.cutpoints.map((cut) => cut * UNIT_DAYS[projection.unit]);
		case 'dose':
			return projection.cutpoints ?? [];
		default:
			return [];
	}
}

/**
 * 0 while nothing has accrued, otherwise 1 plus the number of thresholds reached.
 */
function category(level: number, active: boolean, cuts: readonly number[]): number {
	if (level <= EPSILON && !active) return 0;
	return 1 + cuts.filter((cut) => level + EPSILON >= cut).length;
}

/**
 * Days inside segments where the projection's category changes.
 */
export function crossingPoints(segments: readonly Segment[], projection: Projection, track: Track): number[] {
	const cuts = thresholds(projection);
	if (cuts.length === 0) return [];

	const points: number[] = [];
	const addInside = (segment: Segment, day: number) => {
		if (day > segment.start && day < segment.stop) points.push(day);
	};

	let accrued = 0;
	let lastExposedEnd: number | null = null;

	for (const segment of segments) {
		const length = segment.stop - segment.start;

		switch (projection.kind) {
			case 'duration':
				if (track.exposedIn(segment)) {
					for (const cut of cuts) {
						if (accrued < cut && accrued + length > cut) {
							addInside(segment, segment.start + Math.ceil(cut - accrued - EPSILON));
						}
					}
					accrued += length;
				}
				break;
			case 'dose': {
				const rate = track.doseRateIn(segment);
				if (rate > 0) {
					for (const cut of cuts) {
						if (accrued < cut - EPSILON && accrued + rate * length > cut + EPSILON) {
							addInside(segment, segment.start + Math.ceil((cut - accrued) / rate - EPSILON));
						}
					}
					accrued += rate * length;
				}
				break;
			}
			case 'recency':
				if (track.exposedIn(segment)) {
					lastExposedEnd = segment.stop;
				} else if (lastExposedEnd !== null) {
					for (const cut of cuts) {
						addInside(segment, Math.ceil(lastExposedEnd + cut - EPSILON));
					}
				}
				break;
			default:
				break;
		}
	}

	return points;
}

/**
 * Assigns each piece the projection's value for one track.
 * Pieces must be in time order and already cut at `crossingPoints`.
 */
export function evaluateTrack(pieces: readonly Segment[], projection: Projection, track: Track): Cell[] {
	const cuts = thresholds(projection);
	let ever = false;
	let accrued = 0;
	let lastExposedEnd: number | null = null;

	return pieces.map((piece) => {
		const exposed = track.exposedIn(piece);
		const length = piece.stop - piece.start;

		switch (projection.kind) {
			case 'evertreated':
				ever ||= exposed;
				return ever ? 1 : 0;
			case 'currentformer':
				ever ||= exposed;
				return exposed ? 1 : ever ? 2 : 0;
			case 'duration': {
				const before = accrued;
				if (exposed) accrued += length;
				return category(before, exposed, cuts);
			}
			case 'continuous':
				if (exposed) accrued += length;
				return accrued / UNIT_DAYS[projection.unit];
			case 'recency':
				if (exposed) {
					lastExposedEnd = piece.stop;
					return 1;
				}
				if (lastExposedEnd === null) return null;
				return 1 + category(piece.start - lastExposedEnd, true, cuts);
			case 'dose': {
				const rate = track.doseRateIn(piece);
				const before = accrued;
				accrued += rate * length;
				return projection.cutpoints ? category(before, rate > 0, cuts) : accrued;
			}
		}
	});
}
