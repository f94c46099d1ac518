/**
 * Overlap strategies: turning the set of episodes active over an elementary
 * subinterval into one state.
 */

import type { ExposureState, ExposureValue } from '@persontime/core';
import type { OverlapStrategy } from './config.js';
import type { PreparedEpisode } from './episodes.js';

export interface Resolution {
	state: ExposureState;
	exposed: boolean;
	/** Non-reference values that make up the state */
	values: readonly ExposureValue[];
	/** More than one non-reference value was active */
	coOccurring: boolean;
}

/**
 * Orders exposure values: numbers ascending, then strings.
 */
export function compareValues(a: ExposureValue, b: ExposureValue): number {
	if (typeof a === 'number' && typeof b === 'number') return a - b;
	if (typeof a === 'number') return -1;
	if (typeof b === 'number') return 1;
	return a < b ? -1 : a > b ? 1 : 0;
}

export function distinctValues(values: Iterable<ExposureValue>): ExposureValue[] {
	return [...new Set(values)].sort(compareValues);
}

/** Latest effective start wins; later input wins ties. */
function latest(a: PreparedEpisode, b: PreparedEpisode): PreparedEpisode {
	return b.start > a.start || (b.start === a.start && b.order > a.order) ? b : a;
}

function byPriority(order: readonly ExposureValue[]) {
	const rank = (value: ExposureValue) => {
		const index = order.indexOf(value);
		return index === -1 ? order.length : index;
	};

	return (a: PreparedEpisode, b: PreparedEpisode): PreparedEpisode => {
		const byRank = rank(a.value) - rank(b.value);
		if (byRank !== 0) return byRank < 0 ? a : b;

		const byEpisode = (a.priority ?? Infinity) - (b.priority ?? Infinity);
		if (byEpisode !== 0 && !Number.isNaN(byEpisode)) return byEpisode < 0 ? a : b;

		return latest(a, b);
	};
}

function winner(
	active: readonly PreparedEpisode[],
	pick: (a: PreparedEpisode, b: PreparedEpisode) => PreparedEpisode,
): ExposureValue {
	return active.reduce(pick).value;
}

/** Joins the values of a composite split state */
export const SPLIT_SEPARATOR = '+';

/**
 * Resolves the active set under a strategy. An empty set is the reference state.
 */
export function resolveActive(
	active: readonly PreparedEpisode[],
	strategy: OverlapStrategy,
	reference: ExposureValue,
): Resolution {
	const exposedValues = distinctValues(active.map((episode) => episode.value)).filter((value) => value !== reference);
	const coOccurring = exposedValues.length > 1;

	if (active.length === 0) {
		return { state: reference, exposed: false, values: [], coOccurring: false };
	}

	let state: ExposureValue;
	switch (strategy.kind) {
		case 'split':
			if (exposedValues.length === 0) {
				state = reference;
			} else if (exposedValues.length === 1) {
				state = exposedValues[0];
			} else {
				state = exposedValues.map(String).join(SPLIT_SEPARATOR);
			}
			return { state, exposed: state !== reference, values: exposedValues, coOccurring };
		case 'priority':
			state = winner(active, byPriority(strategy.order));
			break;
		case 'layer':
		case 'combine':
			state = winner(active, latest);
			break;
	}

	const exposed = state !== reference;
	return { state, exposed, values: exposed ? [state] : [], coOccurring };
}
