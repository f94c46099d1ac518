/**
 * Episode preparation: everything that happens to a subject's raw episodes
 * before the boundary sweep.
 *
 * Prepared episodes are half-open: `[start, end)` with `end` exclusive,
 * which is how output intervals share endpoints.
 */

import { subtractSpans, type Episode, type ExposureValue, type Span, type StudyWindow } from '@persontime/core';
import { graceFor, type PartitionConfig } from './config.js';

/**
 * An episode after lag, washout and clipping.
 */
export interface PreparedEpisode {
	start: number;
	end: number;
	value: ExposureValue;
	priority?: number;
	/** Dose delivered per day; bridges and extensions deliver none */
	doseRate: number;
	/** Input position, used to break precedence ties */
	order: number;
}

function byStart(a: PreparedEpisode, b: PreparedEpisode): number {
	return a.start - b.start || a.order - b.order;
}

/**
 * Total dose of an episode. Without a dose column, dose mode reads the
 * exposure code itself as the amount.
 */
function doseAmount(episode: Episode, config: PartitionConfig): number {
	if (episode.dose !== undefined) return episode.dose;
	if (config.projection?.kind === 'dose' && typeof episode.value === 'number') return episode.value;
	return 0;
}

/**
 * Applies lag and washout, spreads dose over the adjusted span, clips to
 * the study window and drops episodes left empty.
 */
export function adjustEpisodes(
	window: StudyWindow,
	episodes: readonly Episode[],
	config: PartitionConfig,
): PreparedEpisode[] {
	const prepared: PreparedEpisode[] = [];

	episodes.forEach((episode, order) => {
		const start = episode.start + config.lag;
		const end = episode.stop + 1 + config.washout;
		if (end <= start) return;

		const doseRate = doseAmount(episode, config) / (end - start);
		const clipped = { start: Math.max(start, window.entry), end: Math.min(end, window.exit) };
		if (clipped.end <= clipped.start) return;

		prepared.push({
			...clipped,
			value: episode.value,
			...(episode.priority === undefined ? {} : { priority: episode.priority }),
			doseRate,
			order,
		});
	});

	return prepared;
}

/**
 * Keeps episodes whose adjusted length lies within `[min, max]` days.
 */
export function applyAcuteWindow(episodes: readonly PreparedEpisode[], config: PartitionConfig): PreparedEpisode[] {
	const { acuteWindow } = config;
	if (!acuteWindow) return [...episodes];

	return episodes.filter((episode) => {
		const length = episode.end - episode.start;
		return length >= acuteWindow.min && length <= acuteWindow.max;
	});
}

/**
 * Extends the subject's last-ending episode by `fillgaps` days, clipped to exit.
 * The extension is a separate record so it delivers no dose.
 */
export function fillTerminalGap(
	window: StudyWindow,
	episodes: readonly PreparedEpisode[],
	config: PartitionConfig,
): PreparedEpisode[] {
	if (config.fillgaps === 0 || episodes.length === 0) return [...episodes];

	const last = episodes.reduce((latest, episode) => (episode.end >= latest.end ? episode : latest));
	const end = Math.min(last.end + config.fillgaps, window.exit);
	if (end <= last.end) return [...episodes];

	return [...episodes, { ...last, start: last.end, end, doseRate: 0 }];
}

function groupByValue(episodes: readonly PreparedEpisode[]): Map<ExposureValue, PreparedEpisode[]> {
	const groups = new Map<ExposureValue, PreparedEpisode[]>();
	for (const episode of episodes) {
		const group = groups.get(episode.value);
		if (group) {
			group.push(episode);
		} else {
			groups.set(episode.value, [episode]);
		}
	}
	return groups;
}

function lowerPriority(a: number | undefined, b: number | undefined): number | undefined {
	if (a === undefined) return b;
	if (b === undefined) return a;
	return Math.min(a, b);
}

/**
 * Consolidates same-value episodes that overlap, abut or sit no more than
 * `merge` days apart. Dose mode keeps every episode so no dose is lost.
 */
export function mergeEpisodes(episodes: readonly PreparedEpisode[], config: PartitionConfig): PreparedEpisode[] {
	if (config.projection?.kind === 'dose') return [...episodes];

	const merged: PreparedEpisode[] = [];
	for (const group of groupByValue(episodes).values()) {
		const sorted = [...group].sort(byStart);
		let current = { ...sorted[0] };

		for (const next of sorted.slice(1)) {
			if (next.start - current.end <= config.merge) {
				current.end = Math.max(current.end, next.end);
				current.order = Math.max(current.order, next.order);
				const priority = lowerPriority(current.priority, next.priority);
				if (priority !== undefined) current.priority = priority;
			} else {
				merged.push(current);
				current = { ...next };
			}
		}
		merged.push(current);
	}

	return merged.sort(byStart);
}

/**
 * Bridges a gap between consecutive same-value episodes when it is no
 * longer than that value's grace threshold and no other episode falls in it.
 * Each bridge is added as its own dose-free record.
 */
export function bridgeGraceGaps(episodes: readonly PreparedEpisode[], config: PartitionConfig): PreparedEpisode[] {
	const bridges: PreparedEpisode[] = [];
	const covered: Span[] = episodes.map((episode) => ({ start: episode.start, end: episode.end }));

	for (const [value, group] of groupByValue(episodes)) {
		const threshold = graceFor(config.grace, value);
		if (threshold === 0) continue;

		const sorted = [...group].sort(byStart);
		let reach = sorted[0];
		for (const next of sorted.slice(1)) {
			const gap: Span = { start: reach.end, end: next.start };
			const length = gap.end - gap.start;

			if (length > 0 && length <= threshold) {
				const open = subtractSpans([gap], covered);
				const untouched = open.length === 1 && open[0].start === gap.start && open[0].end === gap.end;
				if (untouched) {
					bridges.push({ ...reach, start: gap.start, end: gap.end, doseRate: 0 });
				}
			}

			if (next.end > reach.end) reach = next;
		}
	}

	return [...episodes, ...bridges].sort(byStart);
}

/**
 * The full preparation chain for one subject.
 */
export function prepareEpisodes(
	window: StudyWindow,
	episodes: readonly Episode[],
	config: PartitionConfig,
): PreparedEpisode[] {
	const adjusted = applyAcuteWindow(adjustEpisodes(window, episodes, config), config);
	const filled = fillTerminalGap(window, adjusted, config);
	return bridgeGraceGaps(mergeEpisodes(filled, config), config);
}
