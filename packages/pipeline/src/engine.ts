/**
 * Person-time pipeline with adapter-based data loading.
 */

import { ConfigurationError, componentLogger, type Interval, type Logger } from '@persontime/core';
import { splitAtEvents } from '@persontime/events';
import { partitionExposures, type PartitionResult } from '@persontime/exposure';
import { mergeIntervals, type MergeResult } from '@persontime/merge';
import type {
	CreatePipelineOptions,
	ExposureQuery,
	PersonTimePipeline,
	PipelineQuery,
	PipelineResult,
} from './types.js';

function assertQuery(query: PipelineQuery): void {
	if (query.exposures.length === 0) {
		throw new ConfigurationError('A pipeline run needs at least one exposure source');
	}
	const names = query.exposures.map((exposure) => exposure.name);
	if (new Set(names).size !== names.length) {
		throw new ConfigurationError(`Exposure source names must be unique: ${names.join(', ')}`, { names });
	}
}

function combine(
	exposures: readonly ExposureQuery[],
	partitions: readonly PartitionResult[],
	query: PipelineQuery,
	logger: Logger,
): { intervals: Interval[]; merge?: MergeResult } {
	if (partitions.length === 1) {
		return { intervals: partitions[0].intervals };
	}

	const merge = mergeIntervals(
		exposures.map((exposure, i) => ({
			name: exposure.name,
			intervals: partitions[i].intervals,
			keep: exposure.keep,
			continuous: exposure.continuous,
		})),
		{ ...query.merge, logger },
	);
	return { intervals: merge.intervals, merge };
}

/**
 * Create a person-time pipeline with the given adapter.
 */
export function createPipeline(options: CreatePipelineOptions): PersonTimePipeline {
	const { adapter } = options;
	const logger = componentLogger('pipeline', options.logger);

	async function run(query: PipelineQuery): Promise<PipelineResult> {
		assertQuery(query);
		const { subjects } = query;

		if (query.events && !adapter.getEvents) {
			throw new ConfigurationError('The adapter cannot load events');
		}

		const [cohort, episodeTables, events] = await Promise.all([
			adapter.getCohort({ subjects }),
			Promise.all(query.exposures.map((exposure) => adapter.getEpisodes({ source: exposure.name, subjects }))),
			query.events && adapter.getEvents ? adapter.getEvents({ subjects }) : Promise.resolve([]),
		]);

		logger.debug({ subjects: cohort.length, sources: query.exposures.length }, 'tables loaded');

		const partitions = query.exposures.map((exposure, i) =>
			partitionExposures(
				{ cohort, episodes: episodeTables[i] },
				{ ...exposure.options, bindings: { cohort: query.cohort, episodes: exposure.episodes }, logger },
			),
		);

		const combined = combine(query.exposures, partitions, query, logger);
		const split = query.events ? splitAtEvents(combined.intervals, events, { ...query.events, logger }) : undefined;

		const warnings = [
			...partitions.flatMap((partition, i) =>
				partition.warnings.map((warning) => `${query.exposures[i].name}: ${warning}`),
			),
			...(combined.merge?.warnings ?? []),
		];

		return {
			intervals: split ? split.intervals : combined.intervals,
			partitions: Object.fromEntries(query.exposures.map((exposure, i) => [exposure.name, partitions[i]])),
			...(combined.merge ? { merge: combined.merge } : {}),
			...(split ? { events: split } : {}),
			warnings,
		};
	}

	return {
		run,
	};
}
