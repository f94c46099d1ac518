/**
 * Pipeline Type Definitions
 */

import type { CohortBindings, EpisodeBindings, Interval, Logger, Row, SubjectId } from '@persontime/core';
import type { SplitOptions, SplitResult } from '@persontime/events';
import type { PartitionOptions, PartitionResult } from '@persontime/exposure';
import type { MergeOptions, MergeResult } from '@persontime/merge';

// ============================================================================
// Adapter
// ============================================================================

/**
 * Loads the tables a pipeline run needs. Adapters are the only place that
 * touches storage.
 */
export interface PersonTimeAdapter {
	/** Cohort rows; one per subject */
	getCohort(query: { subjects?: SubjectId[] }): Promise<Row[]>;
	/** Episode rows of one named exposure source */
	getEpisodes(query: { source: string; subjects?: SubjectId[] }): Promise<Row[]>;
	/** Event rows; required when a query asks for event splitting */
	getEvents?(query: { subjects?: SubjectId[] }): Promise<Row[]>;
}

// ============================================================================
// Query
// ============================================================================

/**
 * One exposure source to partition.
 */
export interface ExposureQuery {
	/** Source name passed to the adapter and used as the merge input name */
	name: string;
	episodes: EpisodeBindings;
	options: Omit<PartitionOptions, 'bindings' | 'logger'>;
	/** Value columns carried through the merge */
	keep?: readonly string[];
	/** Value columns rescaled by the merge */
	continuous?: readonly string[];
}

export interface PipelineQuery {
	cohort: CohortBindings;
	/** At least one source; several are intersected */
	exposures: ExposureQuery[];
	merge?: Omit<MergeOptions, 'logger'>;
	/** Split at events when given */
	events?: Omit<SplitOptions, 'logger'>;
	/** Restrict the run to these subjects */
	subjects?: SubjectId[];
}

// ============================================================================
// Result
// ============================================================================

export interface PipelineResult {
	intervals: Interval[];
	partitions: Record<string, PartitionResult>;
	merge?: MergeResult;
	events?: SplitResult;
	warnings: string[];
}

export interface PersonTimePipeline {
	run(query: PipelineQuery): Promise<PipelineResult>;
}

export interface CreatePipelineOptions {
	adapter: PersonTimeAdapter;
	logger?: Logger;
}
