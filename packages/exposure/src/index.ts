/**
 * persontime exposure
 *
 * Partitions study windows against overlapping exposure episodes into
 * non-overlapping, gapless intervals with one resolved state each.
 *
 * @packageDocumentation
 */

// Partitioner
export {
	partitionExposures,
	partitionSubject,
	streamPartitions,
	typeColumn,
	valueSuffix,
	type PartitionInput,
	type PartitionMetadata,
	type PartitionResult,
	type SubjectPartition,
} from './partition.js';
// Configuration
export {
	graceFor,
	PartitionOptionsSchema,
	projectionStub,
	resolvePartitionConfig,
	type GraceConfig,
	type OverlapStrategy,
	type PartitionConfig,
	type PartitionOptions,
	type Projection,
	type ProjectionKind,
} from './config.js';
// Building blocks
export {
	adjustEpisodes,
	applyAcuteWindow,
	bridgeGraceGaps,
	fillTerminalGap,
	mergeEpisodes,
	prepareEpisodes,
	type PreparedEpisode,
} from './episodes.js';
export { SPLIT_SEPARATOR, compareValues, distinctValues, resolveActive, type Resolution } from './resolve.js';
export { carryForward, coalesceSegments, expandSegments, splitAt, sweepSegments, type Segment } from './sweep.js';
export { crossingPoints, evaluateTrack, overallTrack, valueTrack, type Track } from './projections.js';
export { STATETIME_COLUMN, SWITCHED_COLUMN, SWITCHING_PATTERN_COLUMN, addPatternColumns } from './patterns.js';
