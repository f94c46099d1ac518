/**
 * persontime pipeline
 *
 * Loads cohort, episode and event tables through an adapter and runs them
 * through partitioning, intersection and event splitting.
 *
 * @packageDocumentation
 */

export { createPipeline } from './engine.js';

export type {
	CreatePipelineOptions,
	ExposureQuery,
	PersonTimeAdapter,
	PersonTimePipeline,
	PipelineQuery,
	PipelineResult,
} from './types.js';
