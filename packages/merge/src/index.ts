/**
 * persontime merge
 *
 * Intersects two or more canonical interval tables into joint exposure states.
 *
 * @packageDocumentation
 */

export {
	intersectSubject,
	jointLabel,
	mergeIntervals,
	sourceFromRows,
	type MergeDiagnostics,
	type MergeMode,
	type MergeOptions,
	type MergeResult,
	type MergeSource,
} from './intersect.js';
