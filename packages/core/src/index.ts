/**
 * persontime core
 *
 * Shared primitives for the person-time packages: records, day arithmetic,
 * spans, table binding, diagnostics, errors and logging.
 *
 * @packageDocumentation
 */

// Day arithmetic
export {
	MS_PER_DAY,
	TIME_UNITS,
	UNIT_DAYS,
	calendarBoundaries,
	daysToUnit,
	fromDayNumber,
	isTimeUnit,
	nextCalendarBoundary,
	toDayNumber,
	toOptionalDayNumber,
	type TimeUnit,
} from './days.js';
// Spans
export { mergeSpans, spansOverlap, subtractSpans, type Span } from './spans.js';
// Tables
export {
	DEFAULT_INTERVAL_COLUMNS,
	compareSubjectIds,
	fromRows,
	groupBySubject,
	readCell,
	readEpisodes,
	readStudyWindows,
	readSubjectId,
	requireColumns,
	sortIntervals,
	toRows,
	type CohortBindings,
	type EpisodeBindings,
	type IntervalBindings,
} from './tables.js';
// Diagnostics
export {
	assertCanonical,
	checkCoverage,
	diagnose,
	findGaps,
	findOverlaps,
	personTime,
	summarizeStates,
	type CoverageReport,
	type Diagnostics,
	type GapFinding,
	type OverlapFinding,
	type TimedRow,
} from './diagnostics.js';
// Proportioning
export { proportionCell, proportionRatio, type ProportionMode } from './proportion.js';
// Errors
export {
	ConfigurationError,
	DataError,
	PersonTimeError,
	ValidationError,
	fromZodError,
	isPersonTimeError,
	type PersonTimeErrorTag,
} from './errors.js';
// Options
export {
	ColumnSchema,
	CutpointsSchema,
	ExposureValueSchema,
	NonNegativeDaysSchema,
	TimeUnitSchema,
	parseOptions,
} from './options.js';
// Logging
export { LOG_LEVEL_ENV, componentLogger, rootLogger, type Component, type Logger } from './logger.js';

// All types
export type {
	Cell,
	DayNumber,
	Episode,
	ExposureState,
	ExposureValue,
	Interval,
	IntervalColumns,
	Row,
	StudyWindow,
	SubjectId,
} from './types.js';
