/**
 * The exposure partitioner: study windows plus overlapping episodes in,
 * canonical intervals out.
 */

import {
	DataError,
	componentLogger,
	diagnose,
	groupBySubject,
	personTime,
	readEpisodes,
	readStudyWindows,
	type Cell,
	type Diagnostics,
	type Episode,
	type ExposureValue,
	type Interval,
	type IntervalColumns,
	type Row,
	type StudyWindow,
	type SubjectId,
} from '@persontime/core';
import {
	projectionStub,
	resolvePartitionConfig,
	type PartitionConfig,
	type PartitionOptions,
	type ProjectionKind,
} from './config.js';
import { prepareEpisodes } from './episodes.js';
import { addPatternColumns, type SubjectRow } from './patterns.js';
import { crossingPoints, evaluateTrack, overallTrack, valueTrack, type Track } from './projections.js';
import { SPLIT_SEPARATOR, distinctValues } from './resolve.js';
import { carryForward, coalesceSegments, expandSegments, splitAt, sweepSegments, type Segment } from './sweep.js';

// ============================================================================
// Result Types
// ============================================================================

export interface PartitionInput {
	cohort: readonly Row[];
	episodes: readonly Row[];
}

export interface PartitionMetadata {
	subjects: number;
	episodes: number;
	rows: number;
	personTime: number;
	exposureDefinition: ProjectionKind | 'timevarying';
	overlapStrategy: PartitionConfig['strategy']['kind'];
	/** Per-value columns written under `bytype` */
	typeColumns: string[];
}

export interface PartitionResult {
	intervals: Interval[];
	/** Column names to use with `toRows` */
	columns: IntervalColumns;
	metadata: PartitionMetadata;
	diagnostics?: Diagnostics;
	warnings: string[];
}

export interface SubjectPartition {
	id: SubjectId;
	intervals: Interval[];
}

// ============================================================================
// Column Naming
// ============================================================================

/**
 * Column suffix for an exposure value: `-` becomes `neg`, `.` becomes `p`.
 */
export function valueSuffix(value: ExposureValue): string {
	return String(value).replaceAll('-', 'neg').replaceAll('.', 'p');
}

export function typeColumn(config: PartitionConfig, value: ExposureValue): string | null {
	return config.projection ? `${projectionStub(config.projection)}${valueSuffix(value)}` : null;
}

// ============================================================================
// Per-subject Partition
// ============================================================================

function sameCells(a: Record<string, Cell>, b: Record<string, Cell>): boolean {
	const keys = Object.keys(a);
	return keys.length === Object.keys(b).length && keys.every((key) => a[key] === b[key]);
}

function coalesceRows(rows: SubjectRow[]): SubjectRow[] {
	const result: SubjectRow[] = [];
	for (const row of rows) {
		const last = result.at(-1);
		if (last && last.stop === row.start && last.exposure === row.exposure && sameCells(last.values, row.values)) {
			last.stop = row.stop;
		} else {
			result.push(row);
		}
	}
	return result;
}

function projectRows(
	segments: readonly Segment[],
	window: StudyWindow,
	config: PartitionConfig,
	typeValues: readonly ExposureValue[],
): SubjectRow[] {
	const { projection, strategy } = config;
	const typed: [string, Track][] = [];
	if (projection && config.bytype) {
		for (const value of typeValues) {
			typed.push([`${projectionStub(projection)}${valueSuffix(value)}`, valueTrack(value)]);
		}
	}

	let pieces = [...segments];
	if (projection) {
		const tracks = [overallTrack, ...typed.map(([, track]) => track)];
		const points = tracks.flatMap((track) => crossingPoints(segments, projection, track));
		pieces = segments.flatMap((segment) => splitAt(segment, points));
	}

	const overall = projection ? evaluateTrack(pieces, projection, overallTrack) : null;
	const byType = typed.map(([column, track]) => [column, projection ? evaluateTrack(pieces, projection, track) : []] as const);
	const accumulates = projection?.kind === 'continuous' || (projection?.kind === 'dose' && !projection.cutpoints);

	return pieces.map((piece, i) => {
		const values: Record<string, Cell> = { ...window.attributes };
		if (strategy.kind === 'combine') {
			values[strategy.column] = piece.coOccurring ? 1 : 0;
		}
		for (const [column, cells] of byType) {
			values[column] = cells[i];
		}

		let exposure = piece.state;
		if (projection && overall && !config.bytype) {
			exposure = overall[i];
			if (accumulates) values[projectionStub(projection)] = overall[i];
		}

		return { start: piece.start, stop: piece.stop, exposure, values };
	});
}

/**
 * Partitions one subject's window. `typeValues` fixes the per-value columns
 * written under `bytype`; it defaults to the subject's own exposed values.
 */
export function partitionSubject(
	window: StudyWindow,
	episodes: readonly Episode[],
	config: PartitionConfig,
	typeValues?: readonly ExposureValue[],
): Interval[] {
	const prepared = prepareEpisodes(window, episodes, config);

	let segments = carryForward(coalesceSegments(sweepSegments(window, prepared, config)), config.carryforward);
	if (config.expandunit) {
		segments = expandSegments(segments, config.expandunit);
	}

	const values =
		typeValues ?? distinctValues(episodes.map((episode) => episode.value)).filter((value) => value !== config.reference);
	let rows = projectRows(segments, window, config, values);
	if (!config.expandunit) {
		rows = coalesceRows(rows);
	}
	addPatternColumns(rows, config);

	return rows.map((row) => ({ id: window.id, ...row }));
}

// ============================================================================
// Table Entry Points
// ============================================================================

interface PreparedInput {
	config: PartitionConfig;
	windows: StudyWindow[];
	episodesBySubject: Map<SubjectId, Episode[]>;
	episodeCount: number;
	typeValues: ExposureValue[];
}

function prepareInput(input: PartitionInput, options: PartitionOptions): PreparedInput {
	const config = resolvePartitionConfig(options);
	const { bindings } = options;

	if (input.cohort.length === 0) {
		throw new DataError('The cohort table is empty');
	}
	if (input.episodes.length === 0) {
		throw new DataError('The episode table is empty');
	}

	const windows = readStudyWindows(input.cohort, bindings.cohort);
	const episodes = readEpisodes(input.episodes, bindings.episodes, { pointTime: options.pointTime });
	if (config.strategy.kind === 'split') {
		const joined = episodes.find((episode) => String(episode.value).includes(SPLIT_SEPARATOR));
		if (joined) {
			throw new DataError(
				`Subject ${joined.id} has exposure value "${joined.value}", which contains the split separator "${SPLIT_SEPARATOR}"`,
				{ id: joined.id, value: joined.value },
			);
		}
	}
	const doseColumn = bindings.episodes.dose;
	if (config.projection?.kind === 'dose' && doseColumn !== undefined) {
		const missing = episodes.find((episode) => episode.dose === undefined);
		if (missing) {
			throw new DataError(`Subject ${missing.id} has an episode with no ${doseColumn} value`, {
				id: missing.id,
				start: missing.start,
				column: doseColumn,
			});
		}
	}
	const episodesBySubject = groupBySubject(episodes);

	const known = new Set(windows.map((window) => window.id));
	const unknown = [...episodesBySubject.keys()].filter((id) => !known.has(id));
	if (unknown.length > 0) {
		throw new DataError(`Episodes reference subjects missing from the cohort: ${unknown.join(', ')}`, { unknown });
	}

	return {
		config,
		windows: [...groupBySubject(windows).values()].flat(),
		episodesBySubject,
		episodeCount: episodes.length,
		typeValues: distinctValues(episodes.map((episode) => episode.value)).filter((value) => value !== config.reference),
	};
}

/**
 * Yields each subject's intervals in subject order. Options are validated
 * before the first subject is produced.
 */
export function* streamPartitions(input: PartitionInput, options: PartitionOptions): Generator<SubjectPartition> {
	const { config, windows, episodesBySubject, typeValues } = prepareInput(input, options);

	for (const window of windows) {
		yield {
			id: window.id,
			intervals: partitionSubject(window, episodesBySubject.get(window.id) ?? [], config, typeValues),
		};
	}
}

/**
 * Partitions every subject of a cohort against an episode table.
 *
 * @example
 * ```typescript
 * const { intervals } = partitionExposures(
 *   {
 *     cohort: [{ id: 1, entry: '2020-01-01', exit: '2020-12-31' }],
 *     episodes: [{ id: 1, start: '2020-03-01', stop: '2020-08-28', drug: 1 }],
 *   },
 *   {
 *     bindings: {
 *       cohort: { id: 'id', entry: 'entry', exit: 'exit' },
 *       episodes: { id: 'id', start: 'start', stop: 'stop', exposure: 'drug' },
 *     },
 *     reference: 0,
 *   },
 * );
 * ```
 */
export function partitionExposures(input: PartitionInput, options: PartitionOptions): PartitionResult {
	const logger = componentLogger('exposure', options.logger);
	const { config, windows, episodesBySubject, episodeCount, typeValues } = prepareInput(input, options);
	const warnings: string[] = [];

	logger.debug({ subjects: windows.length, episodes: episodeCount }, 'partitioning exposures');

	if (config.projection?.kind === 'dose' && config.reference !== 0) {
		warnings.push(`Dose mode treats unexposed time as zero dose; reference ${config.reference} is only used as a label`);
	}
	if (config.bytype && typeValues.length === 0) {
		warnings.push('No exposed values found; bytype adds no columns');
	}

	const intervals = windows.flatMap((window) =>
		partitionSubject(window, episodesBySubject.get(window.id) ?? [], config, typeValues),
	);

	const typeColumns = config.bytype
		? typeValues.map((value) => typeColumn(config, value)).filter((column): column is string => column !== null)
		: [];
	const metadata: PartitionMetadata = {
		subjects: windows.length,
		episodes: episodeCount,
		rows: intervals.length,
		personTime: personTime(intervals),
		exposureDefinition: config.projection?.kind ?? 'timevarying',
		overlapStrategy: config.strategy.kind,
		typeColumns,
	};

	for (const warning of warnings) {
		logger.warn(warning);
	}
	logger.info({ subjects: metadata.subjects, rows: metadata.rows, personTime: metadata.personTime }, 'partition complete');

	return {
		intervals,
		columns: {
			id: options.bindings.cohort.id,
			start: 'start',
			stop: 'stop',
			exposure: config.generate,
		},
		metadata,
		...(options.check ? { diagnostics: diagnose(intervals, windows) } : {}),
		warnings,
	};
}
