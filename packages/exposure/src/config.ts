/**
 * Partitioner options.
 *
 * Callers pass a flat options object (one flag per mode, as in an analysis
 * script). It is validated once and turned into an immutable
 * `PartitionConfig` whose modes are tagged unions.
 */

import {
	ColumnSchema,
	CutpointsSchema,
	ExposureValueSchema,
	NonNegativeDaysSchema,
	TimeUnitSchema,
	parseOptions,
	type CohortBindings,
	type EpisodeBindings,
	type ExposureValue,
	type Logger,
	type TimeUnit,
} from '@persontime/core';
import { z } from 'zod';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * How concurrently active episodes resolve to one state.
 */
export type OverlapStrategy =
	| { kind: 'layer' }
	| { kind: 'priority'; order: readonly ExposureValue[] }
	| { kind: 'split' }
	| { kind: 'combine'; column: string };

/**
 * A derived view of the exposure timeline.
 */
export type Projection =
	| { kind: 'evertreated' }
	| { kind: 'currentformer' }
	| { kind: 'duration'; cutpoints: readonly number[]; unit: TimeUnit }
	| { kind: 'continuous'; unit: TimeUnit }
	| { kind: 'recency'; cutpoints: readonly number[]; unit: TimeUnit }
	| { kind: 'dose'; cutpoints: readonly number[] | null };

export type ProjectionKind = Projection['kind'];

/**
 * Grace thresholds in days. Values are matched by their string form.
 */
export interface GraceConfig {
	default: number;
	byValue: ReadonlyMap<string, number>;
}

export interface PartitionConfig {
	readonly reference: ExposureValue;
	readonly strategy: OverlapStrategy;
	readonly projection: Projection | null;
	readonly bytype: boolean;
	readonly grace: GraceConfig;
	readonly merge: number;
	readonly lag: number;
	readonly washout: number;
	readonly fillgaps: number;
	readonly carryforward: number;
	readonly acuteWindow: { readonly min: number; readonly max: number } | null;
	readonly expandunit: TimeUnit | null;
	readonly switching: boolean;
	readonly switchingdetail: boolean;
	readonly statetime: boolean;
	readonly generate: string;
}

// ============================================================================
// External Options
// ============================================================================

const CohortBindingsSchema = z.object({
	id: ColumnSchema,
	entry: ColumnSchema,
	exit: ColumnSchema,
	keep: z.array(ColumnSchema).optional(),
});

const EpisodeBindingsSchema = z.object({
	id: ColumnSchema,
	start: ColumnSchema,
	stop: ColumnSchema.optional(),
	exposure: ColumnSchema,
	priority: ColumnSchema.optional(),
	dose: ColumnSchema.optional(),
});

const GraceSchema = z.union([
	NonNegativeDaysSchema,
	z.object({
		default: NonNegativeDaysSchema.optional(),
		byValue: z.record(NonNegativeDaysSchema),
	}),
]);

const LoggerSchema = z.custom<Logger>(
	(value) => typeof value === 'object' && value !== null && 'child' in value,
	'logger must be a pino logger',
);

export const PartitionOptionsSchema = z
	.object({
		bindings: z.object({
			cohort: CohortBindingsSchema,
			episodes: EpisodeBindingsSchema,
		}),
		reference: ExposureValueSchema,
		pointTime: z.boolean().optional(),
		// Exposure definitions
		evertreated: z.boolean().optional(),
		currentformer: z.boolean().optional(),
		duration: CutpointsSchema.optional(),
		continuousunit: TimeUnitSchema.optional(),
		recency: CutpointsSchema.optional(),
		dose: z.boolean().optional(),
		dosecuts: CutpointsSchema.optional(),
		unit: TimeUnitSchema.optional(),
		bytype: z.boolean().optional(),
		// Overlap handling
		layer: z.boolean().optional(),
		priority: z.array(ExposureValueSchema).min(1).optional(),
		split: z.boolean().optional(),
		combine: ColumnSchema.optional(),
		// Time adjustments
		grace: GraceSchema.optional(),
		merge: NonNegativeDaysSchema.optional(),
		lag: NonNegativeDaysSchema.optional(),
		washout: NonNegativeDaysSchema.optional(),
		fillgaps: NonNegativeDaysSchema.optional(),
		carryforward: NonNegativeDaysSchema.optional(),
		window: z
			.tuple([NonNegativeDaysSchema, NonNegativeDaysSchema])
			.refine(([min, max]) => min <= max, { message: 'window minimum must not exceed its maximum' })
			.optional(),
		expandunit: TimeUnitSchema.optional(),
		// Pattern tracking
		switching: z.boolean().optional(),
		switchingdetail: z.boolean().optional(),
		statetime: z.boolean().optional(),
		// Output
		generate: ColumnSchema.optional(),
		check: z.boolean().optional(),
		logger: LoggerSchema.optional(),
	})
	.superRefine((options, ctx) => {
		if (!options.pointTime && options.bindings.episodes.stop === undefined) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['bindings', 'episodes', 'stop'],
				message: 'a stop column is required unless pointTime is set',
			});
		}

		const definitions = [
			options.evertreated === true && 'evertreated',
			options.currentformer === true && 'currentformer',
			options.duration !== undefined && 'duration',
			options.continuousunit !== undefined && 'continuousunit',
			options.recency !== undefined && 'recency',
			options.dose === true && 'dose',
		].filter((name): name is string => typeof name === 'string');
		if (definitions.length > 1) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `only one exposure definition can be requested, got ${definitions.join(' and ')}`,
			});
		}

		const strategies = [
			options.layer === true && 'layer',
			options.priority !== undefined && 'priority',
			options.split === true && 'split',
			options.combine !== undefined && 'combine',
		].filter((name): name is string => typeof name === 'string');
		if (strategies.length > 1) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `only one overlap strategy can be requested, got ${strategies.join(' and ')}`,
			});
		}

		if (options.dosecuts !== undefined && options.dose !== true) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dosecuts'], message: 'dosecuts requires dose' });
		}

		if (options.bytype === true && definitions.length === 0) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['bytype'],
				message: 'bytype requires an exposure definition',
			});
		}
	});

export type PartitionOptions = Omit<z.input<typeof PartitionOptionsSchema>, 'bindings' | 'logger'> & {
	bindings: { cohort: CohortBindings; episodes: EpisodeBindings };
	logger?: Logger;
};

type ParsedOptions = z.output<typeof PartitionOptionsSchema>;

// ============================================================================
// Resolution
// ============================================================================

function resolveStrategy(options: ParsedOptions): OverlapStrategy {
	if (options.priority !== undefined) return { kind: 'priority', order: options.priority };
	if (options.split === true) return { kind: 'split' };
	if (options.combine !== undefined) return { kind: 'combine', column: options.combine };
	return { kind: 'layer' };
}

function resolveProjection(options: ParsedOptions): Projection | null {
	const unit = options.unit ?? 'years';
	if (options.evertreated) return { kind: 'evertreated' };
	if (options.currentformer) return { kind: 'currentformer' };
	if (options.duration !== undefined) return { kind: 'duration', cutpoints: options.duration, unit };
	if (options.continuousunit !== undefined) return { kind: 'continuous', unit: options.continuousunit };
	if (options.recency !== undefined) return { kind: 'recency', cutpoints: options.recency, unit };
	if (options.dose) return { kind: 'dose', cutpoints: options.dosecuts ?? null };
	return null;
}

function resolveGrace(grace: ParsedOptions['grace']): GraceConfig {
	if (grace === undefined) return { default: 0, byValue: new Map() };
	if (typeof grace === 'number') return { default: grace, byValue: new Map() };
	return { default: grace.default ?? 0, byValue: new Map(Object.entries(grace.byValue)) };
}

/**
 * Validates external options and builds the frozen configuration.
 * Throws before any row is read.
 */
export function resolvePartitionConfig(options: PartitionOptions): PartitionConfig {
	const parsed = parseOptions(PartitionOptionsSchema, options);

	return Object.freeze({
		reference: parsed.reference,
		strategy: resolveStrategy(parsed),
		projection: resolveProjection(parsed),
		bytype: parsed.bytype ?? false,
		grace: resolveGrace(parsed.grace),
		merge: parsed.merge ?? 0,
		lag: parsed.lag ?? 0,
		washout: parsed.washout ?? 0,
		fillgaps: parsed.fillgaps ?? 0,
		carryforward: parsed.carryforward ?? 0,
		acuteWindow: parsed.window ? { min: parsed.window[0], max: parsed.window[1] } : null,
		expandunit: parsed.expandunit ?? null,
		switching: parsed.switching ?? false,
		switchingdetail: parsed.switchingdetail ?? false,
		statetime: parsed.statetime ?? false,
		generate: parsed.generate ?? 'tv_exposure',
	});
}

/**
 * Threshold for bridging a gap between two episodes of `value`.
 */
export function graceFor(grace: GraceConfig, value: ExposureValue): number {
	return grace.byValue.get(String(value)) ?? grace.default;
}

/**
 * Default column stub for per-type projection columns.
 */
export function projectionStub(projection: Projection): string {
	switch (projection.kind) {
		case 'evertreated':
			return 'ever';
		case 'currentformer':
			return 'cf';
		case 'duration':
			return 'duration';
		case 'continuous':
			return 'tv_exp';
		case 'recency':
			return 'recency';
		case 'dose':
			return 'tv_dose';
	}
}
