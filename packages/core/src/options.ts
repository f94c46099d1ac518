/**
 * Zod building blocks for component options.
 */

import { z } from 'zod';
import { fromZodError } from './errors.js';
import { TIME_UNITS } from './days.js';

export const ColumnSchema = z.string().min(1, 'column name must not be empty');

export const NonNegativeDaysSchema = z.number().int('must be a whole number of days').nonnegative('must not be negative');

export const TimeUnitSchema = z.enum(TIME_UNITS, {
	errorMap: () => ({ message: `unit must be one of ${TIME_UNITS.join(', ')}` }),
});

export const ExposureValueSchema = z.union([z.number(), z.string()]);

/**
 * Strictly increasing positive cutpoints.
 */
export const CutpointsSchema = z
	.array(z.number().positive('cutpoints must be positive'))
	.min(1, 'at least one cutpoint is required')
	.refine((cuts) => cuts.every((cut, i) => i === 0 || cut > cuts[i - 1]), {
		message: 'cutpoints must be strictly increasing',
	});

/**
 * Parses external options, raising a typed error on the first failure.
 */
export function parseOptions<T extends z.ZodTypeAny>(
	schema: T,
	input: unknown,
	configurationKeys?: readonly string[],
): z.output<T> {
	const result = schema.safeParse(input);
	if (!result.success) {
		throw fromZodError(result.error, configurationKeys);
	}
	return result.data;
}
