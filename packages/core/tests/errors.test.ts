import { describe, expect, test } from 'vitest';
import { z } from 'zod';
import { ConfigurationError, DataError, ValidationError, fromZodError, isPersonTimeError } from '../src/errors.js';
import { CutpointsSchema, parseOptions } from '../src/options.js';
import { proportionCell, proportionRatio } from '../src/proportion.js';

describe('errors', () => {
	test('carry a tag, a name and context', () => {
		const error = new DataError('bad row', { id: 1 });

		expect(error._tag).toBe('DataError');
		expect(error.name).toBe('DataError');
		expect(error.toJSON()).toEqual({ _tag: 'DataError', message: 'bad row', context: { id: 1 } });
		expect(isPersonTimeError(error)).toBe(true);
		expect(isPersonTimeError(new Error('plain'))).toBe(false);
	});

	test('zod issues under bindings become configuration errors', () => {
		const schema = z.object({ bindings: z.object({ id: z.string() }), lag: z.number() });
		const result = schema.safeParse({ bindings: {}, lag: 1 });
		expect(result.success).toBe(false);
		if (!result.success) {
			const error = fromZodError(result.error);
			expect(error).toBeInstanceOf(ConfigurationError);
			expect(error.message).toBe('bindings.id: Required');
		}
	});

	test('other zod issues become validation errors', () => {
		expect(() => parseOptions(z.object({ lag: z.number().nonnegative() }), { lag: -1 })).toThrow(ValidationError);
	});
});

describe('CutpointsSchema', () => {
	test('accepts strictly increasing positive cutpoints', () => {
		expect(CutpointsSchema.safeParse([1, 2.5, 10]).success).toBe(true);
		expect(CutpointsSchema.safeParse([1, 1]).success).toBe(false);
		expect(CutpointsSchema.safeParse([0, 1]).success).toBe(false);
		expect(CutpointsSchema.safeParse([]).success).toBe(false);
	});
});

describe('proportioning', () => {
	test('uses elapsed durations by default', () => {
		expect(proportionRatio(25, 100)).toBe(0.25);
		expect(proportionRatio(0, 0)).toBe(1);
	});

	test('adds a day to both sides for inclusive tables', () => {
		expect(proportionRatio(0, 9, 'inclusive')).toBe(0.1);
	});

	test('keeps missing values missing and rejects text', () => {
		expect(proportionCell(null, 0.5, 'dose')).toBeNull();
		expect(proportionCell(80, 0.5, 'dose')).toBe(40);
		expect(() => proportionCell('high', 0.5, 'dose')).toThrow(DataError);
	});
});
