/**
 * Typed failures raised by every person-time component.
 *
 * All failures are synchronous. Configuration and validation errors are
 * raised before any row is processed; data errors abort the call that
 * found them. Nothing is repaired silently.
 */

import type { ZodError } from 'zod';

export type PersonTimeErrorTag = 'ConfigurationError' | 'ValidationError' | 'DataError';

export abstract class PersonTimeError extends Error {
	abstract readonly _tag: PersonTimeErrorTag;
	readonly context?: Record<string, unknown>;

	constructor(message: string, context?: Record<string, unknown>) {
		super(message);
		this.name = new.target.name;
		this.context = context;
	}

	toJSON() {
		return {
			_tag: this._tag,
			message: this.message,
			context: this.context,
		};
	}
}

/**
 * A column binding is missing or structural options cannot work together.
 */
export class ConfigurationError extends PersonTimeError {
	readonly _tag = 'ConfigurationError' as const;
}

/**
 * An option value is out of range, or a table breaks the canonical form.
 */
export class ValidationError extends PersonTimeError {
	readonly _tag = 'ValidationError' as const;
}

/**
 * Input rows are empty, inconsistent or unreadable.
 */
export class DataError extends PersonTimeError {
	readonly _tag = 'DataError' as const;
}

export function isPersonTimeError(error: unknown): error is PersonTimeError {
	return error instanceof PersonTimeError;
}

/**
 * Converts zod issues into a single typed error. Issues under one of the
 * `configurationKeys` (column bindings, input lists) become configuration
 * errors; everything else is a validation error.
 */
export function fromZodError(
	error: ZodError,
	configurationKeys: readonly string[] = ['bindings'],
): ConfigurationError | ValidationError {
	const issues = error.issues.map((issue) => ({
		path: issue.path.join('.'),
		message: issue.message,
	}));
	const message = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
	const structural = error.issues.some((issue) => {
		const head = issue.path[0];
		return typeof head === 'string' && configurationKeys.includes(head);
	});

	return structural
		? new ConfigurationError(message, { issues })
		: new ValidationError(message, { issues });
}
