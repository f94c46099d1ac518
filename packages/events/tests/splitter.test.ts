import { ConfigurationError, type Interval } from '@persontime/core';
import { describe, expect, test } from 'vitest';
import { recurringEvents, singleEvents, splitAtEvents, type SplitOptions } from '../src/splitter.js';

const row = (id: number, start: number, stop: number, exposure: number, values: Interval['values'] = {}): Interval => ({
	id,
	start,
	stop,
	exposure,
	values,
});

const spans = (intervals: Interval[]) => intervals.map((i) => [i.start, i.stop, i.values.failure]);
const bindings: SplitOptions['bindings'] = { id: 'id', date: 'event' };

describe('splitAtEvents', () => {
	test('cuts at a single event, rescales continuous values and drops later time', () => {
		const result = splitAtEvents([row(1, 0, 100, 1, { dose: 100 })], [{ id: 1, event: 50 }], {
			bindings,
			continuous: ['dose'],
		});

		expect(result.intervals).toEqual([{ id: 1, start: 0, stop: 50, exposure: 1, values: { dose: 50, failure: 1 } }]);
		expect(result.events).toBe(1);
		expect(result.rows).toBe(1);
		expect(result.type).toBe('single');
	});

	test('flags a row ending on the event day without cutting it', () => {
		const result = splitAtEvents([row(1, 0, 50, 1), row(1, 50, 100, 0)], [{ id: 1, event: 50 }], { bindings });
		expect(spans(result.intervals)).toEqual([[0, 50, 1]]);
	});

	test('does not attribute an event to the row starting on that day', () => {
		const result = splitAtEvents([row(1, 50, 100, 1)], [{ id: 1, event: 50 }], { bindings });
		expect(spans(result.intervals)).toEqual([[50, 100, 0]]);
	});

	test('keeps a zero-duration row on the event day unflagged', () => {
		const result = splitAtEvents([row(1, 0, 50, 1), row(1, 50, 50, 0)], [{ id: 1, event: 50 }], { bindings });
		expect(spans(result.intervals)).toEqual([
			[0, 50, 1],
			[50, 50, 0],
		]);
	});

	test('leaves subjects without an event date unchanged', () => {
		const result = splitAtEvents([row(1, 0, 100, 1), row(2, 0, 100, 1)], [{ id: 1, event: null }], { bindings });
		expect(result.intervals.map((i) => [i.id, i.start, i.stop, i.values.failure])).toEqual([
			[1, 0, 100, 0],
			[2, 0, 100, 0],
		]);
		expect(result.events).toBe(0);
	});

	test('ignores events outside follow-up', () => {
		const result = splitAtEvents([row(1, 0, 100, 1)], [{ id: 1, event: 200 }], { bindings });
		expect(spans(result.intervals)).toEqual([[0, 100, 0]]);
	});

	test('uses the earliest competing event and its status', () => {
		const result = splitAtEvents(
			[row(1, 0, 100, 1), row(2, 0, 100, 1)],
			[
				{ id: 1, event: 60, death: 30, emigration: null },
				{ id: 2, event: 40, death: 40, emigration: 10 },
			],
			{ bindings: { ...bindings, compete: ['death', 'emigration'] } },
		);

		expect(result.intervals.map((i) => [i.id, i.start, i.stop, i.values.failure])).toEqual([
			[1, 0, 30, 2],
			[2, 0, 10, 3],
		]);
		expect(result.labels).toEqual({ 0: 'Censored', 1: 'Event', 2: 'Competing event 1', 3: 'Competing event 2' });
	});

	test('applies every date for recurring events without dropping rows', () => {
		const result = splitAtEvents(
			[row(1, 0, 100, 1, { dose: 10 })],
			[
				{ id: 1, visit1: 20, visit2: 70 },
				{ id: 1, visit1: 20, visit2: null },
			],
			{ bindings: { id: 'id', date: ['visit1', 'visit2'] }, type: 'recurring', continuous: ['dose'] },
		);

		expect(result.intervals.map((i) => [i.start, i.stop, i.values.failure, i.values.dose])).toEqual([
			[0, 20, 1, 2],
			[20, 70, 1, 5],
			[70, 100, 0, 3],
		]);
		expect(result.events).toBe(2);
	});

	test('preserves continuous totals when nothing is censored', () => {
		const result = splitAtEvents([row(1, 0, 100, 1, { dose: 40 })], [{ id: 1, visit: 25 }], {
			bindings: { id: 'id', date: 'visit' },
			type: 'recurring',
			continuous: ['dose'],
		});
		expect(result.intervals.reduce((total, i) => total + Number(i.values.dose), 0)).toBe(40);
	});

	test('adds duration and kept event columns', () => {
		const result = splitAtEvents([row(1, 0, 730, 1)], [{ id: 1, event: null, cause: 'cardiac' }], {
			bindings,
			timegen: { column: 'years', unit: 'years' },
			keep: ['cause'],
			generate: 'outcome',
		});
		expect(result.intervals[0].values).toEqual({ outcome: 0, cause: 'cardiac', years: 730 / 365.25 });
	});

	test('refuses to overwrite an existing status column unless asked', () => {
		const intervals = [row(1, 0, 100, 1, { failure: 0 })];
		expect(() => splitAtEvents(intervals, [{ id: 1, event: 50 }], { bindings })).toThrow(ConfigurationError);
		expect(spans(splitAtEvents(intervals, [{ id: 1, event: 50 }], { bindings, replace: true }).intervals)).toEqual([
			[0, 50, 1],
		]);
	});

	test('rejects competing events with recurring events', () => {
		expect(() =>
			splitAtEvents([row(1, 0, 100, 1)], [{ id: 1, event: 5, death: 9 }], {
				bindings: { ...bindings, compete: ['death'] },
				type: 'recurring',
			}),
		).toThrow(ConfigurationError);
	});

	test('rejects missing event columns', () => {
		expect(() => splitAtEvents([row(1, 0, 100, 1)], [{ id: 1, when: 5 }], { bindings })).toThrow(
			ConfigurationError,
		);
	});

	test('accepts custom labels', () => {
		const result = splitAtEvents([row(1, 0, 10, 1)], [], { bindings, eventLabels: { 1: 'Stroke' } });
		expect(result.labels).toEqual({ 0: 'Censored', 1: 'Stroke' });
	});
});

describe('singleEvents', () => {
	test('lets the primary event win ties', () => {
		const events = singleEvents([{ id: 1, event: 30, death: 30 }], { id: 'id', date: 'event', compete: ['death'] });
		expect(events.get(1)).toEqual({ day: 30, status: 1 });
	});

	test('reads ISO dates', () => {
		const events = singleEvents([{ id: 'a', event: '2020-01-02' }], bindings);
		expect(events.get('a')).toEqual({ day: 18263, status: 1 });
	});
});

describe('recurringEvents', () => {
	test('collects distinct sorted dates per subject', () => {
		const events = recurringEvents(
			[
				{ id: 1, event: 40 },
				{ id: 1, event: 10 },
				{ id: 1, event: 40 },
			],
			bindings,
		);
		expect(events.get(1)).toEqual([
			{ day: 10, status: 1 },
			{ day: 40, status: 1 },
		]);
	});
});
