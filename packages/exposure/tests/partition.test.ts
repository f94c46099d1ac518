import { ConfigurationError, DataError, toRows, type Episode, type Interval, type StudyWindow } from '@persontime/core';
import { describe, expect, test } from 'vitest';
import { resolvePartitionConfig, type PartitionOptions } from '../src/config.js';
import { partitionExposures, partitionSubject, streamPartitions, valueSuffix } from '../src/partition.js';

const bindings: PartitionOptions['bindings'] = {
	cohort: { id: 'id', entry: 'entry', exit: 'exit' },
	episodes: { id: 'id', start: 'start', stop: 'stop', exposure: 'drug', dose: 'dose' },
};

const window: StudyWindow = { id: 1, entry: 0, exit: 365 };
const episode = (start: number, stop: number, value: number, extra: Partial<Episode> = {}): Episode => ({
	id: 1,
	start,
	stop,
	value,
	...extra,
});

function run(episodes: Episode[], extra: Partial<PartitionOptions> = {}, on: StudyWindow = window): Interval[] {
	return partitionSubject(on, episodes, resolvePartitionConfig({ bindings, reference: 0, ...extra }));
}

const spans = (intervals: Interval[]) => intervals.map((i) => [i.start, i.stop, i.exposure]);

describe('partitionSubject', () => {
	describe('time-varying state', () => {
		test('tags the episode span and leaves reference time around it', () => {
			const result = run([episode(59, 240, 1)]);

			expect(spans(result)).toEqual([
				[0, 59, 0],
				[59, 241, 1],
				[241, 365, 0],
			]);
			expect(result.reduce((total, i) => total + (i.stop - i.start), 0)).toBe(365);
		});

		test('covers the window with reference time when there are no episodes', () => {
			expect(spans(run([]))).toEqual([[0, 365, 0]]);
		});

		test('keeps a zero-length window as one empty row', () => {
			expect(spans(run([episode(100, 120, 1)], {}, { id: 1, entry: 100, exit: 100 }))).toEqual([[100, 100, 0]]);
		});

		test('clips episodes to the window', () => {
			expect(spans(run([episode(-10, 20, 1), episode(400, 410, 1)]))).toEqual([
				[0, 21, 1],
				[21, 365, 0],
			]);
		});

		test('shifts exposure by lag and washout', () => {
			expect(spans(run([episode(59, 240, 1)], { lag: 10, washout: 5 }))).toEqual([
				[0, 69, 0],
				[69, 246, 1],
				[246, 365, 0],
			]);
		});
	});

	describe('overlap strategies', () => {
		test('layer gives the later-starting episode precedence', () => {
			expect(spans(run([episode(0, 100, 2), episode(50, 150, 1)]))).toEqual([
				[0, 50, 2],
				[50, 151, 1],
				[151, 365, 0],
			]);
		});

		test('layer resumes the earlier episode after a nested one ends', () => {
			expect(spans(run([episode(0, 100, 1), episode(20, 30, 2)]))).toEqual([
				[0, 20, 1],
				[20, 31, 2],
				[31, 101, 1],
				[101, 365, 0],
			]);
		});

		test('priority resolves overlaps by value order', () => {
			expect(spans(run([episode(0, 100, 1), episode(50, 150, 2)], { priority: [2, 1] }))).toEqual([
				[0, 50, 1],
				[50, 151, 2],
				[151, 365, 0],
			]);
			expect(spans(run([episode(0, 100, 2), episode(50, 150, 1)], { priority: [2, 1] }))).toEqual([
				[0, 101, 2],
				[101, 151, 1],
				[151, 365, 0],
			]);
		});

		test('split labels overlaps with a composite state', () => {
			expect(spans(run([episode(0, 100, 1), episode(50, 150, 2)], { split: true }))).toEqual([
				[0, 50, 1],
				[50, 101, '1+2'],
				[101, 151, 2],
				[151, 365, 0],
			]);
		});

		test('combine flags co-occurring exposure in its own column', () => {
			const result = run([episode(0, 100, 1), episode(50, 150, 2)], { combine: 'both' });

			expect(result.map((i) => [i.start, i.stop, i.exposure, i.values.both])).toEqual([
				[0, 50, 1, 0],
				[50, 101, 2, 1],
				[101, 151, 2, 0],
				[151, 365, 0, 0],
			]);
		});
	});

	describe('gap handling', () => {
		test('grace bridges a gap no longer than the threshold', () => {
			const episodes = [episode(0, 9, 1), episode(20, 29, 1)];

			expect(spans(run(episodes, { grace: 10 }))).toEqual([
				[0, 30, 1],
				[30, 365, 0],
			]);
			expect(spans(run(episodes, { grace: 9 }))).toEqual([
				[0, 10, 1],
				[10, 20, 0],
				[20, 30, 1],
				[30, 365, 0],
			]);
		});

		test('grace does not bridge over another exposure', () => {
			expect(spans(run([episode(0, 9, 1), episode(12, 14, 2), episode(20, 29, 1)], { grace: 10 }))).toEqual([
				[0, 10, 1],
				[10, 12, 0],
				[12, 15, 2],
				[15, 20, 0],
				[20, 30, 1],
				[30, 365, 0],
			]);
		});

		test('merge consolidates nearby episodes of the same value', () => {
			expect(spans(run([episode(0, 9, 1), episode(15, 19, 1)], { merge: 5 }))).toEqual([
				[0, 20, 1],
				[20, 365, 0],
			]);
		});

		test('fillgaps extends the last exposure', () => {
			expect(spans(run([episode(0, 99, 1)], { fillgaps: 30 }))).toEqual([
				[0, 130, 1],
				[130, 365, 0],
			]);
		});

		test('carryforward fills the start of every gap after an exposure', () => {
			expect(spans(run([episode(50, 99, 1), episode(200, 299, 1)], { carryforward: 10 }))).toEqual([
				[0, 50, 0],
				[50, 110, 1],
				[110, 200, 0],
				[200, 310, 1],
				[310, 365, 0],
			]);
		});

		test('carryforward covers a trailing gap no longer than the threshold', () => {
			expect(spans(run([episode(0, 99, 1)], { carryforward: 20 }, { id: 1, entry: 0, exit: 110 }))).toEqual([
				[0, 110, 1],
			]);
		});

		test('the acute window drops long episodes', () => {
			expect(spans(run([episode(0, 9, 1), episode(100, 199, 1)], { window: [1, 30] }))).toEqual([
				[0, 10, 1],
				[10, 365, 0],
			]);
		});
	});

	describe('exposure definitions', () => {
		test('evertreated switches once and stays on', () => {
			expect(spans(run([episode(59, 240, 1)], { evertreated: true }))).toEqual([
				[0, 59, 0],
				[59, 365, 1],
			]);
		});

		test('currentformer distinguishes current and former exposure', () => {
			expect(spans(run([episode(59, 240, 1)], { currentformer: true }))).toEqual([
				[0, 59, 0],
				[59, 241, 1],
				[241, 365, 2],
			]);
		});

		test('duration splits at the day a cutpoint is reached', () => {
			expect(spans(run([episode(10, 59, 1)], { duration: [30], unit: 'days' }))).toEqual([
				[0, 10, 0],
				[10, 40, 1],
				[40, 365, 2],
			]);
		});

		test('continuous accumulates exposed time through each row', () => {
			const result = run([episode(10, 19, 1)], { continuousunit: 'days' });

			expect(result.map((i) => [i.start, i.stop, i.exposure, i.values.tv_exp])).toEqual([
				[0, 10, 0, 0],
				[10, 365, 10, 10],
			]);
		});

		test('recency counts time since the last exposure ended', () => {
			expect(spans(run([episode(10, 19, 1)], { recency: [30], unit: 'days' }))).toEqual([
				[0, 10, null],
				[10, 20, 1],
				[20, 50, 2],
				[50, 365, 3],
			]);
		});

		test('dose accumulates without merging episodes', () => {
			const result = run([episode(0, 9, 1, { dose: 100 }), episode(20, 29, 1, { dose: 50 })], { dose: true });

			expect(result.map((i) => [i.start, i.stop, i.exposure, i.values.tv_dose])).toEqual([
				[0, 20, 100, 100],
				[20, 365, 150, 150],
			]);
		});

		test('dose sums overlapping episodes', () => {
			expect(spans(run([episode(0, 9, 1, { dose: 10 }), episode(5, 14, 2, { dose: 20 })], { dose: true }))).toEqual([
				[0, 5, 5],
				[5, 10, 20],
				[10, 365, 30],
			]);
		});

		test('dosecuts split where cumulative dose crosses a cutpoint', () => {
			const episodes = [episode(0, 9, 1, { dose: 100 }), episode(20, 29, 1, { dose: 50 })];

			expect(spans(run(episodes, { dose: true, dosecuts: [120] }))).toEqual([
				[0, 24, 1],
				[24, 365, 2],
			]);
		});

		test('bytype writes one column per exposure value', () => {
			const result = run([episode(0, 9, 1), episode(20, 29, 2)], { evertreated: true, bytype: true });

			expect(result.map((i) => [i.start, i.stop, i.exposure, i.values.ever1, i.values.ever2])).toEqual([
				[0, 10, 1, 1, 0],
				[10, 20, 0, 1, 0],
				[20, 30, 2, 1, 1],
				[30, 365, 0, 1, 1],
			]);
		});
	});

	describe('calendar expansion and patterns', () => {
		test('expandunit cuts rows at month starts', () => {
			// 2024-01-15 to 2024-03-15
			const result = run([], { expandunit: 'months' }, { id: 1, entry: 19737, exit: 19797 });

			expect(spans(result)).toEqual([
				[19737, 19754, 0],
				[19754, 19783, 0],
				[19783, 19797, 0],
			]);
		});

		test('adds switching and state-time columns', () => {
			const result = run([episode(0, 9, 1), episode(20, 29, 2)], {
				switching: true,
				switchingdetail: true,
				statetime: true,
			});

			expect(result.map((i) => [i.exposure, i.values.switched, i.values.switching_pattern, i.values.statetime])).toEqual([
				[1, 1, '1->0->2', 10],
				[0, 1, '1->0->2', 10],
				[2, 1, '1->0->2', 10],
				[0, 1, '1->0->2', 335],
			]);
		});
	});
});

describe('valueSuffix', () => {
	test('makes values safe for column names', () => {
		expect(valueSuffix(-1)).toBe('neg1');
		expect(valueSuffix(2.5)).toBe('2p5');
		expect(valueSuffix('a')).toBe('a');
	});
});

describe('partitionExposures', () => {
	const cohort = [
		{ id: 1, entry: '2020-01-01', exit: '2020-12-31', sex: 'F' },
		{ id: 2, entry: '2020-01-01', exit: '2020-12-31', sex: 'M' },
	];
	const episodes = [{ id: 1, start: '2020-03-01', stop: '2020-08-28', drug: 1, dose: null }];

	test('reads date columns and partitions each subject', () => {
		const result = partitionExposures({ cohort, episodes }, { bindings, reference: 0 });

		expect(spans(result.intervals)).toEqual([
			[18262, 18322, 0],
			[18322, 18503, 1],
			[18503, 18627, 0],
			[18262, 18627, 0],
		]);
		expect(result.metadata).toEqual({
			subjects: 2,
			episodes: 1,
			rows: 4,
			personTime: 730,
			exposureDefinition: 'timevarying',
			overlapStrategy: 'layer',
			typeColumns: [],
		});
		expect(result.warnings).toEqual([]);
	});

	test('carries kept cohort columns and names the output column', () => {
		const result = partitionExposures(
			{ cohort, episodes },
			{ bindings: { ...bindings, cohort: { ...bindings.cohort, keep: ['sex'] } }, reference: 0, generate: 'drug_tv' },
		);
		const rows = toRows(result.intervals, result.columns);

		expect(rows[0]).toEqual({ id: 1, start: 18262, stop: 18322, drug_tv: 0, sex: 'F' });
		expect(rows[3]).toEqual({ id: 2, start: 18262, stop: 18627, drug_tv: 0, sex: 'M' });
	});

	test('reports full coverage when checked', () => {
		const { diagnostics } = partitionExposures({ cohort, episodes }, { bindings, reference: 0, check: true });

		expect(diagnostics?.overlaps).toEqual([]);
		expect(diagnostics?.gaps).toEqual([]);
		expect(diagnostics?.coverage?.map((c) => c.percentCovered)).toEqual([100, 100]);
	});

	test('treats point-in-time episodes as single days', () => {
		const result = partitionExposures(
			{ cohort: [{ id: 1, entry: 0, exit: 10 }], episodes: [{ id: 1, start: 4, drug: 3 }] },
			{ bindings: { ...bindings, episodes: { id: 'id', start: 'start', exposure: 'drug' } }, reference: 0, pointTime: true },
		);

		expect(spans(result.intervals)).toEqual([
			[0, 4, 0],
			[4, 5, 3],
			[5, 10, 0],
		]);
	});

	test('lists the per-value columns written under bytype', () => {
		const result = partitionExposures(
			{ cohort, episodes: [...episodes, { id: 2, start: '2020-02-01', stop: '2020-02-10', drug: 2, dose: null }] },
			{ bindings, reference: 0, currentformer: true, bytype: true },
		);

		expect(result.metadata.typeColumns).toEqual(['cf1', 'cf2']);
		expect(result.intervals[0].values).toEqual({ cf1: 0, cf2: 0 });
	});

	test('rejects an empty episode table', () => {
		expect(() => partitionExposures({ cohort, episodes: [] }, { bindings, reference: 0 })).toThrow(DataError);
	});

	test('rejects episodes for subjects outside the cohort', () => {
		const stray = [{ id: 9, start: '2020-03-01', stop: '2020-03-02', drug: 1, dose: null }];
		expect(() => partitionExposures({ cohort, episodes: stray }, { bindings, reference: 0 })).toThrow(DataError);
	});

	test('rejects episodes that stop before they start', () => {
		const reversed = [{ id: 1, start: '2020-03-02', stop: '2020-03-01', drug: 1, dose: null }];
		expect(() => partitionExposures({ cohort, episodes: reversed }, { bindings, reference: 0 })).toThrow(DataError);
	});

	test('rejects a missing dose in dose mode when the dose column is bound', () => {
		const missing = [{ id: 1, start: 10, stop: 19, drug: 7, dose: null }];
		expect(() =>
			partitionExposures({ cohort: [{ id: 1, entry: 0, exit: 100 }], episodes: missing }, { bindings, reference: 0, dose: true }),
		).toThrow('Subject 1 has an episode with no dose value');
	});

	test('reads the exposure code as the dose when no dose column is bound', () => {
		const unbound = { ...bindings, episodes: { id: 'id', start: 'start', stop: 'stop', exposure: 'drug' } };
		const result = partitionExposures(
			{ cohort: [{ id: 1, entry: 0, exit: 100 }], episodes: [{ id: 1, start: 10, stop: 19, drug: 7 }] },
			{ bindings: unbound, reference: 0, dose: true },
		);

		expect(result.intervals.at(-1)?.values.tv_dose).toBeCloseTo(7);
	});

	test('rejects exposure values containing the split separator', () => {
		const joined = [{ id: 1, start: 10, stop: 19, drug: 'a+b', dose: null }];
		expect(() =>
			partitionExposures({ cohort: [{ id: 1, entry: 0, exit: 100 }], episodes: joined }, { bindings, reference: 0, split: true }),
		).toThrow(DataError);
		expect(
			partitionExposures({ cohort: [{ id: 1, entry: 0, exit: 100 }], episodes: joined }, { bindings, reference: 0 }).intervals,
		).toHaveLength(3);
	});

	test('rejects bindings to columns the table lacks', () => {
		const renamed = { ...bindings, episodes: { ...bindings.episodes, exposure: 'therapy' } };
		expect(() => partitionExposures({ cohort, episodes }, { bindings: renamed, reference: 0 })).toThrow(
			ConfigurationError,
		);
	});
});

describe('streamPartitions', () => {
	test('yields subjects in id order', () => {
		const cohort = [
			{ id: 2, entry: 0, exit: 100 },
			{ id: 1, entry: 0, exit: 100 },
		];
		const episodes = [{ id: 1, start: 10, stop: 19, drug: 1, dose: 5 }];

		const partitions = [...streamPartitions({ cohort, episodes }, { bindings, reference: 0 })];

		expect(partitions.map((p) => p.id)).toEqual([1, 2]);
		expect(spans(partitions[0].intervals)).toEqual([
			[0, 10, 0],
			[10, 20, 1],
			[20, 100, 0],
		]);
		expect(spans(partitions[1].intervals)).toEqual([[0, 100, 0]]);
	});
});
