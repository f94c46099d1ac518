/**
 * Person-time Type Definitions
 *
 * Shared record shapes for the partitioner, intersector and event splitter.
 * Time is measured in whole days since 1970-01-01 (UTC).
 *
 * Episodes are closed on input: [start, stop] covers both end days.
 * Study windows and output intervals share endpoints with their neighbours:
 * a row covers `stop - start` days of person-time and the next row starts
 * where this one stops.
 */

/**
 * An integer count of days since 1970-01-01 (UTC).
 *
 * @example
 * const jan1st2020: DayNumber = 18262;
 */
export type DayNumber = number;

/**
 * Opaque subject identifier. `1` and `'1'` are different subjects.
 */
export type SubjectId = string | number;

/**
 * A raw categorical exposure code as found in an episode table.
 */
export type ExposureValue = number | string;

/**
 * The state carried by an interval: a raw value, the reference value,
 * a composite or a derived projection. `null` marks an undefined state
 * (recency before the first exposure).
 */
export type ExposureState = ExposureValue | null;

/**
 * A single value column cell.
 */
export type Cell = number | string | null;

/**
 * A row of an external table. Components read it through column bindings.
 */
export type Row = Readonly<Record<string, unknown>>;

/**
 * The observation window of one subject.
 *
 * @example
 * const window: StudyWindow = { id: 1, entry: 0, exit: 365 };
 */
export interface StudyWindow {
	/** The subject this window belongs to */
	readonly id: SubjectId;
	/** First day of follow-up */
	readonly entry: DayNumber;
	/** End of follow-up; person-time is `exit - entry` */
	readonly exit: DayNumber;
	/** Cohort columns carried onto every output row */
	readonly attributes?: Readonly<Record<string, Cell>>;
}

/**
 * A raw exposure record. Episodes of one subject may overlap.
 *
 * @example
 * const episode: Episode = { id: 1, start: 59, stop: 240, value: 1 };
 */
export interface Episode {
	/** The subject this episode belongs to */
	readonly id: SubjectId;
	/** First exposed day (inclusive) */
	readonly start: DayNumber;
	/** Last exposed day (inclusive) */
	readonly stop: DayNumber;
	/** Exposure code */
	readonly value: ExposureValue;
	/** Optional rank used by the priority strategy; lower wins */
	readonly priority?: number;
	/** Optional total dose delivered over the episode */
	readonly dose?: number;
}

/**
 * A canonical span of person-time with one resolved state.
 *
 * @example
 * const interval: Interval = {
 *   id: 1,
 *   start: 59,
 *   stop: 241,
 *   exposure: 1,
 *   values: {}
 * };
 */
export interface Interval {
	/** The subject this interval belongs to */
	readonly id: SubjectId;
	/** Start of the span (shared with the previous row's stop) */
	readonly start: DayNumber;
	/** End of the span (shared with the next row's start) */
	readonly stop: DayNumber;
	/** The resolved exposure state */
	readonly exposure: ExposureState;
	/** Derived, cumulative or carried columns */
	readonly values: Readonly<Record<string, Cell>>;
}

/**
 * Column names used when converting intervals to and from rows.
 */
export interface IntervalColumns {
	id: string;
	start: string;
	stop: string;
	exposure: string;
}
