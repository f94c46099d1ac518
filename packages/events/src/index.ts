/**
 * persontime events
 *
 * Splits canonical interval tables at outcome events, flags event rows and
 * censors follow-up after terminal events.
 *
 * @packageDocumentation
 */

export {
	defaultLabels,
	recurringEvents,
	singleEvents,
	splitAtEvents,
	splitSubject,
	type EventBindings,
	type EventType,
	type SplitOptions,
	type SplitResult,
	type SubjectEvent,
} from './splitter.js';
