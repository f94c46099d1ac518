import { pino, type Logger } from 'pino';
import { z } from 'zod';

export type { Logger };

/** Environment variable that sets the root log level. */
export const LOG_LEVEL_ENV = 'PERSONTIME_LOG_LEVEL';

export type Component = 'exposure' | 'merge' | 'events' | 'pipeline';

const LogLevelSchema = z
	.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
	.catch('warn');

export const rootLogger: Logger = pino({
	name: 'persontime',
	level: LogLevelSchema.parse(process.env[LOG_LEVEL_ENV]),
});

/**
 * Child logger for one component. A caller-supplied logger replaces the root.
 */
export function componentLogger(component: Component, override?: Logger): Logger {
	return (override ?? rootLogger).child({ component });
}
