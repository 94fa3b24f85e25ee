/**
 * @fileoverview Named logger registry
 */

import { Logger } from './logger.js';

const loggers = new Map<string, Logger>();

/**
 * Get (or create) the shared logger for a component name
 */
export function getLogger(name: string): Logger {
	let logger = loggers.get(name);
	if (!logger) {
		logger = new Logger({ prefix: name });
		loggers.set(name, logger);
	}
	return logger;
}
