import process from 'node:process';
import { consola } from 'consola';

export const logger = consola.withTag('usage-window');

if (process.env.LOG_LEVEL != null) {
	const level = Number.parseInt(process.env.LOG_LEVEL, 10);
	if (!Number.isNaN(level)) {
		logger.level = level;
	}
}

// Program output goes to stdout untouched by the logger level.
export const log = console.log;
