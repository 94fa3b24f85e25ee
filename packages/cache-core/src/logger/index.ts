export {
	Logger,
	LogLevel,
	LOG_LEVEL_ENV,
	parseLogLevel,
	setGlobalLogLevel,
	getGlobalLogLevel,
	type LoggerConfig
} from './logger.js';
export { getLogger } from './factory.js';
