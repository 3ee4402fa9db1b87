import { DebugLogger, LogLevel } from './packages/core/src/utils/logger.js';

DebugLogger.setLogLevel(LogLevel.SILENT);
