// src/utils/logger.ts
import winston from 'winston';

const rootLogger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports: [new winston.transports.Console()],
});

export function createLogger(scope: string): winston.Logger {
    return rootLogger.child({ scope });
}

export function setLogLevel(level: string): void {
    rootLogger.level = level;
}

export function getLogLevel(): string {
    return rootLogger.level;
}

/** Sends every level to stderr, leaving stdout to the program's own output. */
export function logToStderr(): void {
    rootLogger.clear();
    rootLogger.add(new winston.transports.Console({ stderrLevels: Object.keys(winston.config.npm.levels) }));
}
