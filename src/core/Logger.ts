export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type TelemetryHook = (level: LogLevel, message: string, ...args: unknown[]) => void;

/**
 * A lightweight logging utility with support for different log levels and telemetry hooks.
 * Hosts that ship without diagnostics raise the level to 'warn' or 'error'.
 */
export class Logger {
    private static logLevel: LogLevel = 'debug'; // Default log level
    private static telemetryHooks: TelemetryHook[] = [];

    /**
     * Sets the minimum log level. Messages below this level will not be displayed.
     * Telemetry hooks still receive every message.
     */
    public static setLogLevel(level: LogLevel): void {
        Logger.logLevel = level;
    }

    public static getLogLevel(): LogLevel {
        return Logger.logLevel;
    }

    /**
     * Adds a telemetry hook function that will be called for every log message.
     */
    public static addTelemetryHook(hook: TelemetryHook): void {
        Logger.telemetryHooks.push(hook);
    }

    public static removeTelemetryHook(hook: TelemetryHook): void {
        Logger.telemetryHooks = Logger.telemetryHooks.filter(h => h !== hook);
    }

    private static shouldLog(level: LogLevel): boolean {
        const levels: Record<LogLevel, number> = {
            'debug': 0,
            'info': 1,
            'warn': 2,
            'error': 3,
        };
        return levels[level] >= levels[Logger.logLevel];
    }

    private static log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (Logger.shouldLog(level)) {
            console[level](`[${level.toUpperCase()}] ${message}`, ...args);
        }
        Logger.telemetryHooks.forEach(hook => hook(level, message, ...args));
    }

    public static debug(message: string, ...args: unknown[]): void {
        Logger.log('debug', message, ...args);
    }

    public static info(message: string, ...args: unknown[]): void {
        Logger.log('info', message, ...args);
    }

    public static warn(message: string, ...args: unknown[]): void {
        Logger.log('warn', message, ...args);
    }

    public static error(message: string, ...args: unknown[]): void {
        Logger.log('error', message, ...args);
    }
}
