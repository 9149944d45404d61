/**
 * Kernel logger.
 *
 * Forwards every entry to the console and keeps a circular buffer of the
 * most recent ones so a host can attach them to a diagnostics report.
 */

export type LogLevel = 'log' | 'warn' | 'error' | 'info';

export type LogEntry = {
    timestamp: number;
    level: LogLevel;
    message: string;
};

class Logger {
    private static instance: Logger;
    private logs: LogEntry[] = [];
    private readonly maxLogs = 1000;
    private consoleOutput = true;

    private constructor() { }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public log(...args: unknown[]): void {
        this.write('log', args);
    }

    public info(...args: unknown[]): void {
        this.write('info', args);
    }

    public warn(...args: unknown[]): void {
        this.write('warn', args);
    }

    public error(...args: unknown[]): void {
        this.write('error', args);
    }

    /**
     * Stops forwarding to the console; entries are still buffered.
     */
    public setConsoleOutput(enabled: boolean): void {
        this.consoleOutput = enabled;
    }

    private write(level: LogLevel, args: unknown[]) {
        this.addLog(level, args);
        if (this.consoleOutput) {
            console[level](...args);
        }
    }

    private addLog(level: LogLevel, args: unknown[]) {
        const message = args.map(arg => {
            if (arg instanceof Error) {
                return `${arg.name}: ${arg.message}`;
            }
            if (typeof arg === 'object' && arg !== null) {
                try {
                    return JSON.stringify(arg);
                } catch {
                    return String(arg);
                }
            }
            return String(arg);
        }).join(' ');

        this.logs.push({
            timestamp: Date.now(),
            level,
            message
        });

        if (this.logs.length > this.maxLogs) {
            this.logs.shift();
        }
    }

    public getEntries(): readonly LogEntry[] {
        return this.logs;
    }

    public getLogs(): string {
        return this.logs.map(log => {
            const time = new Date(log.timestamp).toLocaleTimeString();
            return `[${time}] [${log.level.toUpperCase()}] ${log.message}`;
        }).join('\n');
    }

    public clear() {
        this.logs = [];
    }
}

export const logger = Logger.getInstance();
