/**
 * @module Logger
 *
 * Colored console logger shared by the SERVER and CLIENT solutions.
 * A single global instance should be used across the application, obtained through {@link getOrCreateGlobalLogger}.
 */

import path from "path";
import util from "util";
import chalk, { ChalkInstance } from "chalk";

//#region ============== Types ==============
interface LoggerOptions {
    /**
     * Whether debug messages should be printed.
     */
    debug?: boolean,
    /**
     * Whether each message should be prefixed with the file and line that called the logger.
     */
    printCallerFile?: boolean,
    /**
     * Suppresses every output. Useful for tests.
     */
    silent?: boolean
}

type LogLevel = "log" | "info" | "warn" | "error" | "success" | "debug";
//#endregion ============== Types ==============

//#region ============== Constants ==============
const LEVEL_STYLES: Record<LogLevel, { label: string, color: ChalkInstance, stderr: boolean }> = {
    log:     { label: "LOG",     color: chalk.white,   stderr: false },
    info:    { label: "INFO",    color: chalk.cyan,    stderr: false },
    warn:    { label: "WARN",    color: chalk.yellow,  stderr: true  },
    error:   { label: "ERROR",   color: chalk.red,     stderr: true  },
    success: { label: "SUCCESS", color: chalk.green,   stderr: false },
    debug:   { label: "DEBUG",   color: chalk.magenta, stderr: false }
};
//#endregion ============== Constants ==============

/**
 * Returns the "file:line" of the first stack frame outside this module.
 */
function getCaller(): string | undefined {
    const stack = new Error().stack?.split("\n").slice(1) ?? [];
    const frame = stack.find((line) => !line.includes(import.meta.url) && !line.includes("logger.ts"));
    if (!frame) return undefined;

    const match = /\(?((?:file:\/\/)?[^()\s]+):(\d+):\d+\)?$/.exec(frame.trim());
    if (!match) return undefined;

    return `${path.basename(match[1])}:${match[2]}`;
}

class DefaultLogger {
    private options: Required<LoggerOptions>;

    public constructor(options: LoggerOptions = {}) {
        this.options = {
            debug: options.debug ?? false,
            printCallerFile: options.printCallerFile ?? false,
            silent: options.silent ?? false
        };
    }

    /**
     * Merges the given options into the current ones. Options left undefined keep their current value.
     */
    public configure(options: LoggerOptions): void {
        this.options = {
            debug: options.debug ?? this.options.debug,
            printCallerFile: options.printCallerFile ?? this.options.printCallerFile,
            silent: options.silent ?? this.options.silent
        };
    }

    public log(...args: unknown[]): void { this.write("log", args); }
    public info(...args: unknown[]): void { this.write("info", args); }
    public warn(...args: unknown[]): void { this.write("warn", args); }
    public error(...args: unknown[]): void { this.write("error", args); }
    public success(...args: unknown[]): void { this.write("success", args); }

    public debug(...args: unknown[]): void {
        if (!this.options.debug) return;
        this.write("debug", args);
    }

    private write(level: LogLevel, args: unknown[]): void {
        if (this.options.silent) return;

        const style = LEVEL_STYLES[level];
        let prefix = style.color(`[${new Date().toISOString()}] [${style.label}]`);

        if (this.options.printCallerFile) {
            const caller = getCaller();
            if (caller) prefix += " " + chalk.gray(`(${caller})`);
        }

        const line = `${prefix} ${util.format(...args)}\n`;
        if (style.stderr) process.stderr.write(line);
        else process.stdout.write(line);
    }
}

let globalLogger: DefaultLogger | undefined;

/**
 * Returns the global logger, creating it if necessary.
 * If options are passed and the logger already exists, they are merged into the existing instance.
 */
function getOrCreateGlobalLogger(options?: LoggerOptions): DefaultLogger {
    if (!globalLogger) {
        globalLogger = new DefaultLogger(options);
    } else if (options) {
        globalLogger.configure(options);
    }

    return globalLogger;
}

export {
    type LoggerOptions,
    type LogLevel,

    DefaultLogger,
    getOrCreateGlobalLogger
};
