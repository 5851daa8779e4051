import * as fs from "node:fs";
import * as path from "node:path";
import { CONFIG_DEFAULTS } from "../config/types.js";

export type LogLevel = "INFO" | "WARN" | "ERROR";

export interface LoggerOptions {
    /** Also append to a rotating log file in this directory */
    logDir?: string;
    maxLogSizeMB?: number;
    maxLogFiles?: number;
    /** Echo lines to stdout/stderr (default: true) */
    console?: boolean;
}

export class Logger {
    private logDir: string | undefined;
    private logFile: string | undefined;
    private maxLogSize: number;
    private maxLogFiles: number;
    private echo: boolean;

    constructor(options: LoggerOptions = {}) {
        this.logDir = options.logDir;
        this.maxLogSize = (options.maxLogSizeMB ?? CONFIG_DEFAULTS.maxLogSizeMB) * 1024 * 1024;
        this.maxLogFiles = options.maxLogFiles ?? CONFIG_DEFAULTS.maxLogFiles;
        this.echo = options.console ?? true;
        if (this.logDir !== undefined) {
            this.logFile = path.join(this.logDir, CONFIG_DEFAULTS.logFileName);
            fs.mkdirSync(this.logDir, { recursive: true });
        }
    }

    /**
     * Path of the current log file, or undefined when logging to the console only.
     */
    getLogFilePath(): string | undefined {
        return this.logFile;
    }

    info(message: string): void {
        this.write("INFO", message);
    }

    warn(message: string): void {
        this.write("WARN", message);
    }

    error(message: string): void {
        this.write("ERROR", message);
    }

    private write(level: LogLevel, message: string): void {
        const timestamp = new Date().toISOString();
        const line = `[${timestamp}] [${level}] ${message}\n`;

        if (this.echo) {
            (level === "ERROR" ? process.stderr : process.stdout).write(line);
        }

        if (this.logFile !== undefined) {
            try {
                this.rotateIfNeeded(this.logFile);
            } catch (err) {
                // Keep writing to the current file
                const reason = err instanceof Error ? err.message : String(err);
                process.stderr.write(`[${timestamp}] [WARN] Log rotation failed: ${reason}\n`);
            }
            fs.appendFileSync(this.logFile, line, "utf-8");
        }
    }

    private rotatedPath(index: number): string {
        const base = path.basename(CONFIG_DEFAULTS.logFileName, ".log");
        return path.join(this.logDir ?? ".", `${base}.${index}.log`);
    }

    private rotateIfNeeded(logFile: string): void {
        if (!fs.existsSync(logFile)) return;

        const stat = fs.statSync(logFile);
        if (stat.size < this.maxLogSize) return;

        // Shift numbered logs up, dropping the oldest
        for (let i = this.maxLogFiles - 1; i > 0; i--) {
            const from = this.rotatedPath(i);
            if (!fs.existsSync(from)) continue;
            if (i + 1 >= this.maxLogFiles) {
                fs.unlinkSync(from);
            } else {
                fs.renameSync(from, this.rotatedPath(i + 1));
            }
        }

        fs.renameSync(logFile, this.rotatedPath(1));
    }
}
