/**
 * @module core/logging
 * @description Structured logging for delivery simulations
 *
 * Log entries have fixed, versioned schemas at three levels: one per integrator
 * step, one per trial, and one report per batch of trials. The engine only logs
 * through a logger the caller injects.
 */

import type { Vector3 } from '../models/numeric/vector';

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Task identifier */
    task: string;
    /** Random seed for reproducibility */
    seed: number;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Step-level log entry
 */
export interface StepLogEntry extends BaseLogEntry {
    logType: 'step';
    trial: number;
    step: number;
    position: Vector3;
    velocity: number;
    distanceToTarget: number;
}

/**
 * Trial-level summary log entry
 */
export interface TrialLogEntry extends BaseLogEntry {
    logType: 'trial';
    trial: number;
    steps: number;
    targetReached: boolean;
    successRate: number;
    finalDistance: number;
}

/**
 * Report-level log entry (summary over all trials of one design)
 */
export interface ReportLogEntry extends BaseLogEntry {
    logType: 'report';
    runId: string;
    totalTrials: number;
    reachedCount: number;
    reachRate: number;
    meanSuccessRate: number;
    meanSteps: number;
    design: Record<string, unknown>;
}

/**
 * Union of all log entry types
 */
export type LogEntry = StepLogEntry | TrialLogEntry | ReportLogEntry;

type EntryInput<T extends LogEntry> = Omit<T, 'logType' | 'schemaVersion' | 'task' | 'seed' | 'timestamp'>;

export type StepLogInput = EntryInput<StepLogEntry>;
export type TrialLogInput = EntryInput<TrialLogEntry>;
export type ReportLogInput = EntryInput<ReportLogEntry>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log an integrator step */
    logStep(entry: StepLogInput): void;
    /** Log trial summary */
    logTrial(entry: TrialLogInput): void;
    /** Log final report */
    logReport(entry: ReportLogInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Task name */
    task: string;
    /** Random seed */
    seed: number;
    /** Schema version */
    schemaVersion?: string;
    /** Whether to keep step-level logs (can be verbose, up to 1000 per trial) */
    logSteps?: boolean;
}

/**
 * Console logger configuration
 */
export interface ConsoleLoggerConfig extends LoggerConfig {
    /** Minimum level printed (default 'info') */
    level?: LogLevel;
}

// ==================== Constants ====================

export const DEFAULT_SCHEMA_VERSION = '1.0.0';

// ==================== Console Logger ====================

/**
 * Console Logger: Print to console (for debugging)
 *
 * Accepts either a bare level or a full logger config. Report lines carry the
 * task, schema version and seed of the config.
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;
    private config: { task: string; seed: number; schemaVersion: string; logSteps: boolean };

    constructor(levelOrConfig: LogLevel | ConsoleLoggerConfig = 'info') {
        if (typeof levelOrConfig === 'string') {
            this.level = levelOrConfig;
            this.config = { task: 'unknown', seed: 0, schemaVersion: DEFAULT_SCHEMA_VERSION, logSteps: true };
        } else {
            this.level = levelOrConfig.level ?? 'info';
            this.config = {
                task: levelOrConfig.task,
                seed: levelOrConfig.seed,
                schemaVersion: levelOrConfig.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
                logSteps: levelOrConfig.logSteps ?? true,
            };
        }
    }

    logStep(entry: StepLogInput): void {
        if (!this.config.logSteps) return;
        if (this.level === 'debug') {
            console.log(
                `[STEP] T${entry.trial} S${entry.step}: v=${entry.velocity.toFixed(4)}, ` +
                `d=${entry.distanceToTarget.toFixed(4)}`
            );
        }
    }

    logTrial(entry: TrialLogInput): void {
        if (this.level === 'debug' || this.level === 'info') {
            console.log(
                `[TRIAL] T${entry.trial}: steps=${entry.steps}, ` +
                `success=${entry.successRate.toFixed(3)}, reached=${entry.targetReached}`
            );
        }
    }

    logReport(entry: ReportLogInput): void {
        if (this.level === 'error') return;
        console.log(
            `[REPORT] ${this.config.task} v${this.config.schemaVersion} seed=${this.config.seed} ` +
            `${entry.runId.slice(0, 8)} Trials=${entry.totalTrials}, ` +
            `ReachRate=${(entry.reachRate * 100).toFixed(1)}%, ` +
            `MeanSuccess=${entry.meanSuccessRate.toFixed(3)}`
        );
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: Store logs in memory
 * Useful for testing and for handing entries to a presentation layer.
 */
export class MemoryLogger implements Logger {
    private config: { task: string; seed: number; schemaVersion: string; logSteps: boolean };
    public steps: StepLogEntry[] = [];
    public trials: TrialLogEntry[] = [];
    public reports: ReportLogEntry[] = [];

    constructor(config: LoggerConfig) {
        this.config = {
            task: config.task,
            seed: config.seed,
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
            logSteps: config.logSteps ?? true,
        };
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            task: this.config.task,
            seed: this.config.seed,
            timestamp: Date.now(),
        };
    }

    logStep(entry: StepLogInput): void {
        if (!this.config.logSteps) return;
        this.steps.push({
            ...this.createBaseEntry(),
            logType: 'step',
            ...entry,
        });
    }

    logTrial(entry: TrialLogInput): void {
        this.trials.push({
            ...this.createBaseEntry(),
            logType: 'trial',
            ...entry,
        });
    }

    logReport(entry: ReportLogInput): void {
        this.reports.push({
            ...this.createBaseEntry(),
            logType: 'report',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.steps, ...this.trials, ...this.reports];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({
            steps: this.steps,
            trials: this.trials,
            reports: this.reports,
        }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.steps = [];
        this.trials = [];
        this.reports = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logStep(entry: StepLogInput): void {
        for (const logger of this.loggers) {
            logger.logStep(entry);
        }
    }

    logTrial(entry: TrialLogInput): void {
        for (const logger of this.loggers) {
            logger.logTrial(entry);
        }
    }

    logReport(entry: ReportLogInput): void {
        for (const logger of this.loggers) {
            logger.logReport(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format
 */
export function createLogger(
    format: 'console' | 'memory',
    config: ConsoleLoggerConfig
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}
