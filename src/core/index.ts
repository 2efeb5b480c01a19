/**
 * @module core
 * @description Ambient infrastructure shared by the design and delivery modules
 *
 * ## Modules
 * - `logging`: Structured step/trial/report logging
 * - `repro`: Seeded RNG and run hashing
 * - `errors`: Unified error types and codes
 */

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    StepLogEntry,
    TrialLogEntry,
    ReportLogEntry,
    LogEntry,
    StepLogInput,
    TrialLogInput,
    ReportLogInput,
    Logger,
    LoggerConfig,
    ConsoleLoggerConfig,
} from './logging';

export {
    DEFAULT_SCHEMA_VERSION,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Repro ====================

export type { RandomSource } from './repro';

export {
    SeededRandom,
    createRng,
    computeRunHash,
} from './repro';

// ==================== Errors ====================

export {
    ErrorCodes,
    NanobotError,
    InvalidParameterError,
    isNanobotError,
    hasErrorCode,
    wrapError,
} from './errors';

export type { ErrorCode } from './errors';
