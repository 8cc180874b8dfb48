/**
 * tierlog: severity-tiered file logging with per-call-site verbosity
 * and JSON records, for Node.
 */

export { createLogger, DISABLED_VERBOSE } from './core';
export {
    initLogging,
    getLogger,
    shutdownLogging,
    info,
    infof,
    warning,
    warningf,
    error,
    errorf,
    fatal,
    fatalf,
    exit,
    exitf,
    v,
    j,
    jInfo,
    jWarning,
    jError,
    jFatal,
    setVerbosity,
    setVModule,
    setTraceLocation,
    flush,
    stats,
} from './global';
export { parseSeverity, parseTraceLocation, DEFAULT_MAX_SIZE, DEFAULT_BUFFER_SIZE, DEFAULT_FLUSH_INTERVAL } from './config';
export { LoggingError, isLoggingError, type LoggingErrorCode } from './errors';
export { EXIT_FATAL, EXIT_NO_STACKS, EXIT_SINK_FAILURE } from './crash';
export { matchGlob, parseVModule } from './vmodule';
export {
    Severity,
    SEVERITIES,
    SEVERITY_NAMES,
    type SeverityName,
    type Level,
    type CallSite,
    type JsonRecord,
    type Verbose,
    type ILogger,
    type JsonOptions,
    type CreateLoggerOptions,
    type Stats,
    type SeverityStats,
    type VModuleRule,
    type VModuleSpec,
    type Writer,
    type ExitFn,
} from './types';
