/**
 * scriptgate
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  ScriptgateError, ScriptgateErrorCode, ScriptError, ERROR_KINDS,
  InvalidDateError,
  ScriptSyntaxError, ReferenceNotFoundError, PermissionDeniedError, AUTOMATION_PERMISSION_HINT,
  ApplicationUnavailableError, TimeoutError, UnknownScriptError,
  QueueSaturationError, QueueClosedError, OperationCancelledError,
  InvalidCommandError, InvalidConfigError,
} from './errors'
export type { ErrorKind, ScriptgateErrorCode as ScriptgateErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Calendar dates
export type { CalendarDate, TimeOfDay } from './calendar-date'
export {
  SUPPORTED_YEARS, isLeapYear, daysInMonth,
  makeCalendarDate, validateCalendarDate, withoutTime, calendarDateFromClock,
  secondsSinceMidnight, timeFromSeconds,
  addDays, daysBetween, compareCalendarDates, calendarDatesEqual, formatCalendarDate,
} from './calendar-date'

export type { DateOrder, DateInput, NormalizeOptions } from './date-normalizer'
export { normalizeDate, isAmbiguousDate } from './date-normalizer'

export type { MonthConstant } from './date-codec'
export { MONTH_CONSTANTS, monthConstant, encodeDate, dateReadout, decodeDate, decodeOptionalDate } from './date-codec'

// Script text and classification
export {
  APPLICATION_ERROR_PREFIX, escapeText, quoteText, isIdentifier, assertIdentifier,
  captureErrors, tellApplication,
} from './script-text'
export { classifyError, classifyErrorText, createScriptError, extractErrorNumber } from './error-classifier'

// Commands and execution
export type {
  ResultShape, ScriptCommand, CommandAccess, ReadCommandInput, WriteCommandInput,
} from './command'
export { shapes, readCommand, writeCommand, isCacheable } from './command'

export type { RawRun, RunOptions, ScriptRunner, SpawnLike, SpawnedProcess, OsascriptRunnerOptions } from './script-runner'
export { createOsascriptRunner } from './script-runner'

export type {
  ExecutionSuccess, ExecutionFailure, ExecutionResult, ExecuteOptions, ExecutorOptions, ScriptExecutor,
} from './executor'
export { createScriptExecutor, backoffDelay, isRetryable } from './executor'

// Cache and queue
export type {
  CacheEntry, CacheLookup, CacheStats, ComputeOptions, InvalidationTarget, ResultCache, ResultCacheOptions,
} from './result-cache'
export { createResultCache } from './result-cache'

export type { InvalidationRules, InvalidationPlan } from './invalidation'
export { DEFAULT_INVALIDATION_RULES, planInvalidation, invalidationPredicate, patternMatcher } from './invalidation'

export type {
  Priority, OperationState, QueueFailure, OperationResult, OperationSnapshot, OperationHandle,
  QueueStatus, EnqueueOptions, OperationQueue, OperationQueueOptions, RunningSlot,
} from './operation-queue'
export { createOperationQueue, sharedRunningSlot } from './operation-queue'

export type { ScriptGateway, GatewayOptions, GatewayStatus } from './gateway'
export { createScriptGateway } from './gateway'

// Ambient
export type { ScriptgateConfig, LoadConfigOptions } from './config'
export { DEFAULT_CONFIG, loadConfig } from './config'

export type { Logger, LoggerOptions, LogLevel, LogFields, LogSink, Verbosity } from './logger'
export { createLogger, silentLogger, VERBOSITIES } from './logger'

export type { Scriptgate, ScriptgateOverrides } from './public-api'
export { createScriptgate } from './public-api'
