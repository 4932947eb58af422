/**
 * Consolidated error system for scriptgate.
 *
 * All error classes extend ScriptgateError, which carries a typed error code.
 * Failures reported by the scripting engine extend ScriptError, which adds the
 * classified kind and whether a retry may help.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ScriptgateErrorCode = {
  // Dates
  INVALID_DATE: 'INVALID_DATE',

  // Engine failures
  SCRIPT_SYNTAX: 'SCRIPT_SYNTAX',
  REFERENCE_NOT_FOUND: 'REFERENCE_NOT_FOUND',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  APPLICATION_UNAVAILABLE: 'APPLICATION_UNAVAILABLE',
  TIMEOUT: 'TIMEOUT',
  UNKNOWN_SCRIPT_ERROR: 'UNKNOWN_SCRIPT_ERROR',

  // Operation queue
  QUEUE_SATURATED: 'QUEUE_SATURATED',
  OPERATION_CANCELLED: 'OPERATION_CANCELLED',
  QUEUE_CLOSED: 'QUEUE_CLOSED',

  // Contract violations
  INVALID_COMMAND: 'INVALID_COMMAND',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const

export type ScriptgateErrorCode = (typeof ScriptgateErrorCode)[keyof typeof ScriptgateErrorCode]

export const ERROR_KINDS = [
  'syntax',
  'reference-not-found',
  'permission-denied',
  'application-unavailable',
  'timeout',
  'unknown',
] as const

export type ErrorKind = (typeof ERROR_KINDS)[number]

// ============================================================================
// Base Classes
// ============================================================================

export class ScriptgateError extends Error {
  readonly code: ScriptgateErrorCode

  constructor(code: ScriptgateErrorCode, message: string) {
    super(message)
    this.name = 'ScriptgateError'
    this.code = code
  }
}

export class ScriptError extends ScriptgateError {
  readonly kind: ErrorKind
  readonly transient: boolean

  constructor(code: ScriptgateErrorCode, kind: ErrorKind, transient: boolean, message: string) {
    super(code, message)
    this.name = 'ScriptError'
    this.kind = kind
    this.transient = transient
  }
}

// ============================================================================
// Date Errors
// ============================================================================

export class InvalidDateError extends ScriptgateError {
  constructor(message: string) {
    super(ScriptgateErrorCode.INVALID_DATE, message)
    this.name = 'InvalidDateError'
  }
}

// ============================================================================
// Engine Errors
// ============================================================================

export class ScriptSyntaxError extends ScriptError {
  constructor(message: string) {
    super(ScriptgateErrorCode.SCRIPT_SYNTAX, 'syntax', false, message)
    this.name = 'ScriptSyntaxError'
  }
}

export class ReferenceNotFoundError extends ScriptError {
  constructor(message: string) {
    super(ScriptgateErrorCode.REFERENCE_NOT_FOUND, 'reference-not-found', false, message)
    this.name = 'ReferenceNotFoundError'
  }
}

export const AUTOMATION_PERMISSION_HINT =
  'Grant automation access in System Settings > Privacy & Security > Automation ' +
  'for the process running scriptgate, then retry.'

export class PermissionDeniedError extends ScriptError {
  readonly hint: string

  constructor(message: string, hint: string = AUTOMATION_PERMISSION_HINT) {
    super(ScriptgateErrorCode.PERMISSION_DENIED, 'permission-denied', false, message)
    this.name = 'PermissionDeniedError'
    this.hint = hint
  }
}

export class ApplicationUnavailableError extends ScriptError {
  constructor(message: string) {
    super(ScriptgateErrorCode.APPLICATION_UNAVAILABLE, 'application-unavailable', true, message)
    this.name = 'ApplicationUnavailableError'
  }
}

export class TimeoutError extends ScriptError {
  readonly timeoutMs: number

  constructor(message: string, timeoutMs: number) {
    super(ScriptgateErrorCode.TIMEOUT, 'timeout', true, message)
    this.name = 'TimeoutError'
    this.timeoutMs = timeoutMs
  }
}

export class UnknownScriptError extends ScriptError {
  constructor(message: string) {
    super(ScriptgateErrorCode.UNKNOWN_SCRIPT_ERROR, 'unknown', false, message)
    this.name = 'UnknownScriptError'
  }
}

// ============================================================================
// Queue Errors
// ============================================================================

export class QueueSaturationError extends ScriptgateError {
  readonly depth: number

  constructor(message: string, depth: number) {
    super(ScriptgateErrorCode.QUEUE_SATURATED, message)
    this.name = 'QueueSaturationError'
    this.depth = depth
  }
}

export class OperationCancelledError extends ScriptgateError {
  constructor(message: string) {
    super(ScriptgateErrorCode.OPERATION_CANCELLED, message)
    this.name = 'OperationCancelledError'
  }
}

/** The queue was shut down before the operation could run. */
export class QueueClosedError extends ScriptgateError {
  constructor(message: string) {
    super(ScriptgateErrorCode.QUEUE_CLOSED, message)
    this.name = 'QueueClosedError'
  }
}

// ============================================================================
// Contract Violations
// ============================================================================

export class InvalidCommandError extends ScriptgateError {
  constructor(message: string) {
    super(ScriptgateErrorCode.INVALID_COMMAND, message)
    this.name = 'InvalidCommandError'
  }
}

export class InvalidConfigError extends ScriptgateError {
  constructor(message: string) {
    super(ScriptgateErrorCode.INVALID_CONFIG, message)
    this.name = 'InvalidConfigError'
  }
}
