/**
 * Error Classifier
 *
 * Maps engine error text to an ErrorKind and builds the matching typed error.
 * The engine appends its numeric error code in parentheses, e.g.
 * `execution error: Can't get to do id "x". (-1728)`; the number decides
 * when present, message patterns otherwise.
 */

import {
  type ErrorKind, type ScriptError,
  ScriptSyntaxError, ReferenceNotFoundError, PermissionDeniedError,
  ApplicationUnavailableError, TimeoutError, UnknownScriptError,
} from './errors'

const CODE_KINDS: Record<number, ErrorKind> = {
  [-2740]: 'syntax',
  [-2741]: 'syntax',
  [-2750]: 'syntax',
  [-2753]: 'syntax',
  [-1708]: 'syntax',
  [-1728]: 'reference-not-found',
  [-1719]: 'reference-not-found',
  [-1743]: 'permission-denied',
  [-1744]: 'permission-denied',
  [-10004]: 'permission-denied',
  [-600]: 'application-unavailable',
  [-609]: 'application-unavailable',
  [-10810]: 'application-unavailable',
  [-1712]: 'timeout',
}

const MESSAGE_KINDS: Array<[RegExp, ErrorKind]> = [
  [/syntax error|expected .* but found|a .* can.t go after/i, 'syntax'],
  [/not authori[sz]ed|not allowed|privilege violation|assistive access/i, 'permission-denied'],
  [/isn.t running|connection is invalid|application can.t be found|not responding/i, 'application-unavailable'],
  [/timed out|timeout/i, 'timeout'],
  [/can.t get|doesn.t exist|no such|invalid index|not found/i, 'reference-not-found'],
]

const ERROR_NUMBER_PATTERN = /\((-?\d+)\)\s*$/

export function extractErrorNumber(text: string): number | undefined {
  const match = ERROR_NUMBER_PATTERN.exec(text.trim())
  return match?.[1] === undefined ? undefined : parseInt(match[1], 10)
}

export function classifyErrorText(text: string): ErrorKind {
  const code = extractErrorNumber(text)
  if (code !== undefined) {
    const byCode = CODE_KINDS[code]
    if (byCode) return byCode
  }
  for (const [pattern, kind] of MESSAGE_KINDS) {
    if (pattern.test(text)) return kind
  }
  return 'unknown'
}

export function createScriptError(kind: ErrorKind, message: string, timeoutMs = 0): ScriptError {
  switch (kind) {
    case 'syntax':
      return new ScriptSyntaxError(message)
    case 'reference-not-found':
      return new ReferenceNotFoundError(message)
    case 'permission-denied':
      return new PermissionDeniedError(message)
    case 'application-unavailable':
      return new ApplicationUnavailableError(message)
    case 'timeout':
      return new TimeoutError(message, timeoutMs)
    case 'unknown':
      return new UnknownScriptError(message)
  }
}

export function classifyError(text: string): ScriptError {
  const message = text.trim() || 'Engine failed without an error message'
  return createScriptError(classifyErrorText(message), message)
}
