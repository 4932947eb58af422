/**
 * Script Text
 *
 * Helpers for embedding caller-supplied text in engine source. Anything that
 * did not come from a literal in this codebase goes through quoteText.
 */

import { InvalidCommandError } from './errors'

/** Prefix written by captureErrors when the application raises at run time. */
export const APPLICATION_ERROR_PREFIX = 'error: '

const IDENTIFIER_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/

/** Escapes text for use between double quotes in a string literal. */
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t')
    .replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g, '')
}

/** A complete, quoted string literal. */
export function quoteText(text: string): string {
  return `"${escapeText(text)}"`
}

export function isIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name)
}

export function assertIdentifier(name: string): string {
  if (!isIdentifier(name)) {
    throw new InvalidCommandError(`'${name}' is not a valid script variable name`)
  }
  return name
}

/**
 * Wraps a script body so that run-time application errors come back on
 * stdout as `error: <message> (<number>)` instead of failing the process.
 * Compile-time syntax errors still fail the process.
 */
export function captureErrors(body: string): string {
  return [
    'try',
    indent(body),
    'on error errMsg number errNum',
    `  return "${APPLICATION_ERROR_PREFIX}" & errMsg & " (" & errNum & ")"`,
    'end try',
  ].join('\n')
}

/** Wraps a body in a tell block addressed to the named application. */
export function tellApplication(application: string, body: string): string {
  return [`tell application ${quoteText(application)}`, indent(body), 'end tell'].join('\n')
}

function indent(body: string): string {
  return body
    .split('\n')
    .map(line => (line.length > 0 ? '  ' + line : line))
    .join('\n')
}
