/**
 * Invalidation Rules
 *
 * Maps a successful write to the cache keys it makes stale. A rule is looked
 * up by the full command kind (`todo.move`) and then by its entity
 * (`todo`). Patterns are key prefixes; a pattern containing `*` is a glob
 * over the whole key (`*tags*`).
 */

import type { ScriptCommand } from './command'

export type InvalidationRules = Readonly<Record<string, readonly string[]>>

export const DEFAULT_INVALIDATION_RULES: InvalidationRules = {
  todo: ['todos:', 'todo:', 'recent:', 'search:', 'lists:'],
  project: ['projects:', 'project:', 'todos:', 'recent:', 'search:'],
  area: ['areas:', 'area:', 'projects:', 'todos:'],
  tag: ['tags:', 'tag:', 'todos:', 'projects:', 'areas:'],
}

export type InvalidationPlan =
  | { scope: 'all'; reason: string }
  | { scope: 'matching'; patterns: readonly string[] }

// ============================================================================
// Planning
// ============================================================================

function lookup(rules: InvalidationRules, name: string): readonly string[] | undefined {
  return Object.hasOwn(rules, name) ? rules[name] : undefined
}

/**
 * Decides what a successful write invalidates. An unmapped kind with no
 * declared `invalidates` clears everything.
 */
export function planInvalidation<T>(
  command: ScriptCommand<T>,
  rules: InvalidationRules = DEFAULT_INVALIDATION_RULES
): InvalidationPlan {
  const entity = command.kind.split('.')[0] ?? command.kind
  const mapped = lookup(rules, command.kind) ?? lookup(rules, entity)
  const declared = command.invalidates ?? []

  if (mapped === undefined && declared.length === 0) {
    return { scope: 'all', reason: `no invalidation rule for '${command.kind}'` }
  }

  const patterns = new Set([...(mapped ?? []), ...declared])
  if (command.scope) patterns.add(command.scope)
  return { scope: 'matching', patterns: [...patterns] }
}

// ============================================================================
// Matching
// ============================================================================

function globToRegExp(pattern: string): RegExp {
  const body = pattern
    .split('*')
    .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*')
  return new RegExp(`^${body}$`)
}

export function patternMatcher(pattern: string): (key: string) => boolean {
  if (pattern.includes('*')) {
    const regex = globToRegExp(pattern)
    return key => regex.test(key)
  }
  return key => key.startsWith(pattern)
}

export function invalidationPredicate(plan: InvalidationPlan): (key: string) => boolean {
  if (plan.scope === 'all') return () => true
  const matchers = plan.patterns.map(patternMatcher)
  return key => matchers.some(matches => matches(key))
}
