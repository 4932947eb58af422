/**
 * Script Runner
 *
 * One engine process per call. The runner knows nothing about retries or
 * classification; it reports what the process did.
 */

import { spawn } from 'node:child_process'

export type RawRun = {
  exitCode: number
  stdout: string
  stderr: string
}

export type RunOptions = {
  /** Aborting kills the process; the returned promise then rejects. */
  signal: AbortSignal
}

export interface ScriptRunner {
  run(source: string, options: RunOptions): Promise<RawRun>
}

// ============================================================================
// Process Spawning
// ============================================================================

type OutputStream = {
  on(event: 'data', listener: (chunk: Buffer) => void): unknown
}

export type SpawnedProcess = {
  stdout: OutputStream | null
  stderr: OutputStream | null
  once(event: 'error', listener: (error: Error) => void): unknown
  once(event: 'close', listener: (code: number | null) => void): unknown
}

export type SpawnLike = (
  command: string,
  args: string[],
  options: { signal: AbortSignal; stdio: ['ignore', 'pipe', 'pipe'] }
) => SpawnedProcess

export type OsascriptRunnerOptions = {
  binary?: string
  spawnImpl?: SpawnLike
}

export function createOsascriptRunner(options: OsascriptRunnerOptions = {}): ScriptRunner {
  const binary = options.binary ?? 'osascript'
  const spawnImpl: SpawnLike = options.spawnImpl ?? spawn

  return {
    run(source, { signal }) {
      return new Promise<RawRun>((resolve, reject) => {
        const child = spawnImpl(binary, ['-e', source], {
          signal,
          stdio: ['ignore', 'pipe', 'pipe'],
        })
        const stdout: Buffer[] = []
        const stderr: Buffer[] = []
        child.stdout?.on('data', chunk => stdout.push(chunk))
        child.stderr?.on('data', chunk => stderr.push(chunk))
        child.once('error', reject)
        child.once('close', code => {
          resolve({
            exitCode: code ?? 1,
            stdout: Buffer.concat(stdout).toString('utf8').trim(),
            stderr: Buffer.concat(stderr).toString('utf8').trim(),
          })
        })
      })
    },
  }
}
