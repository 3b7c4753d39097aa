import { spawn } from 'node:child_process'
import type { EventEmitter } from 'node:events'
import path from 'node:path'
import { createInterface } from 'node:readline'
import type { Readable } from 'node:stream'
import { makeLogger } from '@/core/lib/logger'

const log = makeLogger('process-runner')

export type OutputStream = 'stdout' | 'stderr' | 'system'

export interface OutputLine {
  stream: OutputStream
  text: string
}

export interface RunHandle {
  /** Resolves with the exit code once all output has been delivered; null if the process never started */
  readonly exited: Promise<number | null>
  kill(): void
}

export interface ProcessRunner {
  run(filePath: string, onLine: (line: OutputLine) => void): RunHandle
}

/** The part of ChildProcess the runner relies on */
export interface SpawnedProcess extends EventEmitter {
  readonly stdout: Readable | null
  readonly stderr: Readable | null
  readonly pid?: number
  kill(): boolean
}

export type SpawnProcess = (command: string, args: string[], options: { cwd: string }) => SpawnedProcess

export interface NodeProcessRunnerOptions {
  interpreter?: string
  /** Arguments placed before the script path; `-u` keeps Python output unbuffered */
  interpreterArgs?: string[]
  spawn?: SpawnProcess
}

const spawnPiped: SpawnProcess = (command, args, options) =>
  spawn(command, args, { cwd: options.cwd, stdio: ['ignore', 'pipe', 'pipe'] })

/**
 * Runs a saved script under an interpreter and streams its output line by
 * line as it arrives. Spawn failures surface as `[ERROR] …` lines, never as
 * exceptions.
 */
export class NodeProcessRunner implements ProcessRunner {
  private readonly interpreter: string
  private readonly interpreterArgs: string[]
  private readonly spawnProcess: SpawnProcess

  constructor(options: NodeProcessRunnerOptions = {}) {
    this.interpreter = options.interpreter ?? 'python3'
    this.interpreterArgs = options.interpreterArgs ?? ['-u']
    this.spawnProcess = options.spawn ?? spawnPiped
  }

  run(filePath: string, onLine: (line: OutputLine) => void): RunHandle {
    const args = [...this.interpreterArgs, filePath]
    log.info('Running', this.interpreter, args)

    let child: SpawnedProcess
    try {
      child = this.spawnProcess(this.interpreter, args, { cwd: path.dirname(filePath) })
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      onLine({ stream: 'system', text: `[ERROR] ${message}` })
      return { exited: Promise.resolve(null), kill: () => undefined }
    }

    const streamsClosed = Promise.all(
      [
        { input: child.stdout, stream: 'stdout' as const },
        { input: child.stderr, stream: 'stderr' as const },
      ].map(({ input, stream }) => {
        if (!input) return Promise.resolve()
        const reader = createInterface({ input, crlfDelay: Infinity })
        reader.on('line', (text) => onLine({ stream, text }))
        return new Promise<void>((resolve) => reader.once('close', () => resolve()))
      })
    )

    const exited = new Promise<number | null>((resolve) => {
      let settled = false
      const settle = (code: number | null) => {
        if (settled) return
        settled = true
        log.info('Process finished', { code })
        resolve(code)
      }

      child.once('error', (error: Error) => {
        onLine({ stream: 'system', text: `[ERROR] ${error.message}` })
        // No pid means the process never started and no 'close' will follow
        if (child.pid === undefined) settle(null)
      })

      child.once('close', (code: number | null) => {
        void streamsClosed.then(() => settle(code))
      })
    })

    return {
      exited,
      kill: () => {
        child.kill()
      },
    }
  }
}
