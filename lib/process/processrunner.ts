/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import { spawn, type ChildProcess } from 'node:child_process'
import readline from 'node:readline'
import EventEmitter from '../utils/events'
import type { ProcessEvents } from '../../types/events'
import { MSMError, ErrorType, errorMessage } from '../../types/errors'
import { getLogger, type Logger } from '../utils/logger'

export interface StartOptions {
  /** Working directory of the process. */
  cwd?: string
  /**
   * [Optional: default is `'ignore'`] `'pipe'` keeps stdin open to send commands; `'ignore'` binds
   * it to the null device so the process never waits for input.
   */
  stdin?: 'pipe' | 'ignore'
  env?: NodeJS.ProcessEnv
  /** [Optional: default is `1000`] Maximum number of queued output lines. Oldest lines are dropped. */
  queueSize?: number
  /**
   * [Optional: default is `false`] Start the process in its own process group (not on Windows),
   * so terminating it also terminates its children.
   */
  processGroup?: boolean
}

const TAIL_SIZE = 50

/**
 * A running (or exited) child process.
 */
export class ProcessHandle extends EventEmitter<ProcessEvents> {
  readonly pid: number
  readonly startedAt = Date.now()
  private readonly child: ChildProcess
  private readonly queueSize: number
  private readonly processGroup: boolean
  private readonly logger: Logger
  private readonly queue: string[] = []
  private readonly tail: string[] = []
  private stdinOpen: boolean
  private exit: { code: number | null; signal: NodeJS.Signals | null } | null = null
  private readonly exited: Promise<number | null>

  /**
   * @internal Use `ProcessRunner.start()`.
   */
  constructor(child: ChildProcess, pid: number, options: StartOptions, logger: Logger) {
    super()
    this.child = child
    this.pid = pid
    this.queueSize = options.queueSize ?? 1000
    this.processGroup = (options.processGroup ?? false) && process.platform !== 'win32'
    this.logger = logger
    this.stdinOpen = child.stdin !== null

    child.stdin?.on('error', (err) => {
      this.stdinOpen = false
      this.logger.debug(`stdin of process ${pid} closed: ${err.message}`)
    })
    child.stdin?.on('close', () => (this.stdinOpen = false))

    // The exit status is read once, from the first of 'exit' and 'close', and cached.
    this.exited = new Promise((resolve) => {
      let flush: NodeJS.Timeout | null = null
      const done = () => {
        if (flush) clearTimeout(flush)
        if (!this.exit) return
        this.stdinOpen = false
        resolve(this.exit.code)
      }
      child.on('exit', (code, signal) => {
        this.exit = { code, signal }
        this.emit('process_exit', { pid, code, signal })
        // Give the output streams a moment to flush their last lines.
        flush = setTimeout(done, 1000)
      })
      child.on('close', (code, signal) => {
        if (!this.exit) {
          this.exit = { code, signal }
          this.emit('process_exit', { pid, code, signal })
        }
        done()
      })
    })

    if (child.stdout) this.readLines(child.stdout, 'stdout')
    if (child.stderr) this.readLines(child.stderr, 'stderr')
  }

  /**
   * Write a line to stdin.
   * @returns `false` if stdin is closed (or was never opened).
   */
  sendLine(text: string): boolean {
    const stdin = this.child.stdin
    if (!stdin || !this.stdinOpen || this.exit || stdin.destroyed || !stdin.writable) return false
    stdin.write(text + '\n')
    return true
  }

  /**
   * Stop the process.
   * @param graceful Ask the process to stop (with `stopLine` on stdin if given, then SIGTERM),
   * waiting up to `timeout` ms after each step before killing it.
   * @param timeout [Optional: default is `10000`] Bounded wait, in ms.
   * @param stopLine [Optional] Cooperative stop command written to stdin.
   * @returns The exit code, `null` if the process was killed by a signal.
   */
  async terminate(graceful: boolean, timeout: number = 10000, stopLine?: string): Promise<number | null> {
    if (this.exit) return this.exited

    if (graceful) {
      if (stopLine !== undefined && this.sendLine(stopLine)) {
        if (await this.waitFor(timeout)) return this.exited
        this.logger.warn(`Process ${this.pid} did not stop after ${timeout}ms, sending SIGTERM`)
      }
      this.signal('SIGTERM')
      if (await this.waitFor(timeout)) return this.exited
      this.logger.warn(`Process ${this.pid} did not stop after SIGTERM, killing it`)
    }

    this.signal('SIGKILL')
    if (await this.waitFor(5000)) return this.exited
    throw new MSMError(ErrorType.PROCESS_ERROR, `Process ${this.pid} could not be killed`, { lastLines: this.lastLines() })
  }

  /**
   * Wait for the process to exit. Can be called at any time, including after the exit.
   * @returns The exit code, `null` if the process was killed by a signal.
   */
  wait(): Promise<number | null> {
    return this.exited
  }

  /**
   * Take every queued output line.
   */
  drain(): string[] {
    return this.queue.splice(0, this.queue.length)
  }

  /**
   * The last output lines (kept for error reports, not affected by `drain()`).
   */
  lastLines(count: number = 20): string[] {
    return this.tail.slice(-count)
  }

  get running() {
    return this.exit === null
  }

  get exitCode() {
    return this.exit?.code ?? null
  }

  get exitSignal() {
    return this.exit?.signal ?? null
  }

  private readLines(stream: NodeJS.ReadableStream, name: 'stdout' | 'stderr') {
    const rl = readline.createInterface({ input: stream, crlfDelay: Infinity })
    rl.on('line', (line) => {
      this.queue.push(line)
      if (this.queue.length > this.queueSize) this.queue.shift()
      this.tail.push(line)
      if (this.tail.length > TAIL_SIZE) this.tail.shift()
      this.emit('process_line', { pid: this.pid, line, stream: name })
    })
  }

  private signal(signal: NodeJS.Signals) {
    if (this.exit) return
    try {
      if (this.processGroup) process.kill(-this.pid, signal)
      else this.child.kill(signal)
    } catch (err) {
      // The group may already be gone.
      this.logger.debug(`Cannot send ${signal} to process ${this.pid}: ${errorMessage(err)}`)
      this.child.kill(signal)
    }
  }

  private async waitFor(timeout: number) {
    let timer: NodeJS.Timeout | undefined
    const timedOut = new Promise<false>((resolve) => (timer = setTimeout(() => resolve(false), timeout)))
    const result = await Promise.race([this.exited.then(() => true), timedOut])
    clearTimeout(timer)
    return result
  }
}

/**
 * Spawns child processes with an explicit argument vector (never through a shell).
 */
export default class ProcessRunner extends EventEmitter<ProcessEvents> {
  private readonly logger: Logger

  constructor(logger: Logger = getLogger('ProcessRunner')) {
    super()
    this.logger = logger
  }

  /**
   * Start a process.
   * @param executable The executable (not resolved through a shell).
   * @param args Arguments, passed as they are.
   * @returns The handle, once the process has spawned.
   * @throws `EXEC_ERROR` if the process cannot be spawned (eg. the executable does not exist).
   */
  async start(executable: string, args: string[], options: StartOptions = {}): Promise<ProcessHandle> {
    let child: ChildProcess
    try {
      child = spawn(executable, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        shell: false,
        stdio: [options.stdin ?? 'ignore', 'pipe', 'pipe'],
        detached: (options.processGroup ?? false) && process.platform !== 'win32',
        windowsHide: true
      })
    } catch (err) {
      throw new MSMError(ErrorType.EXEC_ERROR, `Cannot start ${executable}: ${errorMessage(err)}`)
    }

    const pid = await new Promise<number>((resolve, reject) => {
      const onError = (err: Error) => {
        child.off('spawn', onSpawn)
        reject(new MSMError(ErrorType.EXEC_ERROR, `Cannot start ${executable}: ${err.message}`))
      }
      const onSpawn = () => {
        child.off('error', onError)
        if (child.pid === undefined) reject(new MSMError(ErrorType.EXEC_ERROR, `Cannot start ${executable}: no PID`))
        else resolve(child.pid)
      }
      child.once('error', onError)
      child.once('spawn', onSpawn)
    })

    child.on('error', (err) => this.logger.error(`Process ${pid} (${executable}): ${err.message}`))
    const handle = new ProcessHandle(child, pid, options, this.logger)
    handle.forwardEvents(this)
    this.logger.debug(`Started process ${pid}: ${executable} ${args.join(' ')}`)
    return handle
  }
}
