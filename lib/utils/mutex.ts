/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

/**
 * Promise-based lock. Tasks run one at a time, in the order they were queued.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  /**
   * Run `task` once every previously queued task has settled.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++
    const result = this.tail.then(task)
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    )
    return result
  }

  /**
   * Whether a task is running or queued.
   */
  get locked() {
    return this.pending > 0
  }

  /**
   * Wait until every queued task has settled.
   */
  async idle() {
    while (this.pending > 0) await this.tail
  }

  private release() {
    this.pending--
  }
}

/**
 * One `Mutex` per key: tasks for the same key are serialized, tasks for different keys run concurrently.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>()

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key)
    if (!lock) {
      lock = new Mutex()
      this.locks.set(key, lock)
    }
    const mutex = lock
    return mutex.run(task).finally(() => {
      if (!mutex.locked && this.locks.get(key) === mutex) this.locks.delete(key)
    })
  }

  isLocked(key: string) {
    return this.locks.get(key)?.locked ?? false
  }
}
