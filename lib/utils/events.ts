/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import { EventEmitter as NodeEventEmitter } from 'node:events'

type EventMap<T> = { [K in keyof T]: unknown[] }

interface RawEmitter {
  emitRaw(event: string, args: unknown[]): void
}

/**
 * Typed event emitter. Every component of the library extends it with its own event map.
 */
export default class EventEmitter<Events extends EventMap<Events>> {
  private readonly emitter = new NodeEventEmitter()
  private readonly targets: RawEmitter[] = []

  constructor() {
    this.emitter.setMaxListeners(0)
  }

  on<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void): this {
    this.emitter.on(event, listener)
    return this
  }

  once<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void): this {
    this.emitter.once(event, listener)
    return this
  }

  off<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void): this {
    this.emitter.off(event, listener)
    return this
  }

  emit<K extends keyof Events & string>(event: K, ...args: Events[K]): boolean {
    this.emitRaw(event, args)
    return this.emitter.listenerCount(event) > 0
  }

  /**
   * Forward every event of this emitter to another emitter.
   * @param target The emitter that will re-emit the events.
   */
  forwardEvents(target: RawEmitter) {
    this.targets.push(target)
  }

  /**
   * @internal Used by `forwardEvents`.
   */
  emitRaw(event: string, args: unknown[]) {
    this.emitter.emit(event, ...args)
    this.targets.forEach((target) => target.emitRaw(event, args))
  }

  removeAllListeners() {
    this.emitter.removeAllListeners()
  }
}
