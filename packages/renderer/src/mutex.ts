/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Cross-thread mutex over one Int32 slot of a SharedArrayBuffer.
 *
 * Any thread holding a view of the same buffer shares the lock. Waiters
 * block in Atomics.wait, so hold it only for short copies.
 */

const UNLOCKED = 0;
const LOCKED = 1;
const STATE = 0;

export class Mutex {
  readonly buffer: SharedArrayBuffer;
  private readonly state: Int32Array;

  constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
    this.buffer = buffer;
    this.state = new Int32Array(buffer, 0, 1);
  }

  lock(): void {
    while (Atomics.compareExchange(this.state, STATE, UNLOCKED, LOCKED) !== UNLOCKED) {
      Atomics.wait(this.state, STATE, LOCKED);
    }
  }

  tryLock(): boolean {
    return Atomics.compareExchange(this.state, STATE, UNLOCKED, LOCKED) === UNLOCKED;
  }

  unlock(): void {
    if (Atomics.compareExchange(this.state, STATE, LOCKED, UNLOCKED) !== LOCKED) {
      throw new Error('Mutex.unlock called while not locked');
    }
    Atomics.notify(this.state, STATE, 1);
  }

  get isLocked(): boolean {
    return Atomics.load(this.state, STATE) === LOCKED;
  }

  /**
   * Run `fn` while holding the lock
   */
  withLock<T>(fn: () => T): T {
    this.lock();
    try {
      return fn();
    } finally {
      this.unlock();
    }
  }
}
