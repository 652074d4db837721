import type { PhyListener } from './types.js';

/**
 * Non-owning set of listeners. A listener is its own handle: registering it
 * twice keeps one entry, and removing one that is absent does nothing.
 */
export class PhyListenerRegistry {
  private listeners: PhyListener[] = [];

  get size(): number {
    return this.listeners.length;
  }

  register(listener: PhyListener): PhyListener {
    if (!this.listeners.includes(listener)) {
      this.listeners.push(listener);
    }
    return listener;
  }

  unregister(listener: PhyListener): boolean {
    const index = this.listeners.indexOf(listener);
    if (index === -1) {
      return false;
    }
    this.listeners.splice(index, 1);
    return true;
  }

  has(listener: PhyListener): boolean {
    return this.listeners.includes(listener);
  }

  clear(): void {
    this.listeners = [];
  }

  /**
   * Calls `fn` for each listener registered when the notification started.
   */
  notify(fn: (listener: PhyListener) => void): void {
    for (const listener of [...this.listeners]) {
      fn(listener);
    }
  }
}
