/**
 * Generic listener management for state change callbacks
 */

export class ListenerManager<TArgs extends unknown[] = []> {
  private listeners: Array<(...args: TArgs) => void> = [];

  /**
   * Add a listener. Returns a function that removes it again.
   */
  add(listener: (...args: TArgs) => void): () => void {
    this.listeners.push(listener);
    return () => this.remove(listener);
  }

  /**
   * Remove a listener
   */
  remove(listener: (...args: TArgs) => void): void {
    const index = this.listeners.indexOf(listener);
    if (index !== -1) {
      this.listeners.splice(index, 1);
    }
  }

  /**
   * Notify all listeners; one failing listener does not stop the others
   */
  notify(...args: TArgs): void {
    this.listeners.forEach((listener) => {
      try {
        listener(...args);
      } catch (error) {
        console.error("[ListenerManager] Error in listener callback:", error);
      }
    });
  }

  /**
   * Clear all listeners
   */
  clear(): void {
    this.listeners = [];
  }

  /**
   * Get listener count
   */
  get count(): number {
    return this.listeners.length;
  }
}
