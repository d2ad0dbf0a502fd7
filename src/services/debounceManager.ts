import { IDebounceManager, ILogger } from '../context/contracts';
import { DebugCategory } from '../context/types';
import { DebugLogger } from './debugLogger';

interface PendingEntry {
  timeout: NodeJS.Timeout;
  scheduledAt: number;
}

/**
 * Keyed debouncer. Each key holds at most one pending action: a new call for
 * the same key replaces the previous one and restarts its timer, so two
 * debounced invocations of the same action never interleave.
 */
export class DebounceManager implements IDebounceManager {
  private readonly pending = new Map<string, PendingEntry>();

  constructor(
    private readonly logger: ILogger,
    private readonly debug: DebugLogger = new DebugLogger(logger)
  ) {}

  debounce(key: string, delayMs: number, action: () => void): void {
    const existing = this.pending.get(key);
    if (existing) {
      clearTimeout(existing.timeout);
      this.debug.log(DebugCategory.Debounce, `${key}: superseded call from ${Date.now() - existing.scheduledAt}ms ago`);
    }

    const timeout = setTimeout(() => {
      // Only the entry that owns this timer may fire
      if (this.pending.get(key)?.timeout !== timeout) {
        return;
      }
      this.pending.delete(key);
      try {
        action();
      } catch (err) {
        this.logger.error(`[Debounce] ${key}: action failed`, err);
      }
    }, delayMs);

    this.pending.set(key, { timeout, scheduledAt: Date.now() });
  }

  cancel(key: string): void {
    const entry = this.pending.get(key);
    if (!entry) {
      return;
    }
    clearTimeout(entry.timeout);
    this.pending.delete(key);
  }

  /**
   * Drop every pending action
   */
  clear(): void {
    const count = this.pending.size;
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timeout);
    }
    this.pending.clear();
    if (count > 0) {
      this.logger.info(`[Debounce] Cleared ${count} pending actions`);
    }
  }

  getPendingCount(): number {
    return this.pending.size;
  }

  dispose(): void {
    this.clear();
  }
}
