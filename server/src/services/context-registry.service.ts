import logger from "../utils/logger";
import { DownloadContext } from "../models/download.model";

export interface ClaimOptions {
  attempts: number;
  intervalMs: number;
}

export interface ContextRegistryOptions {
  /** How long an unclaimed context is kept before it is evicted. */
  ttlMs?: number;
}

interface Entry {
  context: DownloadContext;
  evictTimer: NodeJS.Timeout;
}

/**
 * Hand-off of large-file attribution from the Bot API handler (producer) to
 * the MTProto coordinator (consumer), keyed by file_unique_id. Either side
 * may get there first, so the consumer waits for a bounded time and is woken
 * as soon as the matching context is put.
 */
export class ContextRegistry {
  private entries: Map<string, Entry> = new Map();
  private waiters: Map<string, Set<() => void>> = new Map();
  private ttlMs: number;

  constructor(options: ContextRegistryOptions = {}) {
    this.ttlMs = options.ttlMs ?? 10 * 60 * 1000;
  }

  put(id: string, context: DownloadContext): void {
    const previous = this.entries.get(id);
    if (previous) {
      clearTimeout(previous.evictTimer);
    }

    const evictTimer = setTimeout(() => {
      if (this.entries.get(id)?.evictTimer === evictTimer) {
        this.entries.delete(id);
        logger.info(`Evicted unclaimed download context ${id}`);
      }
    }, this.ttlMs);
    evictTimer.unref();

    this.entries.set(id, { context, evictTimer });

    const waiting = this.waiters.get(id);
    if (waiting) {
      this.waiters.delete(id);
      waiting.forEach((wake) => wake());
    }
  }

  take(id: string): DownloadContext | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;

    clearTimeout(entry.evictTimer);
    this.entries.delete(id);
    return entry.context;
  }

  /**
   * Takes the context for `id`, waiting up to `intervalMs` between attempts
   * when it is not there yet. Gives up after `attempts` takes.
   */
  async claim(
    id: string,
    options: ClaimOptions = { attempts: 5, intervalMs: 500 },
  ): Promise<DownloadContext | undefined> {
    for (let attempt = 1; attempt <= options.attempts; attempt++) {
      const context = this.take(id);
      if (context) return context;

      if (attempt < options.attempts) {
        logger.debug(
          `Context ${id} not registered yet (attempt ${attempt}/${options.attempts})`,
        );
        await this.waitForPut(id, options.intervalMs);
      }
    }

    return undefined;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.forEach((entry) => clearTimeout(entry.evictTimer));
    this.entries.clear();
    const waiting = [...this.waiters.values()];
    this.waiters.clear();
    waiting.forEach((set) => set.forEach((wake) => wake()));
  }

  private waitForPut(id: string, timeoutMs: number): Promise<void> {
    return new Promise((resolve) => {
      let waiting = this.waiters.get(id);
      if (!waiting) {
        waiting = new Set();
        this.waiters.set(id, waiting);
      }
      const set = waiting;

      const wake = () => {
        clearTimeout(timer);
        set.delete(wake);
        if (set.size === 0 && this.waiters.get(id) === set) {
          this.waiters.delete(id);
        }
        resolve();
      };
      const timer = setTimeout(wake, timeoutMs);
      set.add(wake);
    });
  }
}
