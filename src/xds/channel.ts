import { WatchAbortedError } from "./errors.js";
import type { WatchResponse } from "./request.js";

/** Options accepted by {@link ResponseChannel.receive}. */
export interface ReceiveOptions {
  /** Resolve with `null` when nothing arrives within the delay (milliseconds). */
  timeoutMs?: number;
  /** Reject with {@link WatchAbortedError} once the signal aborts. */
  signal?: AbortSignal | null;
}

type Waiter = (response: WatchResponse | null) => void;

/**
 * Single-slot delivery channel backing a watch. The producer side never
 * waits: {@link offer} either stores the response or reports that the slot
 * was already used. Consumers are resumed through promise settlement, so
 * their continuations always run after the registry operation returned.
 */
export class ResponseChannel {
  private value: WatchResponse | null = null;
  private delivered = false;
  private closed = false;
  private readonly waiters = new Set<Waiter>();

  constructor(readonly watchId: number) {}

  /**
   * Stores the response unless the channel already carried one or was
   * closed. Returns true when the response was accepted.
   */
  offer(response: WatchResponse): boolean {
    if (this.delivered || this.closed) {
      return false;
    }
    this.delivered = true;
    this.value = response;
    this.settle(response);
    return true;
  }

  /**
   * Marks the channel as cancelled. Pending receivers resolve with `null`; a
   * response that was already stored stays readable.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (!this.delivered) {
      this.settle(null);
    }
  }

  /** True once a response was accepted. */
  get hasResponse(): boolean {
    return this.delivered;
  }

  /** True once the watch was cancelled before delivery. */
  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns the stored response without waiting. */
  poll(): WatchResponse | null {
    return this.value;
  }

  /**
   * Waits for the response. Resolves with `null` when the channel closes
   * without delivery or when {@link ReceiveOptions.timeoutMs} elapses.
   */
  receive(options: ReceiveOptions = {}): Promise<WatchResponse | null> {
    if (this.delivered || this.closed) {
      return Promise.resolve(this.value);
    }
    const { signal, timeoutMs } = options;
    if (signal?.aborted) {
      return Promise.reject(new WatchAbortedError(this.watchId));
    }

    return new Promise<WatchResponse | null>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null;
      const cleanup = () => {
        this.waiters.delete(waiter);
        if (timer !== null) {
          clearTimeout(timer);
          timer = null;
        }
        signal?.removeEventListener("abort", onAbort);
      };
      const waiter: Waiter = (response) => {
        cleanup();
        resolve(response);
      };
      const onAbort = () => {
        cleanup();
        reject(new WatchAbortedError(this.watchId));
      };

      this.waiters.add(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => waiter(null), Math.max(0, timeoutMs));
      }
    });
  }

  private settle(response: WatchResponse | null): void {
    for (const waiter of [...this.waiters]) {
      waiter(response);
    }
    this.waiters.clear();
  }
}
