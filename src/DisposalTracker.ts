import { EventEmitter } from "eventemitter3";
import { type Disposable, isDisposable, toDisposable } from "./Disposable";
import { ObjectDisposedError } from "./ObjectDisposedError";

/**
 * Tracks the disposal state of its owner and the cleanups to run when the
 * owner goes away.
 *
 * Cleanups run in REVERSE order of registration, each one exactly once.
 *
 * ```ts
 * class Poller implements Disposable {
 *   #tracker = new DisposalTracker(this);
 *
 *   constructor(emitter: EventEmitter, refresh: () => void) {
 *     this.#tracker.adopt(setInterval(refresh, 1000), clearInterval);
 *     emitter.on("change", refresh);
 *     this.#tracker.registerCustom(() => emitter.off("change", refresh));
 *   }
 *
 *   poll() {
 *     this.#tracker.checkDisposed();
 *     ...
 *   }
 *
 *   dispose() {
 *     this.#tracker.dispose();
 *   }
 * }
 * ```
 *
 * Here the "change" listener is removed first, then the interval is cleared.
 *
 * `dispose` is a plain method: hand a tracker (or its owner) to another one with
 * `registerDisposable(tracker)`, not `registerCustom(tracker.dispose)`, which
 * loses `this`.
 */
export class DisposalTracker implements Disposable {
  #isDisposed = false;
  readonly #disposers: Array<() => unknown> = [];
  readonly #owner: unknown;
  readonly #events = new EventEmitter<{
    disposed: () => void;
  }>();

  /** @param owner used to identify the disposed object in errors, the tracker itself by default */
  constructor(owner?: unknown) {
    this.#owner = owner ?? this;
  }

  get isDisposed(): boolean {
    return this.#isDisposed;
  }

  /** Throws {@link ObjectDisposedError} once the tracker has been disposed. */
  checkDisposed(): void {
    if (this.#isDisposed) {
      throw new ObjectDisposedError(this.#owner);
    }
  }

  registerDisposable(disposable: Disposable): void {
    if (!isDisposable(disposable)) {
      throw new TypeError("Expected an object with a dispose() method");
    }
    this.#disposers.push(disposable.dispose.bind(disposable));
  }

  registerCustom(action: () => unknown): void {
    if (typeof action !== "function") {
      throw new TypeError("Disposal action must be a function");
    }
    this.#disposers.push(action);
  }

  /**
   * Registers `disposer(value)` as a cleanup and hands `value` back, so a
   * resource can be acquired and tracked in one expression.
   */
  adopt<T>(value: T, disposer: (value: T) => unknown): T {
    if (typeof disposer !== "function") {
      throw new TypeError("Disposal action must be a function");
    }
    this.#disposers.push(() => disposer(value));
    return value;
  }

  /**
   * Calls `listener` once every cleanup has run. It is not called when a
   * cleanup throws. Listeners added after `dispose()` are dropped.
   *
   * @returns a disposable that removes the listener
   */
  onDisposed(listener: () => void): Disposable {
    if (typeof listener !== "function") {
      throw new TypeError("Listener must be a function");
    }
    if (this.#isDisposed) {
      return toDisposable(() => { });
    }
    this.#events.once("disposed", listener);
    return toDisposable(() => this.#events.off("disposed", listener));
  }

  /**
   * Runs every registered cleanup, last registered first. Only the first call
   * does anything.
   *
   * The flag is raised before the drain, so a cleanup calling back into
   * `dispose()` is a no-op, while cleanups registered during the drain still
   * run in this same call. A throwing cleanup aborts the drain: its error
   * reaches the caller and the cleanups left behind never run.
   */
  dispose(): void {
    if (this.#isDisposed) {
      return;
    }
    this.#isDisposed = true;
    try {
      let disposer: (() => unknown) | undefined;
      while ((disposer = this.#disposers.pop())) {
        disposer();
      }
      this.#events.emit("disposed");
    } finally {
      this.#events.removeAllListeners("disposed");
    }
  }
}
