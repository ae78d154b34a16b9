/**
 * Anything that holds resources and can release them on demand.
 */
export interface Disposable {
  dispose(): void;
}

export function isDisposable(value: unknown): value is Disposable {
  return (typeof value === "object" || typeof value === "function")
    && value !== null
    && "dispose" in value
    && typeof value.dispose === "function";
}

/**
 * Wraps a plain cleanup callback into a {@link Disposable}.
 * Every `dispose()` call runs the callback again.
 */
export function toDisposable(action: () => unknown): Disposable {
  if (typeof action !== "function") {
    throw new TypeError("Disposal action must be a function");
  }
  return {
    dispose() {
      action();
    },
  };
}
