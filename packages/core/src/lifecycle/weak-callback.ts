/**
 * Bind a callback to `owner` without keeping `owner` alive.
 *
 * Use this when an object stores an observer whose callback calls back into
 * that same object. `fn` receives the owner as its first argument and must
 * not close over it; once the owner has been collected the returned
 * function does nothing.
 *
 * @example
 * ```typescript
 * class Counter {
 *   readonly model = observable({ count: 0 });
 *   total = 0;
 *   readonly observer = new PropertyObserver(
 *     this.model,
 *     'count',
 *     weakCallback(this, (self, count: number) => {
 *       self.total += count;
 *     })
 *   );
 * }
 * ```
 */
export function weakCallback<TOwner extends object, TArgs extends unknown[]>(
  owner: TOwner,
  fn: (owner: TOwner, ...args: TArgs) => void
): (...args: TArgs) => void {
  const ref = new WeakRef(owner);
  return (...args: TArgs) => {
    const current = ref.deref();
    if (current !== undefined) {
      fn(current, ...args);
    }
  };
}
