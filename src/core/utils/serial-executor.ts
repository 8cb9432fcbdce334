/**
 * SerialExecutor runs async tasks strictly one after another.
 *
 * Each call to `run` waits for every previously submitted task to settle
 * before starting. A rejected task does not block the ones queued behind it;
 * its rejection is delivered only to its own caller.
 *
 * @example
 * ```typescript
 * const executor = new SerialExecutor();
 * // Both read-modify-write sequences run in submission order
 * await Promise.all([
 *   executor.run(() => increment()),
 *   executor.run(() => increment()),
 * ]);
 * ```
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(() => task());
    // The chain only tracks completion; errors belong to the caller of `run`
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
