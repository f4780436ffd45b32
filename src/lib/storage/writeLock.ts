/**
 * Serialises async sections. Each caller waits for the previous section to
 * settle, whether it resolved or rejected. Not reentrant.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve()

  runExclusive<T>(section: () => Promise<T>): Promise<T> {
    const run = this.tail.then(section)
    this.tail = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }
}
