/**
 * Per-key mutation serializer.
 *
 * Tasks sharing a key run one after another in submission order; tasks
 * on different keys run concurrently. A rejected task does not block the
 * tasks queued behind it.
 */

export class KeyedSerializer {
  private readonly _tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The caller observes the rejection through `result`.
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this._tails.set(key, tail);
    void tail.then(() => {
      if (this._tails.get(key) === tail) {
        this._tails.delete(key);
      }
    });

    return result;
  }

  /** Keys with queued or running tasks. */
  get pendingKeys(): number {
    return this._tails.size;
  }
}
