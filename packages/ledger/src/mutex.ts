/**
 * @lexledger/ledger: Exclusive section for appends.
 *
 * A FIFO promise queue: each caller waits for the previous holder to
 * finish before its own section starts. A failing section releases the
 * lock like a successful one.
 */

export class Mutex {
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  /**
   * Run `section` once every earlier section has settled.
   */
  runExclusive<T>(section: () => Promise<T>): Promise<T> {
    this._pending++;
    const run = this._tail.then(section);
    this._tail = run.then(
      () => this._release(),
      () => this._release(),
    );
    return run;
  }

  /** Sections queued or running */
  get pending(): number {
    return this._pending;
  }

  private _release(): void {
    this._pending--;
  }
}
