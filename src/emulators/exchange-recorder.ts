/**
 * ExchangeRecorder: counts overlapping exchanges on a simulated channel
 *
 * Emulators call begin() when a request arrives and end() once its reply has
 * been delivered. Sharing one recorder between several emulators models a
 * shared bus: maxConcurrent > 1 means two exchanges were on the wire at once.
 */

export class ExchangeRecorder {
  private _active = 0;
  private _maxConcurrent = 0;
  private _completed = 0;
  private _labels: string[] = [];

  begin(label: string): void {
    this._active++;
    this._maxConcurrent = Math.max(this._maxConcurrent, this._active);
    this._labels.push(label);
  }

  end(): void {
    if (this._active === 0) return;
    this._active--;
    this._completed++;
  }

  get active(): number {
    return this._active;
  }

  get maxConcurrent(): number {
    return this._maxConcurrent;
  }

  get completed(): number {
    return this._completed;
  }

  /** Labels of every exchange in arrival order */
  get labels(): readonly string[] {
    return this._labels;
  }

  reset(): void {
    this._active = 0;
    this._maxConcurrent = 0;
    this._completed = 0;
    this._labels = [];
  }
}
