/**
 * Cooperative cancellation token.
 * Setting it only raises a flag; holders check it at their own checkpoints.
 */
export class CancellationToken {
  private _reason: string | null = null;
  private listeners: Array<(reason: string) => void> = [];

  get cancelled(): boolean {
    return this._reason !== null;
  }

  get reason(): string | null {
    return this._reason;
  }

  cancel(reason: string = "requested"): void {
    if (this._reason !== null) {
      return;
    }
    this._reason = reason;
    for (const listener of this.listeners.splice(0)) {
      listener(reason);
    }
  }

  /** Runs immediately when already cancelled */
  onCancel(listener: (reason: string) => void): void {
    if (this._reason !== null) {
      listener(this._reason);
      return;
    }
    this.listeners.push(listener);
  }
}
