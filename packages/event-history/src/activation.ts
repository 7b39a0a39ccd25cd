/**
 * Activation state.
 *
 * A flat boolean with several writers: administrative `set()` calls and
 * the listener registry's empty/non-empty transitions. The last writer
 * wins; there is no memory of why the recorder is active.
 */

export type ActivationState = "dormant" | "recording";

export type ActivationCause = "admin" | "listener-added" | "listeners-emptied";

/**
 * Observer of actual state changes (writes that leave the state as it
 * was are not reported).
 */
export type ActivationObserver = (
  from: ActivationState,
  to: ActivationState,
  cause: ActivationCause,
) => void;

export class ActivationController {
  private _active = false;

  constructor(private readonly _onTransition?: ActivationObserver) {}

  /** Administrative switch. */
  set(active: boolean): void {
    this._write(active, "admin");
  }

  /** A listener was registered: start recording, even if already active. */
  listenerAdded(): void {
    this._write(true, "listener-added");
  }

  /** The last listener was removed: stop recording. */
  listenersEmptied(): void {
    this._write(false, "listeners-emptied");
  }

  isActive(): boolean {
    return this._active;
  }

  get state(): ActivationState {
    return this._active ? "recording" : "dormant";
  }

  private _write(active: boolean, cause: ActivationCause): void {
    const from = this.state;
    this._active = active;
    const to = this.state;
    if (from !== to && this._onTransition !== undefined) {
      this._onTransition(from, to, cause);
    }
  }
}
