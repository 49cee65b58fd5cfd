import { HeaderScanState, StreamState } from '../types';

/**
 * Tracks a single enum-valued state and refuses transitions its table does not allow.
 * Refused transitions are recorded in `errors` rather than thrown.
 */
export class StateMachine<S extends number> {
  private _state: S;
  private _errors: string[] = [];
  private readonly initial: S;
  private readonly transitions: Readonly<Record<S, readonly S[]>>;

  constructor(initial: S, transitions: Readonly<Record<S, readonly S[]>>) {
    this._state = initial;
    this.initial = initial;
    this.transitions = transitions;
  }

  public get state(): S {
    return this._state;
  }

  public get errors(): string[] {
    return this._errors;
  }

  public can(newState: S): boolean {
    return this.transitions[this._state].includes(newState);
  }

  public transition(newState: S): boolean {
    if (this.can(newState)) {
      this._state = newState;
      return true;
    }
    this._errors.push(`Invalid state transition: ${this._state} -> ${newState}`);
    return false;
  }

  public reset(): void {
    this._state = this.initial;
    this._errors = [];
  }
}

/**
 * SCANNING moves to HAVE_FMT or HAVE_DATA as the first required chunk is seen and
 * on to DONE once the other one follows. ERROR is reachable from every non-terminal state.
 */
export const HEADER_SCAN_TRANSITIONS: Readonly<Record<HeaderScanState, readonly HeaderScanState[]>> = {
  [HeaderScanState.SCANNING]: [HeaderScanState.HAVE_FMT, HeaderScanState.HAVE_DATA, HeaderScanState.ERROR],
  [HeaderScanState.HAVE_FMT]: [HeaderScanState.DONE, HeaderScanState.ERROR],
  [HeaderScanState.HAVE_DATA]: [HeaderScanState.DONE, HeaderScanState.ERROR],
  [HeaderScanState.DONE]: [],
  [HeaderScanState.ERROR]: [],
};

export const STREAM_TRANSITIONS: Readonly<Record<StreamState, readonly StreamState[]>> = {
  [StreamState.OPEN]: [StreamState.CLOSED],
  [StreamState.CLOSED]: [],
};

export function createHeaderScanStateMachine(): StateMachine<HeaderScanState> {
  return new StateMachine<HeaderScanState>(HeaderScanState.SCANNING, HEADER_SCAN_TRANSITIONS);
}

export function createStreamStateMachine(): StateMachine<StreamState> {
  return new StateMachine<StreamState>(StreamState.OPEN, STREAM_TRANSITIONS);
}
