import { StreamState, type WavError, type WavFileConfiguration } from '../types';
import { createStreamStateMachine, type StateMachine } from './StateMachine';

/**
 * Manages the lifecycle state and progress statistics of an open reader or writer.
 */
export class StateManager {
  public readonly configuration: WavFileConfiguration;
  public readonly machine: StateMachine<StreamState> = createStreamStateMachine();
  public processedBytes = 0;
  public totalBytes: number;
  public errors: WavError[] = [];

  constructor(configuration: WavFileConfiguration, totalBytes = 0) {
    this.configuration = configuration;
    this.totalBytes = totalBytes;
  }

  get state(): StreamState {
    return this.machine.state;
  }

  get isOpen(): boolean {
    return this.machine.state === StreamState.OPEN;
  }

  get remainingBytes(): number {
    return Math.max(0, this.totalBytes - this.processedBytes);
  }

  get processedFrames(): number {
    const { blockAlign } = this.configuration;
    return blockAlign > 0 ? Math.floor(this.processedBytes / blockAlign) : 0;
  }

  public updateProgress(bytesProcessed: number): void {
    this.processedBytes += bytesProcessed;
  }

  public close(): boolean {
    return this.machine.transition(StreamState.CLOSED);
  }
}
