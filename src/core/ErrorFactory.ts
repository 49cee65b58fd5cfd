import type { WavError, WavOperation } from '../types';
import type { StateManager } from './StateManager';

/**
 * Creates standardized WavError records using context from the state manager.
 */
export class ErrorFactory {
  private readonly stateManager: StateManager;

  constructor(stateManager: StateManager) {
    this.stateManager = stateManager;
  }

  public create(operation: WavOperation, message: string): WavError {
    return {
      message,
      operation,
      byteOffset: this.stateManager.processedBytes,
      frameNumber: this.stateManager.processedFrames,
    };
  }

  public fromException(operation: WavOperation, err: unknown): WavError {
    const reason = err instanceof Error ? err.message : String(err);
    return this.create(operation, `${operation} failed: ${reason}`);
  }

  /** Creates the error and records it on the state manager. */
  public record(operation: WavOperation, err: unknown): WavError {
    const error = this.fromException(operation, err);
    this.stateManager.errors.push(error);
    return error;
  }
}
