import { rmSync } from 'node:fs';
import { createConfiguration } from './format-validation';
import { getConverter, sampleTypeOf, storedSampleType } from './converters';
import { assertChannelBuffers, interleave } from './interleave';
import { createWavHeader, finalizeWavHeader } from './writeWavHeader';
import { FileSink } from './io/FileSink';
import { ErrorFactory } from './core/ErrorFactory';
import { StateManager } from './core/StateManager';
import type {
  SampleArray,
  SampleArrayMap,
  SampleType,
  WavFileConfiguration,
  WavWriterInfo,
  WavWriterOptions,
} from './types';

/**
 * Writes per-channel sample arrays to a WAV file.
 *
 * The header is written with zeroed size fields when the writer is created and
 * patched by {@link WavWriter.close}, which must run exactly once after the last
 * write (further calls are no-ops). Samples of any representation are converted
 * to the file's stored format on the way out.
 *
 * Passing a different number of channel arrays than the file has channels is a
 * programming error and throws; it is never reported through the return value.
 */
export class WavWriter {
  private readonly _stateManager: StateManager;
  private readonly _errorFactory: ErrorFactory;
  private readonly _sink: FileSink;
  private readonly _storedType: SampleType;
  private _closeResult = true;

  private constructor(configuration: WavFileConfiguration, sink: FileSink) {
    this._stateManager = new StateManager(configuration);
    this._errorFactory = new ErrorFactory(this._stateManager);
    this._sink = sink;
    this._storedType = storedSampleType(configuration);
  }

  /**
   * Validates the options, creates the file and writes its placeholder header.
   * @returns The writer, or `null` if the options are invalid or the file cannot be written.
   */
  public static create(options: WavWriterOptions): WavWriter | null {
    const { configuration } = createConfiguration(options);
    if (configuration === null) return null;

    let sink: FileSink;
    try {
      sink = new FileSink(configuration.filename);
    } catch {
      return null;
    }

    try {
      sink.write(createWavHeader(configuration));
    } catch {
      sink.close();
      rmSync(configuration.filename, { force: true });
      return null;
    }
    return new WavWriter(configuration, sink);
  }

  public get info(): WavWriterInfo {
    const { state, configuration, processedBytes, processedFrames, errors } = this._stateManager;
    return {
      state,
      configuration: { ...configuration, dataChunkSize: processedBytes },
      bytesWritten: processedBytes,
      framesWritten: processedFrames,
      errors: [...errors],
    };
  }

  public get isOpen(): boolean {
    return this._stateManager.isOpen;
  }

  /**
   * Writes `frames` samples from each channel array. The representation is taken from
   * the array type; an `Int32Array` is treated as full-range 32-bit. Use
   * {@link WavWriter.writeSamples} for 24-bit input.
   * @returns `true` when every byte reached the file, `false` on an I/O failure.
   * @throws If the number of arrays differs from the channel count, an array is shorter
   * than `frames`, or the arrays are of different types.
   */
  public write(frames: number, ...channels: SampleArray[]): boolean {
    this.assertOpen();
    const type = channels.length > 0 ? sampleTypeOf(channels[0]) : this._storedType;
    for (let ch = 1; ch < channels.length; ch++) {
      if (sampleTypeOf(channels[ch]) !== type) {
        throw new TypeError(`Channel ${ch} is ${sampleTypeOf(channels[ch])}, expected ${type} like channel 0.`);
      }
    }
    return this.writeChannels(type, frames, channels);
  }

  /**
   * Writes `frames` samples from each channel array, read as the given representation.
   */
  public writeSamples<T extends SampleType>(type: T, frames: number, channels: readonly SampleArrayMap[T][]): boolean {
    this.assertOpen();
    return this.writeChannels(type, frames, channels);
  }

  /**
   * Patches the header sizes and closes the file. Only the first call does anything.
   * @returns Whether the header was finalized; later calls repeat the first result.
   */
  public close(): boolean {
    if (!this._stateManager.isOpen) return this._closeResult;
    this._stateManager.close();
    try {
      finalizeWavHeader(this._sink, this._stateManager.processedBytes);
    } catch (err) {
      this._errorFactory.record('close', err);
      this._closeResult = false;
    } finally {
      try {
        this._sink.close();
      } catch (err) {
        this._errorFactory.record('close', err);
        this._closeResult = false;
      }
    }
    return this._closeResult;
  }

  private writeChannels(type: SampleType, frames: number, channels: readonly ArrayLike<number>[]): boolean {
    const { numChannels } = this._stateManager.configuration;
    assertChannelBuffers(channels, numChannels, frames);
    if (frames === 0) return true;

    const bytes = interleave(channels, frames, getConverter(type, this._storedType), this._storedType);
    try {
      this._stateManager.updateProgress(this._sink.write(bytes));
      return true;
    } catch (err) {
      this._errorFactory.record('write', err);
      return false;
    }
  }

  private assertOpen(): void {
    if (!this._stateManager.isOpen) {
      throw new Error('WavWriter is closed.');
    }
  }
}
