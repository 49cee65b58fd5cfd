import { createSampleArray, getConverter, storedSampleType } from './converters';
import { numSamples } from './format-validation';
import { deinterleave } from './interleave';
import { parseWavHeader } from './parseWavHeader';
import { bytesPerFrame } from './sample-layouts';
import { FileSource } from './io/FileSource';
import { ErrorFactory } from './core/ErrorFactory';
import { StateManager } from './core/StateManager';
import type {
  ChunkInfo,
  SampleType,
  WavFileConfiguration,
  WavHeaderParserResult,
  WavReaderInfo,
  WavReadResult,
} from './types';

/**
 * Reads samples from a WAV file as per-channel typed arrays of any supported representation.
 *
 * The header is parsed when the reader is created; samples are read on demand from
 * the `data` chunk and never past its end.
 */
export class WavReader {
  private readonly _stateManager: StateManager;
  private readonly _errorFactory: ErrorFactory;
  private readonly _source: FileSource;
  private readonly _storedType: SampleType;
  private readonly _frameSize: number;
  private readonly _dataOffset: number;
  private readonly _parsedChunks: ChunkInfo[];
  private readonly _unhandledChunks: ChunkInfo[];
  private readonly _warnings: string[];

  private constructor(configuration: WavFileConfiguration, header: WavHeaderParserResult, source: FileSource) {
    this._stateManager = new StateManager(configuration, Math.min(header.dataBytes, source.size - header.dataOffset));
    this._errorFactory = new ErrorFactory(this._stateManager);
    this._source = source;
    this._storedType = storedSampleType(configuration);
    this._frameSize = bytesPerFrame(this._storedType, configuration.numChannels);
    this._dataOffset = header.dataOffset;
    this._parsedChunks = header.parsedChunks;
    this._unhandledChunks = header.unhandledChunks;
    this._warnings = header.warnings;
  }

  /**
   * Opens a file and parses its header.
   * @returns The reader, or `null` if the file is missing, unreadable or not a supported WAV file.
   */
  public static create(filename: string): WavReader | null {
    let source: FileSource;
    try {
      source = new FileSource(filename);
    } catch {
      return null;
    }

    const header = parseWavHeader(source);
    if (header.format === null) {
      source.close();
      return null;
    }
    return new WavReader({ filename, ...header.format }, header, source);
  }

  /**
   * A read-only snapshot of the file's format.
   */
  public configuration(): Readonly<WavFileConfiguration> {
    return Object.freeze({ ...this._stateManager.configuration });
  }

  public get info(): WavReaderInfo {
    const { state, configuration, processedBytes, remainingBytes, errors } = this._stateManager;
    const totalFrames = numSamples(configuration);
    return {
      state,
      configuration: { ...configuration },
      parsedChunks: [...this._parsedChunks],
      unhandledChunks: [...this._unhandledChunks],
      bytesRead: processedBytes,
      remainingBytes,
      totalFrames,
      duration: totalFrames / configuration.sampleRate,
      warnings: [...this._warnings],
      errors: [...errors],
    };
  }

  public get isOpen(): boolean {
    return this._stateManager.isOpen;
  }

  /**
   * Reads up to `frames` frames and converts them to `type`.
   *
   * Fewer frames are returned once the end of the data is reached; the result is never
   * padded. An I/O failure yields empty channels and the error in `errors`.
   * @throws If the reader is closed or `frames` is not a non-negative integer.
   */
  public read<T extends SampleType>(type: T, frames: number): WavReadResult<T> {
    if (!this._stateManager.isOpen) {
      throw new Error('WavReader is closed.');
    }
    if (!Number.isInteger(frames) || frames < 0) {
      throw new RangeError(`Invalid frame count: ${frames}.`);
    }

    const { numChannels } = this._stateManager.configuration;
    const available = this._stateManager.remainingBytes - (this._stateManager.remainingBytes % this._frameSize);
    const length = Math.min(frames * this._frameSize, available);

    let bytes: Uint8Array;
    try {
      bytes = this._source.read(length, this._dataOffset + this._stateManager.processedBytes);
    } catch (err) {
      const error = this._errorFactory.record('read', err);
      return {
        channelData: Array.from({ length: numChannels }, () => createSampleArray(type, 0)),
        framesRead: 0,
        errors: [error],
      };
    }

    const channelData = deinterleave(bytes, numChannels, this._storedType, getConverter(this._storedType, type), type);
    const framesRead = Math.floor(bytes.length / this._frameSize);
    this._stateManager.updateProgress(framesRead * this._frameSize);
    return { channelData, framesRead, errors: [] };
  }

  /**
   * Closes the file. Only the first call does anything.
   */
  public close(): void {
    if (!this._stateManager.isOpen) return;
    this._stateManager.close();
    try {
      this._source.close();
    } catch (err) {
      this._errorFactory.record('close', err);
    }
  }
}
