/**
 * Identifier for the audio encoding stored in the `fmt ` chunk.
 * - `1`: PCM (linear integer samples)
 * - `3`: IEEE Float
 */
export enum WavFormat {
  PCM = 1,
  FLOAT = 3,
}

/**
 * A constant mapping of WAV format tag identifiers to their human-readable names.
 */
export const WavFormatNames = {
  [WavFormat.PCM]: 'PCM',
  [WavFormat.FLOAT]: 'IEEE Float',
} as const;

/**
 * The sample rates (in Hertz) a WAV file may declare.
 */
export type WavSampleRate =
  | 8000
  | 11025
  | 16000
  | 22050
  | 32000
  | 44100
  | 48000
  | 96000
  | 176400
  | 192000
  | 352800
  | 384000;

/**
 * The number of bits of information in each stored audio sample.
 */
export type WavBitDepth = 8 | 16 | 24 | 32;

/**
 * The in-memory sample representations the library converts between.
 * `int24` values live in an `Int32Array` and stay within the signed 24-bit range.
 */
export type SampleType = 'float32' | 'uint8' | 'int16' | 'int24' | 'int32';

/**
 * The typed array that carries each sample representation.
 */
export interface SampleArrayMap {
  float32: Float32Array;
  uint8: Uint8Array;
  int16: Int16Array;
  int24: Int32Array;
  int32: Int32Array;
}

export type SampleArray = SampleArrayMap[SampleType];

/**
 * A single-sample conversion between two representations.
 */
export type SampleConverter = (sample: number) => number;

/**
 * Describes the stored format of a WAV file.
 * @property sampleRate - The number of samples per second (in Hertz).
 * @property numChannels - The number of interleaved channels.
 * @property bitDepth - The number of bits per stored sample.
 * @property format - PCM or IEEE float.
 * @property blockAlign - The size in bytes of one frame across all channels (`numChannels * bitDepth / 8`).
 * @property dataChunkSize - The size in bytes of the `data` chunk payload.
 */
export interface WavFormatDescriptor {
  sampleRate: WavSampleRate;
  numChannels: number;
  bitDepth: WavBitDepth;
  format: WavFormat;
  blockAlign: number;
  dataChunkSize: number;
}

/**
 * A format descriptor bound to the file it describes.
 */
export interface WavFileConfiguration extends WavFormatDescriptor {
  filename: string;
}

/**
 * Caller-supplied settings for a new WAV file. Unset fields take the values in `DEFAULT_WRITER_OPTIONS`.
 * Numeric fields accept any number so that out-of-range values can be rejected at runtime.
 */
export interface WavWriterOptions {
  filename: string;
  sampleRate?: WavSampleRate | (number & {});
  numChannels?: number;
  bitDepth?: WavBitDepth | (number & {});
  format?: WavFormat | (number & {});
}

/**
 * Metadata for a single chunk within a WAV file.
 * @property id - The four-character identifier of the chunk (e.g., 'fmt ', 'data').
 * @property offset - The byte position of the chunk header in the file.
 * @property size - The size of the chunk's payload in bytes, as declared.
 */
export interface ChunkInfo {
  id: string;
  offset: number;
  size: number;
}

/**
 * Progress of the chunk scan that reads a WAV header.
 */
export enum HeaderScanState {
  SCANNING,
  HAVE_FMT,
  HAVE_DATA,
  DONE,
  ERROR,
}

/**
 * The outcome of scanning a RIFF/WAVE chunk stream.
 */
export interface WavHeaderParserResult {
  state: HeaderScanState;
  format: WavFormatDescriptor | null;
  dataOffset: number;
  dataBytes: number;
  totalFrames: number;
  duration: number;
  parsedChunks: ChunkInfo[];
  unhandledChunks: ChunkInfo[];
  warnings: string[];
  errors: string[];
}

/**
 * Lifecycle of a reader or writer bound to an open file.
 */
export enum StreamState {
  OPEN,
  CLOSED,
}

/**
 * The operation during which a runtime failure happened.
 */
export type WavOperation = 'open' | 'read' | 'write' | 'close';

/**
 * Describes a failure that occurred while reading or writing samples.
 * @property message - A descriptive message explaining the error.
 * @property operation - The operation that failed.
 * @property byteOffset - Bytes of sample data processed before the error.
 * @property frameNumber - The index of the frame at which the error occurred.
 */
export interface WavError {
  message: string;
  operation: WavOperation;
  byteOffset: number;
  frameNumber: number;
}

/**
 * Samples returned by a single read call.
 * @property channelData - One array per channel, each `framesRead` long.
 * @property framesRead - The number of complete frames read.
 * @property errors - Failures raised by this call; empty on success.
 */
export interface WavReadResult<T extends SampleType = SampleType> {
  channelData: SampleArrayMap[T][];
  framesRead: number;
  errors: WavError[];
}

/**
 * A snapshot of a reader's progress.
 */
export interface WavReaderInfo {
  state: StreamState;
  configuration: WavFileConfiguration;
  parsedChunks: ChunkInfo[];
  unhandledChunks: ChunkInfo[];
  bytesRead: number;
  remainingBytes: number;
  totalFrames: number;
  duration: number;
  warnings: string[];
  errors: WavError[];
}

/**
 * A snapshot of a writer's progress.
 */
export interface WavWriterInfo {
  state: StreamState;
  configuration: WavFileConfiguration;
  bytesWritten: number;
  framesWritten: number;
  errors: WavError[];
}

/**
 * Positional, synchronous read access to a byte stream.
 */
export interface ByteSource {
  /** Total number of bytes available. */
  readonly size: number;

  /**
   * Reads up to `length` bytes starting at `position`.
   * Returns fewer bytes when the end of the stream is reached.
   */
  read(length: number, position: number): Uint8Array;
}

/**
 * Synchronous write access to a seekable byte stream.
 */
export interface ByteSink {
  /** Appends bytes at the current end of the stream and returns the number written. */
  write(bytes: Uint8Array): number;

  /** Overwrites bytes at an absolute position without moving the append cursor. */
  writeAt(bytes: Uint8Array, position: number): number;
}
