import {
  DEFAULT_WRITER_OPTIONS,
  MAX_BLOCK_ALIGN,
  MAX_BYTE_RATE,
  MAX_CHANNELS,
  SUPPORTED_BIT_DEPTHS,
  SUPPORTED_SAMPLE_RATES,
} from './constants';
import { WavFormat, type WavBitDepth, type WavFileConfiguration, type WavSampleRate, type WavWriterOptions } from './types';

/**
 * A map that specifies the valid bit depths for each supported audio format.
 *
 * `VALID_BIT_DEPTHS.get(WavFormat.PCM)` returns `[8, 16, 24, 32]`; IEEE float
 * data is only ever stored as 32-bit.
 */
export const VALID_BIT_DEPTHS: ReadonlyMap<WavFormat, readonly WavBitDepth[]> = new Map<WavFormat, readonly WavBitDepth[]>([
  [WavFormat.PCM, SUPPORTED_BIT_DEPTHS],
  [WavFormat.FLOAT, [32]],
]);

export function isSupportedSampleRate(value: number): value is WavSampleRate {
  return SUPPORTED_SAMPLE_RATES.some((rate) => rate === value);
}

export function isSupportedBitDepth(value: number): value is WavBitDepth {
  return SUPPORTED_BIT_DEPTHS.some((depth) => depth === value);
}

export function isSupportedFormat(value: number): value is WavFormat {
  return value === WavFormat.PCM || value === WavFormat.FLOAT;
}

/**
 * The raw numeric fields that make up a stored format.
 */
export interface FormatFields {
  sampleRate: number;
  numChannels: number;
  bitDepth: number;
  format: number;
}

/**
 * Lists every way the given fields violate the supported format set.
 * An empty list means the combination is valid.
 */
export function validateFormatFields(fields: FormatFields): string[] {
  const errors: string[] = [];
  const { sampleRate, numChannels, bitDepth, format } = fields;

  if (!isSupportedFormat(format)) {
    errors.push(`Unsupported audio format: ${format}`);
  }
  if (numChannels === 0) {
    errors.push('Invalid format: 0 channels');
  } else if (!Number.isInteger(numChannels) || numChannels < 0 || numChannels > MAX_CHANNELS) {
    errors.push(`Invalid format: ${numChannels} channels`);
  }
  if (!isSupportedSampleRate(sampleRate)) {
    errors.push(`Unsupported sample rate: ${sampleRate} Hz`);
  }
  if (!isSupportedBitDepth(bitDepth)) {
    errors.push(`Unsupported bit depth: ${bitDepth}`);
  } else if (format === WavFormat.FLOAT && !VALID_BIT_DEPTHS.get(WavFormat.FLOAT)?.includes(bitDepth)) {
    errors.push(`IEEE float audio requires a bit depth of 32 (got ${bitDepth})`);
  }

  // blockAlign and byteRate are stored as u16 and u32 header fields
  if (errors.length === 0) {
    const blockAlign = numChannels * (bitDepth / 8);
    if (blockAlign > MAX_BLOCK_ALIGN) {
      errors.push(`Invalid format: block align of ${blockAlign} bytes exceeds ${MAX_BLOCK_ALIGN}`);
    } else if (sampleRate * blockAlign > MAX_BYTE_RATE) {
      errors.push(`Invalid format: byte rate of ${sampleRate * blockAlign} bytes/s exceeds ${MAX_BYTE_RATE}`);
    }
  }
  return errors;
}

function resolveOptions(options: WavWriterOptions): FormatFields {
  return {
    sampleRate: options.sampleRate ?? DEFAULT_WRITER_OPTIONS.sampleRate,
    numChannels: options.numChannels ?? DEFAULT_WRITER_OPTIONS.numChannels,
    bitDepth: options.bitDepth ?? DEFAULT_WRITER_OPTIONS.bitDepth,
    format: options.format ?? DEFAULT_WRITER_OPTIONS.format,
  };
}

/**
 * Lists every problem with a set of writer options after defaults are applied.
 */
export function validateConfiguration(options: WavWriterOptions): string[] {
  const errors = validateFormatFields(resolveOptions(options));
  if (options.filename.length === 0) {
    errors.unshift('Missing filename');
  }
  return errors;
}

/**
 * Validates writer options and builds the configuration of the file they describe.
 * `configuration` is `null` whenever `errors` is non-empty.
 */
export function createConfiguration(options: WavWriterOptions): {
  configuration: WavFileConfiguration | null;
  errors: string[];
} {
  const errors = validateConfiguration(options);
  const { sampleRate, numChannels, bitDepth, format } = resolveOptions(options);
  if (errors.length > 0 || !isSupportedSampleRate(sampleRate) || !isSupportedBitDepth(bitDepth) || !isSupportedFormat(format)) {
    return { configuration: null, errors };
  }
  return {
    configuration: {
      filename: options.filename,
      sampleRate,
      numChannels,
      bitDepth,
      format,
      blockAlign: numChannels * (bitDepth / 8),
      dataChunkSize: 0,
    },
    errors,
  };
}

/**
 * The number of frames in the data chunk described by a configuration.
 */
export function numSamples(config: Pick<WavFileConfiguration, 'blockAlign' | 'dataChunkSize'>): number {
  if (config.blockAlign === 0) return 0;
  return Math.floor(config.dataChunkSize / config.blockAlign);
}
