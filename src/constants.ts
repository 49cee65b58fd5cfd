import { WavFormat, type WavBitDepth, type WavSampleRate } from './types';

/**
 * The four-character code (FourCC) opening every RIFF file.
 */
export const RIFF_SIGNATURE = 'RIFF';

/**
 * The RIFF form type of a WAVE audio file.
 */
export const WAVE_SIGNATURE = 'WAVE';

/**
 * The FourCC of the chunk holding the format information of the audio data.
 */
export const FMT_CHUNK = 'fmt ';

/**
 * The FourCC of the chunk holding the raw audio sample data.
 */
export const DATA_CHUNK = 'data';

/**
 * Size in bytes of the fixed part of a `fmt ` chunk body.
 */
export const FMT_CHUNK_BODY_SIZE = 16;

/**
 * Size in bytes of a chunk header (FourCC plus 32-bit size).
 */
export const CHUNK_HEADER_SIZE = 8;

/**
 * Size in bytes of the RIFF preamble (`RIFF`, size, `WAVE`).
 */
export const RIFF_HEADER_SIZE = 12;

/**
 * Size in bytes of the canonical header emitted by the writer.
 */
export const WAV_HEADER_SIZE = 44;

/**
 * Byte offset of the RIFF chunk size field.
 */
export const RIFF_SIZE_OFFSET = 4;

/**
 * Byte offset of the `data` chunk size field in the canonical header.
 */
export const DATA_SIZE_OFFSET = 40;

/**
 * The RIFF size of a canonical header with no samples: everything after the size field.
 */
export const RIFF_SIZE_BASE = WAV_HEADER_SIZE - 8;

/**
 * The largest channel count the 16-bit header field can hold.
 */
export const MAX_CHANNELS = 0xffff;

/**
 * The largest frame size, in bytes, the 16-bit block align field can hold.
 */
export const MAX_BLOCK_ALIGN = 0xffff;

/**
 * The largest byte rate the 32-bit header field can hold.
 */
export const MAX_BYTE_RATE = 0xffffffff;

export const SUPPORTED_SAMPLE_RATES: readonly WavSampleRate[] = [
  8000, 11025, 16000, 22050, 32000, 44100, 48000, 96000, 176400, 192000, 352800, 384000,
];

export const SUPPORTED_BIT_DEPTHS: readonly WavBitDepth[] = [8, 16, 24, 32];

/**
 * Values applied to writer options the caller leaves unset.
 */
export const DEFAULT_WRITER_OPTIONS = {
  sampleRate: 16000,
  numChannels: 1,
  bitDepth: 32,
  format: WavFormat.FLOAT,
} as const;

export const UINT8_MIDPOINT = 128;
export const UINT8_FLOAT_SCALE = 127.5;
export const INT16_FLOAT_SCALE = 32767;
export const INT24_FLOAT_SCALE = 8388607;
export const INT32_FLOAT_SCALE = 2147483647;
