import {
  CHUNK_HEADER_SIZE,
  DATA_CHUNK,
  FMT_CHUNK,
  FMT_CHUNK_BODY_SIZE,
  RIFF_HEADER_SIZE,
  RIFF_SIGNATURE,
  WAVE_SIGNATURE,
} from './constants';
import { isSupportedBitDepth, isSupportedFormat, isSupportedSampleRate, validateFormatFields } from './format-validation';
import { BufferSource } from './io/BufferSource';
import { createHeaderScanStateMachine } from './core/StateMachine';
import {
  HeaderScanState,
  type ByteSource,
  type ChunkInfo,
  type WavFormatDescriptor,
  type WavHeaderParserResult,
} from './types';

export const EMPTY_WAV_HEADER_RESULT: WavHeaderParserResult = {
  state: HeaderScanState.ERROR,
  format: null,
  dataOffset: 0,
  dataBytes: 0,
  totalFrames: 0,
  duration: 0,
  parsedChunks: [],
  unhandledChunks: [],
  warnings: [],
  errors: [],
};

function fourCC(bytes: Uint8Array, offset: number): string {
  return String.fromCharCode(...bytes.subarray(offset, offset + 4));
}

interface FmtChunkResult {
  format: Omit<WavFormatDescriptor, 'dataChunkSize'> | null;
  errors: string[];
  warnings: string[];
}

function parseFmtBody(body: Uint8Array): FmtChunkResult {
  const view = new DataView(body.buffer, body.byteOffset, body.byteLength);
  const audioFormat = view.getUint16(0, true);
  const numChannels = view.getUint16(2, true);
  const sampleRate = view.getUint32(4, true);
  // bytes 8-11 hold byteRate, which is derivable and not used
  const blockAlign = view.getUint16(12, true);
  const bitDepth = view.getUint16(14, true);

  const errors = validateFormatFields({ sampleRate, numChannels, bitDepth, format: audioFormat });
  const warnings: string[] = [];
  if (
    errors.length > 0 ||
    !isSupportedFormat(audioFormat) ||
    !isSupportedSampleRate(sampleRate) ||
    !isSupportedBitDepth(bitDepth)
  ) {
    return { format: null, errors, warnings };
  }

  const expectedBlockAlign = numChannels * (bitDepth / 8);
  if (blockAlign !== expectedBlockAlign) {
    warnings.push(`Declared block align (${blockAlign}) does not match ${numChannels} x ${bitDepth}-bit samples`);
  }

  return {
    format: { format: audioFormat, numChannels, sampleRate, bitDepth, blockAlign: expectedBlockAlign },
    errors,
    warnings,
  };
}

/**
 * Scans a RIFF/WAVE chunk stream for its `fmt ` and `data` chunks.
 *
 * Unknown chunks are skipped on word-aligned boundaries, before or between the
 * required ones. The scan stops as soon as both have been seen; the `data`
 * payload is never read, only located. Problems are reported in `errors`
 * (fatal, `format` is `null`) and `warnings` (the header is still usable).
 */
export function parseWavHeader(input: ByteSource | Uint8Array): WavHeaderParserResult {
  const source = input instanceof Uint8Array ? new BufferSource(input) : input;
  const errors: string[] = [];
  const warnings: string[] = [];
  const parsedChunks: ChunkInfo[] = [];
  const unhandledChunks: ChunkInfo[] = [];
  const machine = createHeaderScanStateMachine();

  const fail = (message: string): WavHeaderParserResult => {
    errors.push(message);
    machine.transition(HeaderScanState.ERROR);
    return { ...EMPTY_WAV_HEADER_RESULT, parsedChunks, unhandledChunks, warnings, errors };
  };

  let format: Omit<WavFormatDescriptor, 'dataChunkSize'> | null = null;
  let dataOffset = 0;
  let dataBytes = 0;

  try {
    const preamble = source.read(RIFF_HEADER_SIZE, 0);
    if (preamble.length < RIFF_HEADER_SIZE) {
      return fail(`File is too small to be a valid WAV (expected at least ${RIFF_HEADER_SIZE} bytes)`);
    }
    if (fourCC(preamble, 0) !== RIFF_SIGNATURE) {
      return fail('Missing "RIFF" signature at byte 0');
    }
    if (fourCC(preamble, 8) !== WAVE_SIGNATURE) {
      return fail('Missing "WAVE" signature at byte 8');
    }

    let offset = RIFF_HEADER_SIZE;
    while (machine.state !== HeaderScanState.DONE) {
      const head = source.read(CHUNK_HEADER_SIZE, offset);
      if (head.length < CHUNK_HEADER_SIZE) break;

      const id = fourCC(head, 0);
      const size = new DataView(head.buffer, head.byteOffset, head.byteLength).getUint32(4, true);
      const bodyOffset = offset + CHUNK_HEADER_SIZE;
      const paddedSize = size + (size & 1);
      parsedChunks.push({ id, offset, size });

      if (id === FMT_CHUNK) {
        if (size < FMT_CHUNK_BODY_SIZE) {
          return fail(`"fmt " chunk is too small (expected at least ${FMT_CHUNK_BODY_SIZE} bytes, got ${size})`);
        }
        const body = source.read(FMT_CHUNK_BODY_SIZE, bodyOffset);
        if (body.length < FMT_CHUNK_BODY_SIZE) {
          return fail(`Unexpected end of file in "fmt " chunk at byte ${offset}`);
        }
        const parsed = parseFmtBody(body);
        warnings.push(...parsed.warnings);
        if (parsed.format === null) {
          errors.push(...parsed.errors);
          machine.transition(HeaderScanState.ERROR);
          return { ...EMPTY_WAV_HEADER_RESULT, parsedChunks, unhandledChunks, warnings, errors };
        }
        if (format !== null) {
          warnings.push(`Duplicate "fmt " chunk at byte ${offset} replaces the earlier one`);
        }
        format = parsed.format;
        if (machine.state === HeaderScanState.HAVE_DATA) {
          machine.transition(HeaderScanState.DONE);
        } else if (machine.state === HeaderScanState.SCANNING) {
          machine.transition(HeaderScanState.HAVE_FMT);
        }
      } else if (id === DATA_CHUNK && machine.state !== HeaderScanState.HAVE_DATA) {
        dataOffset = bodyOffset;
        dataBytes = size;
        if (bodyOffset + size > source.size) {
          warnings.push(
            `Unexpected end of file in "data" chunk at byte ${offset}. ` +
              `Expected ${size} bytes, but only ${Math.max(0, source.size - bodyOffset)} available.`
          );
        }
        machine.transition(machine.state === HeaderScanState.HAVE_FMT ? HeaderScanState.DONE : HeaderScanState.HAVE_DATA);
      } else {
        if (id === DATA_CHUNK) {
          warnings.push(`Ignoring additional "data" chunk at byte ${offset}`);
        }
        unhandledChunks.push({ id, offset, size });
      }

      offset = bodyOffset + paddedSize;
    }
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return fail(`I/O error while reading header: ${reason}`);
  }

  if (format === null) errors.push('Missing required "fmt " chunk');
  if (machine.state !== HeaderScanState.DONE && machine.state !== HeaderScanState.HAVE_DATA) {
    errors.push('Missing required "data" chunk');
  }
  if (format === null || errors.length > 0) {
    machine.transition(HeaderScanState.ERROR);
    return { ...EMPTY_WAV_HEADER_RESULT, parsedChunks, unhandledChunks, warnings, errors };
  }

  const totalFrames = Math.floor(dataBytes / format.blockAlign);

  return {
    state: machine.state,
    format: { ...format, dataChunkSize: dataBytes },
    dataOffset,
    dataBytes,
    totalFrames,
    duration: totalFrames / format.sampleRate,
    parsedChunks,
    unhandledChunks,
    warnings,
    errors,
  };
}
