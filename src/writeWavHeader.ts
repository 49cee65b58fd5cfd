import {
  DATA_CHUNK,
  DATA_SIZE_OFFSET,
  FMT_CHUNK,
  FMT_CHUNK_BODY_SIZE,
  RIFF_SIGNATURE,
  RIFF_SIZE_BASE,
  RIFF_SIZE_OFFSET,
  WAV_HEADER_SIZE,
  WAVE_SIGNATURE,
} from './constants';
import type { ByteSink, WavFormatDescriptor } from './types';

function writeFourCC(buffer: Uint8Array, offset: number, id: string): void {
  for (let i = 0; i < 4; i++) buffer[offset + i] = id.charCodeAt(i);
}

function encodeUint32(value: number): Uint8Array {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setUint32(0, value, true);
  return bytes;
}

/**
 * Builds the canonical 44-byte header for a new file. Both size fields are left
 * at zero until {@link finalizeWavHeader} patches them.
 */
export function createWavHeader(descriptor: Omit<WavFormatDescriptor, 'dataChunkSize'>): Uint8Array {
  const { sampleRate, numChannels, bitDepth, format } = descriptor;
  const bytesPerSample = bitDepth / 8;
  const header = new Uint8Array(WAV_HEADER_SIZE);
  const view = new DataView(header.buffer);

  writeFourCC(header, 0, RIFF_SIGNATURE);
  view.setUint32(RIFF_SIZE_OFFSET, 0, true);
  writeFourCC(header, 8, WAVE_SIGNATURE);
  writeFourCC(header, 12, FMT_CHUNK);
  view.setUint32(16, FMT_CHUNK_BODY_SIZE, true);
  view.setUint16(20, format, true);
  view.setUint16(22, numChannels, true);
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, sampleRate * numChannels * bytesPerSample, true);
  view.setUint16(32, numChannels * bytesPerSample, true);
  view.setUint16(34, bitDepth, true);
  writeFourCC(header, 36, DATA_CHUNK);
  view.setUint32(DATA_SIZE_OFFSET, 0, true);

  return header;
}

/**
 * Overwrites the RIFF and `data` size fields once all samples are written.
 * `dataBytes` counts the bytes actually stored, which for 24-bit audio is the packed size.
 */
export function finalizeWavHeader(sink: ByteSink, dataBytes: number): void {
  sink.writeAt(encodeUint32(RIFF_SIZE_BASE + dataBytes), RIFF_SIZE_OFFSET);
  sink.writeAt(encodeUint32(dataBytes), DATA_SIZE_OFFSET);
}
