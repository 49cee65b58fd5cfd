import { FileSource } from './io/FileSource';
import { EMPTY_WAV_HEADER_RESULT, parseWavHeader } from './parseWavHeader';
import { WavReader } from './WavReader';
import { WavWriter } from './WavWriter';
import type { WavHeaderParserResult, WavWriterOptions } from './types';

/**
 * Creates a writer, hands it to `fn` and closes it afterwards, whether `fn` returns or throws.
 * @returns What `fn` returned, or `null` if the writer could not be created.
 */
export function withWavWriter<R>(options: WavWriterOptions, fn: (writer: WavWriter) => R): R | null {
  const writer = WavWriter.create(options);
  if (writer === null) return null;
  try {
    return fn(writer);
  } finally {
    writer.close();
  }
}

/**
 * Opens a reader, hands it to `fn` and closes it afterwards, whether `fn` returns or throws.
 * @returns What `fn` returned, or `null` if the file could not be opened as WAV.
 */
export function withWavReader<R>(filename: string, fn: (reader: WavReader) => R): R | null {
  const reader = WavReader.create(filename);
  if (reader === null) return null;
  try {
    return fn(reader);
  } finally {
    reader.close();
  }
}

/**
 * Parses the header of a file without keeping it open, reporting why it is rejected if it is.
 */
export function inspectWavFile(filename: string): WavHeaderParserResult {
  let source: FileSource;
  try {
    source = new FileSource(filename);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return {
      ...EMPTY_WAV_HEADER_RESULT,
      parsedChunks: [],
      unhandledChunks: [],
      warnings: [],
      errors: [`Cannot open ${filename}: ${reason}`],
    };
  }
  try {
    return parseWavHeader(source);
  } finally {
    source.close();
  }
}
