export * from './types';
export * from './constants';
export {
  VALID_BIT_DEPTHS,
  createConfiguration,
  isSupportedBitDepth,
  isSupportedFormat,
  isSupportedSampleRate,
  numSamples,
  validateConfiguration,
  validateFormatFields,
  type FormatFields,
} from './format-validation';
export * from './converters';
export { SAMPLE_LAYOUTS, bytesPerFrame, type SampleLayout } from './sample-layouts';
export { assertChannelBuffers, deinterleave, interleave } from './interleave';
export { createWavHeader, finalizeWavHeader } from './writeWavHeader';
export { EMPTY_WAV_HEADER_RESULT, parseWavHeader } from './parseWavHeader';
export { BufferSource } from './io/BufferSource';
export { FileSink } from './io/FileSink';
export { FileSource } from './io/FileSource';
export { WavReader } from './WavReader';
export { WavWriter } from './WavWriter';
export { inspectWavFile, withWavReader, withWavWriter } from './scoped';
export { describeConfiguration } from './utils';
