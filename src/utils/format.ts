import { numSamples } from '../format-validation';
import { WavFormatNames, type WavFileConfiguration } from '../types';

/**
 * Renders a configuration as a single human-readable line, e.g.
 * `tone.wav: 2 ch, 44100 Hz, 16-bit PCM, 44100 samples`.
 */
export function describeConfiguration(config: WavFileConfiguration): string {
  const formatName = WavFormatNames[config.format];
  return (
    `${config.filename}: ${config.numChannels} ch, ${config.sampleRate} Hz, ` +
    `${config.bitDepth}-bit ${formatName}, ${numSamples(config)} samples`
  );
}

