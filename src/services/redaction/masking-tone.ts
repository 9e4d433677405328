import type { MaskingToneOptions } from '../../types/redaction.types';

export const DEFAULT_TONE: MaskingToneOptions = {
  frequencyHz: 1000,
  amplitude: 0.5,
  fadeSeconds: 0.01,
};

/**
 * Sine masking tone of exactly `sampleCount` samples, phase zero at sample 0.
 * A linear fade in/out is applied only when the tone is longer than both
 * fades together; shorter tones stay at full amplitude.
 */
export function synthesizeMaskingTone(
  sampleCount: number,
  sampleRate: number,
  tone: MaskingToneOptions = DEFAULT_TONE
): Float32Array {
  const samples = new Float32Array(Math.max(0, sampleCount));
  const step = (2 * Math.PI * tone.frequencyHz) / sampleRate;
  const fadeSamples = Math.floor(tone.fadeSeconds * sampleRate);
  const applyFade = fadeSamples > 0 && samples.length > fadeSamples * 2;

  for (let n = 0; n < samples.length; n++) {
    let gain = tone.amplitude;
    if (applyFade) {
      if (n < fadeSamples) {
        gain *= n / fadeSamples;
      } else if (n >= samples.length - fadeSamples) {
        gain *= (samples.length - 1 - n) / fadeSamples;
      }
    }
    samples[n] = gain * Math.sin(step * n);
  }

  return samples;
}
