import { logger } from '../../config/logger';
import { AudioReadError } from '../../errors/redaction.errors';
import type { MaskingToneOptions, PcmAudio, TimeRange } from '../../types/redaction.types';
import { DEFAULT_TONE, synthesizeMaskingTone } from './masking-tone';

export interface SampleSpan {
  /** First replaced sample */
  from: number;
  /** One past the last replaced sample */
  to: number;
}

/** Length in seconds as declared by the buffer itself. */
export function pcmDuration(audio: PcmAudio): number {
  const length = audio.channels[0]?.length ?? 0;
  return audio.sampleRate > 0 ? length / audio.sampleRate : 0;
}

export function assertPcmShape(audio: PcmAudio): void {
  if (!Number.isFinite(audio.sampleRate) || audio.sampleRate <= 0) {
    throw new AudioReadError(`Invalid sample rate: ${audio.sampleRate}`);
  }
  if (audio.channels.length === 0) {
    throw new AudioReadError('Audio buffer has no channels');
  }
  const length = audio.channels[0].length;
  if (audio.channels.some((channel) => channel.length !== length)) {
    throw new AudioReadError('Audio channels have different lengths', {
      lengths: audio.channels.map((channel) => channel.length),
    });
  }
}

/**
 * Sample indices covered by a range: start rounds down and end rounds up so
 * the whole utterance is inside the span.
 */
export function toSampleSpan(range: TimeRange, sampleRate: number, length: number): SampleSpan {
  const from = Math.max(0, Math.floor(range.start * sampleRate));
  const to = Math.min(length, Math.ceil(range.end * sampleRate));
  return { from, to: Math.max(from, to) };
}

/**
 * Copy of `audio` with every sample inside `ranges` replaced by the masking
 * tone on all channels. Length, channel count and sample rate are unchanged.
 *
 * All ranges are validated before the first sample is written: a buffer that
 * ends before the last range fails with AudioReadError.
 */
export function redactPcm(
  audio: PcmAudio,
  ranges: ReadonlyArray<TimeRange>,
  tone: MaskingToneOptions = DEFAULT_TONE
): PcmAudio {
  assertPcmShape(audio);

  const duration = pcmDuration(audio);
  const maxEnd = ranges.reduce((max, r) => Math.max(max, r.end), 0);
  if (maxEnd > duration) {
    throw new AudioReadError(
      `Audio is ${duration.toFixed(3)}s long but redaction needs ${maxEnd.toFixed(3)}s`,
      { duration, requiredDuration: maxEnd }
    );
  }

  const { sampleRate } = audio;
  const length = audio.channels[0].length;
  const spans = ranges.map((r) => toSampleSpan(r, sampleRate, length));
  const channels = audio.channels.map((channel) => Float32Array.from(channel));

  let replaced = 0;
  for (const span of spans) {
    const count = span.to - span.from;
    if (count === 0) continue;
    const toneSamples = synthesizeMaskingTone(count, sampleRate, tone);
    for (const channel of channels) {
      channel.set(toneSamples, span.from);
    }
    replaced += count;
  }

  logger.debug('PCM redaction applied', {
    ranges: ranges.length,
    replacedSamples: replaced,
    totalSamples: length,
    channels: channels.length,
  });

  return { sampleRate, channels };
}
