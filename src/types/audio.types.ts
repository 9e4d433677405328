import type { OutputFormat } from '../config/redaction.config';

/** Basic stream info from ffprobe. */
export interface AudioInfo {
  /** Duration in seconds */
  duration: number;
  sampleRate: number;
  channels: number;
  /** Codec name, e.g. "mp3", "pcm_s16le" */
  format: string;
  /** Bits per second, when the container reports it */
  bitRate: number | null;
}

export interface DecodeOptions {
  /** Resample to this rate (Hz). Defaults to the source rate. */
  sampleRate?: number;
  /** Downmix/upmix to this many channels. Defaults to the source layout. */
  channels?: number;
}

export type { OutputFormat };
