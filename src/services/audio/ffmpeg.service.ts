import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import { PassThrough, Readable } from 'stream';
import { logger } from '../../config/logger';
import { AudioReadError, errorMessage } from '../../errors/redaction.errors';
import type { AudioInfo, DecodeOptions, OutputFormat } from '../../types/audio.types';
import type { PcmAudio } from '../../types/redaction.types';

const BYTES_PER_SAMPLE = 4;
/** Largest shortfall against the probed duration a decode may have. */
const DECODE_DURATION_TOLERANCE_SECONDS = 0.5;

/** Decode/encode boundary between audio files and the engine's PCM model. */
export interface AudioIO {
  getAudioInfo(filePath: string): Promise<AudioInfo>;
  decodeToPcm(filePath: string, options?: DecodeOptions): Promise<PcmAudio>;
  encodePcm(audio: PcmAudio, outputPath: string, format: OutputFormat): Promise<string>;
  convertAudioFormat(inputPath: string, outputPath: string, format: OutputFormat): Promise<string>;
  cleanupFile(filePath: string): Promise<void>;
}

/** Interleave channels into float32 little-endian bytes (ffmpeg's f32le). */
export function interleave(audio: PcmAudio): Buffer {
  const channelCount = audio.channels.length;
  const frames = audio.channels[0]?.length ?? 0;
  const out = Buffer.alloc(frames * channelCount * BYTES_PER_SAMPLE);

  let offset = 0;
  for (let frame = 0; frame < frames; frame++) {
    for (let ch = 0; ch < channelCount; ch++) {
      out.writeFloatLE(audio.channels[ch][frame], offset);
      offset += BYTES_PER_SAMPLE;
    }
  }
  return out;
}

/** Split f32le bytes into one array per channel. A trailing partial frame is dropped. */
export function deinterleave(bytes: Buffer, channelCount: number, sampleRate: number): PcmAudio {
  if (channelCount < 1) {
    throw new AudioReadError(`Cannot deinterleave ${channelCount} channels`);
  }
  const frames = Math.floor(bytes.length / (BYTES_PER_SAMPLE * channelCount));
  const channels = Array.from({ length: channelCount }, () => new Float32Array(frames));

  let offset = 0;
  for (let frame = 0; frame < frames; frame++) {
    for (let ch = 0; ch < channelCount; ch++) {
      channels[ch][frame] = bytes.readFloatLE(offset);
      offset += BYTES_PER_SAMPLE;
    }
  }
  return { sampleRate, channels };
}

class FFmpegService implements AudioIO {
  /**
   * Get basic information about the first audio stream of a file
   */
  async getAudioInfo(filePath: string): Promise<AudioInfo> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (err, metadata) => {
        if (err) {
          reject(new AudioReadError(`Failed to probe ${filePath}: ${errorMessage(err)}`, { filePath }));
          return;
        }

        const stream = metadata.streams.find((s) => s.codec_type === 'audio');
        if (!stream) {
          reject(new AudioReadError(`No audio stream found in ${filePath}`, { filePath }));
          return;
        }

        const bitRate = Number(stream.bit_rate ?? metadata.format.bit_rate);
        resolve({
          duration: Number(stream.duration ?? metadata.format.duration ?? 0) || 0,
          sampleRate: Number(stream.sample_rate ?? 0),
          channels: Number(stream.channels ?? 0),
          format: stream.codec_name ?? 'unknown',
          bitRate: Number.isFinite(bitRate) && bitRate > 0 ? bitRate : null,
        });
      });
    });
  }

  /**
   * Decode any ffmpeg-readable file to float PCM
   */
  async decodeToPcm(filePath: string, options: DecodeOptions = {}): Promise<PcmAudio> {
    const info = await this.getAudioInfo(filePath);
    const sampleRate = options.sampleRate ?? info.sampleRate;
    const channelCount = options.channels ?? info.channels;
    if (sampleRate <= 0 || channelCount <= 0) {
      throw new AudioReadError(`Cannot decode ${filePath}: unknown sample rate or channel layout`, {
        sampleRate,
        channelCount,
      });
    }

    logger.info('Decoding audio to PCM', { filePath, sampleRate, channels: channelCount });

    const bytes = await new Promise<Buffer>((resolve, reject) => {
      const chunks: Buffer[] = [];
      const output = new PassThrough();
      let streamEnded = false;
      let commandEnded = false;
      let settled = false;

      // stdout can reach EOF before ffmpeg exits with an error; only the
      // command's own 'end' means the decode succeeded
      const finish = () => {
        if (settled || !streamEnded || !commandEnded) return;
        settled = true;
        resolve(Buffer.concat(chunks));
      };
      const fail = (err: unknown) => {
        if (settled) return;
        settled = true;
        const msg = errorMessage(err);
        logger.error('FFmpeg decode error:', msg);
        reject(new AudioReadError(`Failed to decode ${filePath}: ${msg}`, { filePath }));
      };

      output.on('data', (chunk: Buffer) => chunks.push(chunk));
      output.on('end', () => {
        streamEnded = true;
        finish();
      });
      output.on('error', fail);

      ffmpeg(filePath)
        .noVideo()
        .audioCodec('pcm_f32le')
        .audioFrequency(sampleRate)
        .audioChannels(channelCount)
        .format('f32le')
        .on('end', () => {
          commandEnded = true;
          finish();
        })
        .on('error', fail)
        .pipe(output, { end: true });
    });

    const audio = deinterleave(bytes, channelCount, sampleRate);
    const decodedDuration = audio.channels[0].length / sampleRate;
    if (info.duration > 0 && info.duration - decodedDuration > DECODE_DURATION_TOLERANCE_SECONDS) {
      throw new AudioReadError(
        `Decoded ${decodedDuration.toFixed(3)}s of ${filePath} but the file reports ${info.duration.toFixed(3)}s`,
        { filePath, decodedDuration, duration: info.duration }
      );
    }

    logger.info('Audio decoded', {
      filePath,
      samples: audio.channels[0].length,
      duration: Number(decodedDuration.toFixed(3)),
    });
    return audio;
  }

  /**
   * Encode float PCM to a file. wav is written as 16-bit PCM.
   */
  async encodePcm(audio: PcmAudio, outputPath: string, format: OutputFormat): Promise<string> {
    const input = Readable.from([interleave(audio)]);

    return new Promise((resolve, reject) => {
      const command = ffmpeg(input)
        .inputFormat('f32le')
        .inputOptions(['-ar', String(audio.sampleRate), '-ac', String(audio.channels.length)]);

      this.setOutputOptions(command, format);

      command
        .output(outputPath)
        .on('end', () => {
          logger.info('Audio encode completed:', outputPath);
          resolve(outputPath);
        })
        .on('error', (err: unknown) => {
          const msg = errorMessage(err);
          logger.error('FFmpeg encode error:', msg);
          reject(new Error(`Failed to encode audio: ${msg}`));
        })
        .run();
    });
  }

  /**
   * Convert an audio file to a different format
   */
  async convertAudioFormat(inputPath: string, outputPath: string, format: OutputFormat): Promise<string> {
    return new Promise((resolve, reject) => {
      const command = ffmpeg(inputPath);
      this.setOutputOptions(command, format);

      command
        .output(outputPath)
        .on('end', () => {
          logger.info('Audio conversion completed:', outputPath);
          resolve(outputPath);
        })
        .on('error', (err: unknown) => {
          const msg = errorMessage(err);
          logger.error('FFmpeg conversion error:', msg);
          reject(new Error(`Failed to convert audio: ${msg}`));
        })
        .run();
    });
  }

  private setOutputOptions(command: ffmpeg.FfmpegCommand, format: OutputFormat): void {
    switch (format) {
      case 'wav':
        command.audioCodec('pcm_s16le').format('wav');
        break;
      case 'flac':
        command.audioCodec('flac').format('flac');
        break;
      case 'mp3':
      default:
        command.audioCodec('libmp3lame').audioBitrate('192k').format('mp3');
    }
  }

  /**
   * Remove a temporary or partial file if it exists
   */
  async cleanupFile(filePath: string): Promise<void> {
    if (!fs.existsSync(filePath)) return;
    await fs.promises.unlink(filePath);
    logger.info('Cleaned up file:', filePath);
  }
}

export { FFmpegService };
export default new FFmpegService();
