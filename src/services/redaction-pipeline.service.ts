import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';
import type { OutputFormat } from '../config/redaction.config';
import { errorMessage } from '../errors/redaction.errors';
import type { AudioInfo } from '../types/audio.types';
import type { EngineOptions, RedactionReport } from '../types/redaction.types';
import type { AudioIO } from './audio/ffmpeg.service';
import type { SensitiveContentDetector } from './detection/detector.interface';
import { StaticPhraseDetector } from './detection/static-phrase.detector';
import { RedactionEngine } from './redaction/redaction-engine.service';
import { WordTimeline } from './redaction/word-timeline';
import type { Transcriber } from './transcription/transcriber.interface';

export interface RedactFileInput {
  inputPath: string;
  /** Defaults to `redacted_<uuid>.<format>` beside the input */
  outputPath?: string;
  /** When given, these phrases replace the configured detector */
  phrases?: string[];
  format?: OutputFormat;
}

export interface RedactFileResult {
  outputPath: string;
  report: RedactionReport;
  audioInfo: AudioInfo;
  phrases: string[];
}

export interface RedactionProgress {
  stage: 'probe' | 'decode' | 'transcribe' | 'detect' | 'redact' | 'encode' | 'completed';
  progress: number;
  message: string;
}

export interface RedactionPipelineDeps {
  audio: AudioIO;
  transcriber: Transcriber;
  detector: SensitiveContentDetector;
  engineOptions?: Partial<EngineOptions>;
  /** Decode rate for the engine's PCM buffer */
  sampleRate: number;
  defaultFormat: OutputFormat;
}

/**
 * File-level redaction: probe → decode → transcribe → detect → redact → encode.
 * When no range applies, the source is converted to the output format as is.
 * Any failure removes the partial output and rethrows; the original audio is
 * never handed back in place of the redacted file.
 */
export class RedactionPipeline {
  private readonly engine: RedactionEngine;

  constructor(private readonly deps: RedactionPipelineDeps) {
    this.engine = new RedactionEngine(deps.engineOptions);
  }

  async redactFile(
    input: RedactFileInput,
    onProgress?: (progress: RedactionProgress) => void | Promise<void>
  ): Promise<RedactFileResult> {
    const { audio, transcriber, detector } = this.deps;
    const format = input.format ?? this.deps.defaultFormat;
    const outputPath =
      input.outputPath ?? path.join(path.dirname(input.inputPath), `redacted_${uuidv4()}.${format}`);

    const report = async (stage: RedactionProgress['stage'], progress: number, message: string) => {
      if (onProgress) await onProgress({ stage, progress, message });
    };

    logger.info('Starting file redaction', { inputPath: input.inputPath, outputPath, format });

    let outputStarted = false;
    try {
      await report('probe', 5, 'Reading audio info');
      const audioInfo = await audio.getAudioInfo(input.inputPath);

      await report('decode', 15, 'Decoding audio');
      const pcm = await audio.decodeToPcm(input.inputPath, { sampleRate: this.deps.sampleRate });

      await report('transcribe', 30, `Transcribing with ${transcriber.provider}`);
      const words = await transcriber.transcribe(input.inputPath);

      const activeDetector: SensitiveContentDetector = input.phrases
        ? new StaticPhraseDetector(input.phrases)
        : detector;
      await report('detect', 60, `Detecting sensitive content with ${activeDetector.provider}`);
      const transcriptText = WordTimeline.fromTranscript(words, this.engine.timelineOptions).text;
      const phrases = await activeDetector.detect(transcriptText);

      await report('redact', 75, `Redacting ${phrases.length} phrase(s)`);
      const result = this.engine.redact({ words, phrases, audio: pcm });

      outputStarted = true;
      if (result.report.appliedRanges.length === 0) {
        await report('encode', 85, 'Nothing to redact, copying source audio');
        await audio.convertAudioFormat(input.inputPath, outputPath, format);
      } else {
        await report('encode', 85, 'Encoding redacted audio');
        await audio.encodePcm(result.redactedAudio, outputPath, format);
      }

      await report('completed', 100, 'Redaction complete');
      logger.info('File redaction complete', {
        outputPath,
        ranges: result.report.appliedRanges.length,
        unmatched: result.report.unmatchedCount,
      });

      return { outputPath, report: result.report, audioInfo, phrases };
    } catch (error) {
      logger.error('File redaction failed', {
        inputPath: input.inputPath,
        error: errorMessage(error),
      });
      if (outputStarted) {
        await audio.cleanupFile(outputPath).catch((cleanupError: unknown) => {
          logger.error('Failed to remove partial output', {
            outputPath,
            error: errorMessage(cleanupError),
          });
        });
      }
      throw error;
    }
  }
}
