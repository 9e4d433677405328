import type { AudioIO } from '../../services/audio/ffmpeg.service';
import type { SensitiveContentDetector } from '../../services/detection/detector.interface';
import type { Transcriber } from '../../services/transcription/transcriber.interface';
import type { AudioInfo, OutputFormat } from '../../types/audio.types';
import type { PcmAudio, TranscribedWord } from '../../types/redaction.types';

/** Mono buffer filled with a repeating ramp, easy to tell apart from a sine tone. */
export function rampAudio(seconds: number, sampleRate: number, channelCount = 1): PcmAudio {
  const length = Math.round(seconds * sampleRate);
  const channels = Array.from({ length: channelCount }, (_, ch) => {
    const data = new Float32Array(length);
    for (let i = 0; i < length; i++) {
      data[i] = ((i + ch * 7) % 50 - 25) / 100;
    }
    return data;
  });
  return { sampleRate, channels };
}

export function words(...entries: Array<[string, number, number]>): TranscribedWord[] {
  return entries.map(([word, start, end]) => ({ word, start, end }));
}

export class FakeAudioIO implements AudioIO {
  encoded: Array<{ audio: PcmAudio; outputPath: string; format: OutputFormat }> = [];
  converted: Array<{ inputPath: string; outputPath: string; format: OutputFormat }> = [];
  cleaned: string[] = [];
  encodeError: Error | null = null;

  constructor(private readonly pcm: PcmAudio, private readonly info?: Partial<AudioInfo>) {}

  async getAudioInfo(): Promise<AudioInfo> {
    const length = this.pcm.channels[0]?.length ?? 0;
    return {
      duration: length / this.pcm.sampleRate,
      sampleRate: this.pcm.sampleRate,
      channels: this.pcm.channels.length,
      format: 'pcm_s16le',
      bitRate: null,
      ...this.info,
    };
  }

  async decodeToPcm(): Promise<PcmAudio> {
    return this.pcm;
  }

  async encodePcm(audio: PcmAudio, outputPath: string, format: OutputFormat): Promise<string> {
    if (this.encodeError) throw this.encodeError;
    this.encoded.push({ audio, outputPath, format });
    return outputPath;
  }

  async convertAudioFormat(inputPath: string, outputPath: string, format: OutputFormat): Promise<string> {
    if (this.encodeError) throw this.encodeError;
    this.converted.push({ inputPath, outputPath, format });
    return outputPath;
  }

  async cleanupFile(filePath: string): Promise<void> {
    this.cleaned.push(filePath);
  }
}

export class FakeTranscriber implements Transcriber {
  readonly provider = 'fake-stt';
  calls: string[] = [];

  constructor(private readonly result: TranscribedWord[]) {}

  async transcribe(audioPath: string): Promise<TranscribedWord[]> {
    this.calls.push(audioPath);
    return this.result;
  }
}

export class FakeDetector implements SensitiveContentDetector {
  readonly provider = 'fake-detector';
  texts: string[] = [];

  constructor(private readonly phrases: string[]) {}

  async detect(text: string): Promise<string[]> {
    this.texts.push(text);
    return this.phrases;
  }
}
