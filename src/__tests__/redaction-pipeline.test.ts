import { AudioReadError } from '../errors/redaction.errors';
import { RedactionPipeline, type RedactionProgress } from '../services/redaction-pipeline.service';
import { FakeAudioIO, FakeDetector, FakeTranscriber, rampAudio, words } from './helpers/fakes';

describe('RedactionPipeline', () => {
  const sampleRate = 8000;
  const transcript = words(
    ['Call', 0.2, 0.5],
    ['me', 0.5, 0.7],
    ['at', 0.7, 0.9],
    ['555', 1.0, 1.6],
    ['1234.', 1.7, 2.4]
  );

  function createPipeline(audio: FakeAudioIO, detector: FakeDetector) {
    return new RedactionPipeline({
      audio,
      transcriber: new FakeTranscriber(transcript),
      detector,
      sampleRate,
      defaultFormat: 'mp3',
    });
  }

  it('should transcribe, detect, redact and encode a file', async () => {
    const audio = new FakeAudioIO(rampAudio(4, sampleRate));
    const detector = new FakeDetector(['555 1234']);
    const stages: RedactionProgress['stage'][] = [];

    const result = await createPipeline(audio, detector).redactFile(
      { inputPath: '/tmp/in/call.wav', outputPath: '/tmp/out/call.mp3' },
      (progress) => {
        stages.push(progress.stage);
      }
    );

    expect(detector.texts).toEqual(['Call me at 555 1234.']);
    expect(result.outputPath).toBe('/tmp/out/call.mp3');
    expect(result.phrases).toEqual(['555 1234']);
    expect(result.report.phrases[0]).toMatchObject({ phrase: '555 1234', matched: true, matchType: 'EXACT' });
    expect(result.audioInfo.sampleRate).toBe(sampleRate);
    expect(audio.encoded).toHaveLength(1);
    expect(audio.encoded[0].outputPath).toBe('/tmp/out/call.mp3');
    expect(audio.encoded[0].format).toBe('mp3');
    expect(audio.encoded[0].audio.channels[0].length).toBe(32000);
    expect(stages).toEqual(['probe', 'decode', 'transcribe', 'detect', 'redact', 'encode', 'completed']);
  });

  it('should use caller phrases instead of the detector', async () => {
    const audio = new FakeAudioIO(rampAudio(4, sampleRate));
    const detector = new FakeDetector(['ignored']);

    const result = await createPipeline(audio, detector).redactFile({
      inputPath: '/tmp/in/call.wav',
      outputPath: '/tmp/out/call.wav',
      phrases: [' 555 ', '555', ''],
      format: 'wav',
    });

    expect(detector.texts).toEqual([]);
    expect(result.phrases).toEqual(['555']);
    expect(result.report.appliedRanges).toHaveLength(1);
    expect(audio.encoded[0].format).toBe('wav');
  });

  it('should copy the source through when nothing is sensitive', async () => {
    const audio = new FakeAudioIO(rampAudio(4, sampleRate));
    const progress: RedactionProgress[] = [];

    const result = await createPipeline(audio, new FakeDetector([])).redactFile(
      { inputPath: '/tmp/in/call.wav', outputPath: '/tmp/out/call.mp3' },
      (p) => {
        progress.push(p);
      }
    );

    expect(result.report.appliedRanges).toEqual([]);
    expect(audio.encoded).toEqual([]);
    expect(audio.converted).toEqual([
      { inputPath: '/tmp/in/call.wav', outputPath: '/tmp/out/call.mp3', format: 'mp3' },
    ]);
    expect(progress[5]).toEqual({ stage: 'encode', progress: 85, message: 'Nothing to redact, copying source audio' });
  });

  it('should copy the source through when no phrase matches', async () => {
    const audio = new FakeAudioIO(rampAudio(4, sampleRate));

    const result = await createPipeline(audio, new FakeDetector(['banana'])).redactFile({
      inputPath: '/tmp/in/call.wav',
      outputPath: '/tmp/out/call.flac',
      format: 'flac',
    });

    expect(result.report.unmatchedCount).toBe(1);
    expect(audio.converted).toEqual([
      { inputPath: '/tmp/in/call.wav', outputPath: '/tmp/out/call.flac', format: 'flac' },
    ]);
  });

  it('should name the output beside the input by default', async () => {
    const audio = new FakeAudioIO(rampAudio(4, sampleRate));

    const result = await createPipeline(audio, new FakeDetector([])).redactFile({
      inputPath: '/tmp/in/call.wav',
    });

    expect(result.outputPath).toMatch(/^\/tmp\/in\/redacted_[0-9a-f-]{36}\.mp3$/);
  });

  it('should remove the partial output when encoding fails', async () => {
    const audio = new FakeAudioIO(rampAudio(4, sampleRate));
    audio.encodeError = new Error('disk full');

    await expect(
      createPipeline(audio, new FakeDetector(['555 1234'])).redactFile({
        inputPath: '/tmp/in/call.wav',
        outputPath: '/tmp/out/call.mp3',
      })
    ).rejects.toThrow('disk full');

    expect(audio.cleaned).toEqual(['/tmp/out/call.mp3']);
  });

  it('should not write anything when the audio is shorter than the transcript', async () => {
    const audio = new FakeAudioIO(rampAudio(1, sampleRate));

    await expect(
      createPipeline(audio, new FakeDetector(['555 1234'])).redactFile({
        inputPath: '/tmp/in/call.wav',
        outputPath: '/tmp/out/call.mp3',
      })
    ).rejects.toThrow(AudioReadError);

    expect(audio.encoded).toEqual([]);
    expect(audio.cleaned).toEqual([]);
  });
});
