import axios from 'axios';
import fs from 'fs';
import { ProviderError } from '../errors/redaction.errors';
import { OpenAITranscriber } from '../services/transcription/openai-transcriber';
import { axiosError, axiosResponse } from './helpers/axios';

describe('OpenAITranscriber', () => {
  const transcriber = new OpenAITranscriber({ apiKey: 'test-secret', language: 'en' });

  beforeEach(() => {
    jest.spyOn(fs, 'openAsBlob').mockResolvedValue(new Blob(['RIFF']));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return word timestamps from a verbose transcription', async () => {
    const post = jest.spyOn(axios, 'post').mockResolvedValue(
      axiosResponse({
        text: 'my secret',
        duration: 1.2,
        words: [
          { word: 'my', start: 0.1, end: 0.3 },
          { word: 'secret', start: 0.4, end: 1.0 },
        ],
      })
    );

    await expect(transcriber.transcribe('/tmp/in/call.wav')).resolves.toEqual([
      { word: 'my', start: 0.1, end: 0.3 },
      { word: 'secret', start: 0.4, end: 1.0 },
    ]);

    expect(post).toHaveBeenCalledTimes(1);
    expect(post.mock.calls[0][0]).toBe('https://api.openai.com/v1/audio/transcriptions');
    const form = post.mock.calls[0][1];
    expect(form).toBeInstanceOf(FormData);
    if (form instanceof FormData) {
      expect(form.get('model')).toBe('whisper-1');
      expect(form.get('response_format')).toBe('verbose_json');
      expect(form.get('timestamp_granularities[]')).toBe('word');
      expect(form.get('language')).toBe('en');
    }
  });

  it('should treat a response without words as an empty transcript', async () => {
    jest.spyOn(axios, 'post').mockResolvedValue(axiosResponse({ text: '' }));
    await expect(transcriber.transcribe('/tmp/in/silence.wav')).resolves.toEqual([]);
  });

  it('should reject malformed word entries', async () => {
    jest.spyOn(axios, 'post').mockResolvedValue(axiosResponse({ words: [{ word: 'x', start: 'soon' }] }));
    await expect(transcriber.transcribe('/tmp/in/call.wav')).rejects.toThrow(ProviderError);
  });

  it('should map server errors to a provider error', async () => {
    jest.spyOn(axios, 'post').mockRejectedValue(axiosError(503));
    await expect(transcriber.transcribe('/tmp/in/call.wav')).rejects.toThrow(
      'OpenAI service error. Please try again later.'
    );
  });

  it('should require an API key', async () => {
    const unconfigured = new OpenAITranscriber({ apiKey: '' });
    await expect(unconfigured.transcribe('/tmp/in/call.wav')).rejects.toThrow(ProviderError);
  });
});
