export * from './types/redaction.types';
export * from './types/audio.types';
export * from './errors/redaction.errors';
export { getRedactionConfig, OUTPUT_FORMATS } from './config/redaction.config';
export type { RedactionConfig } from './config/redaction.config';
export { WordTimeline, DEFAULT_TIMELINE_OPTIONS } from './services/redaction/word-timeline';
export { PhraseMatcher, DEFAULT_MATCHER_OPTIONS, classifyWindow, similarity } from './services/redaction/phrase-matcher.service';
export { mergeRanges, isDisjointSorted, totalCoverage } from './services/redaction/range-merger.service';
export { redactPcm, toSampleSpan, pcmDuration } from './services/redaction/audio-redactor.service';
export { synthesizeMaskingTone, DEFAULT_TONE } from './services/redaction/masking-tone';
export { RedactionEngine, DEFAULT_ENGINE_OPTIONS } from './services/redaction/redaction-engine.service';
export { RedactionPipeline } from './services/redaction-pipeline.service';
export type { RedactFileInput, RedactFileResult, RedactionProgress } from './services/redaction-pipeline.service';
export { default as ffmpegService, FFmpegService, interleave, deinterleave } from './services/audio/ffmpeg.service';
export type { AudioIO } from './services/audio/ffmpeg.service';
export type { Transcriber } from './services/transcription/transcriber.interface';
export { OpenAITranscriber } from './services/transcription/openai-transcriber';
export type { SensitiveContentDetector } from './services/detection/detector.interface';
export { OpenAISensitiveContentDetector } from './services/detection/openai-detector';
export { StaticPhraseDetector } from './services/detection/static-phrase.detector';
export { createRedactionProcessor } from './jobs/redaction.processor';
export type { RedactionJobData, RedactionJobResult } from './jobs/redaction.processor';
