import { describe, it, expect } from 'vitest';
import { loadPipelineConfig, parsePipelineConfig } from '../pipeline-config.js';
import { ConfigError } from '../../sdk/errors.js';

describe('parsePipelineConfig', () => {
  it('fills every section with defaults', () => {
    const config = parsePipelineConfig();

    expect(config.chunking.chunkSize).toBe(1000);
    expect(config.chunking.minChunkSize).toBe(200);
    expect(config.chunking.separators[0]).toBe('\n\n');
    expect(config.classifier.maxVisualElements).toBe(9);
    expect(config.classifier.landscapeRatio).toBe(1.2);
    expect(config.classifier.presentationProducers).toEqual(['PowerPoint', 'Keynote', 'Impress']);
    expect(config.retry).toEqual({ maxRetries: 3, backoff: 'exponential', baseDelayMs: 500, maxDelayMs: 10_000, jitter: 0.1 });
    expect(config.concurrency).toEqual({ workers: 8, unitTimeoutMs: 120_000 });
    expect(config.models.captionModel).toBe('gpt-4o-mini');
    expect(config.models.embeddingModel).toBe('text-embedding-3-small');
    expect(config.logLevel).toBe('info');
    expect(config.extraction).toEqual({ minImageDimension: 1 });
    expect(config.documentSummary.enabled).toBe(true);
    expect(config.documentSummary.maxInputChars).toBe(12_000);
  });

  it('keeps explicit values and defaults the rest of a section', () => {
    const config = parsePipelineConfig({ chunking: { chunkSize: 400 } });
    expect(config.chunking.chunkSize).toBe(400);
    expect(config.chunking.minChunkSize).toBe(200);
  });

  it('throws ConfigError naming the invalid field', () => {
    expect(() => parsePipelineConfig({ classifier: { maxImageAreaRatio: 2 } })).toThrow(ConfigError);
    try {
      parsePipelineConfig({ concurrency: { workers: 0 } });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError ? error.field : undefined).toBe('concurrency.workers');
    }
  });

  it('rejects a minimum chunk size above the chunk size', () => {
    expect(() => parsePipelineConfig({ chunking: { chunkSize: 100, minChunkSize: 150 } })).toThrow(
      'minChunkSize must not exceed chunkSize',
    );
    // the default minimum (200) applies when only the size is lowered
    expect(() => parsePipelineConfig({ chunking: { chunkSize: 100 } })).toThrow(
      'Invalid "chunking.minChunkSize": minChunkSize must not exceed chunkSize',
    );
  });
});

describe('loadPipelineConfig', () => {
  it('reads PAGEFOLD_* variables and provider keys', () => {
    const config = loadPipelineConfig({
      PAGEFOLD_CHUNK_SIZE: '1500',
      PAGEFOLD_WORKERS: '4',
      PAGEFOLD_MAX_RETRIES: '0',
      PAGEFOLD_PRESENTATION_PRODUCERS: 'PowerPoint, Slides ,',
      PAGEFOLD_EMBEDDING_DIMENSIONS: '256',
      PAGEFOLD_LOG_LEVEL: 'DEBUG',
      OPENAI_API_KEY: 'test-secret',
    });

    expect(config.chunking.chunkSize).toBe(1500);
    expect(config.concurrency.workers).toBe(4);
    expect(config.retry.maxRetries).toBe(0);
    expect(config.classifier.presentationProducers).toEqual(['PowerPoint', 'Slides']);
    expect(config.models.dimensions).toBe(256);
    expect(config.models.apiKey).toBe('test-secret');
    expect(config.logLevel).toBe('debug');
  });

  it('reads the image filter threshold and the document summary switch', () => {
    const config = loadPipelineConfig(
      { PAGEFOLD_MIN_IMAGE_DIMENSION: '4', PAGEFOLD_DOCUMENT_SUMMARY: 'Off' },
      { documentSummary: { maxInputChars: 500 } },
    );

    expect(config.extraction.minImageDimension).toBe(4);
    expect(config.documentSummary.enabled).toBe(false);
    expect(config.documentSummary.maxInputChars).toBe(500);
  });

  it('rejects an unrecognised document summary switch', () => {
    expect(() => loadPipelineConfig({ PAGEFOLD_DOCUMENT_SUMMARY: 'maybe' })).toThrow(
      'Invalid "PAGEFOLD_DOCUMENT_SUMMARY": expected a boolean, got "maybe"',
    );
  });

  it('layers environment variables over overrides', () => {
    const config = loadPipelineConfig(
      { PAGEFOLD_CHUNK_SIZE: '800' },
      { chunking: { chunkSize: 300, minChunkSize: 50 }, logLevel: 'warn' },
    );

    expect(config.chunking.chunkSize).toBe(800);
    expect(config.chunking.minChunkSize).toBe(50);
    expect(config.logLevel).toBe('warn');
  });

  it('ignores empty variables', () => {
    const config = loadPipelineConfig({ PAGEFOLD_CHUNK_SIZE: '  ', OPENAI_API_KEY: '' });
    expect(config.chunking.chunkSize).toBe(1000);
    expect(config.models.apiKey).toBeUndefined();
  });

  it('rejects non-numeric values', () => {
    expect(() => loadPipelineConfig({ PAGEFOLD_WORKERS: 'many' })).toThrow(
      'Invalid "PAGEFOLD_WORKERS": expected a number, got "many"',
    );
  });

  it('rejects values the schema refuses', () => {
    expect(() => loadPipelineConfig({ PAGEFOLD_WORKERS: '2.5' })).toThrow(ConfigError);
  });

  it('rejects unknown log levels', () => {
    expect(() => loadPipelineConfig({ PAGEFOLD_LOG_LEVEL: 'loud' })).toThrow(
      'Invalid "PAGEFOLD_LOG_LEVEL": unknown log level "loud"',
    );
  });
});
