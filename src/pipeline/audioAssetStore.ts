import { randomUUID } from 'node:crypto';
import { PipelineError } from '../lib/pipelineErrors.js';
import { ACCEPTED_AUDIO_FORMATS } from '../repositories/contracts.js';
import type { AudioAsset, AudioAssetsRepository, AudioFormat } from '../repositories/contracts.js';

const MIME_TYPES: Record<AudioFormat, string> = {
  wav: 'audio/wav',
  mp3: 'audio/mpeg',
  webm: 'audio/webm',
  ogg: 'audio/ogg',
  m4a: 'audio/mp4'
};

export function normalizeAudioFormat(declaredFormat: string): AudioFormat | null {
  const normalized = declaredFormat.trim().toLowerCase().replace(/^\./, '');
  return ACCEPTED_AUDIO_FORMATS.find((format) => format === normalized) ?? null;
}

export function mimeTypeForFormat(format: AudioFormat): string {
  return MIME_TYPES[format];
}

export interface AudioAssetStore {
  store(content: Buffer, declaredFormat: string): Promise<AudioAsset>;
  retrieve(assetId: string): Promise<AudioAsset>;
  readContent(assetId: string): Promise<Buffer>;
}

export function createAudioAssetStore(
  repository: AudioAssetsRepository,
  options: { maxBytes: number }
): AudioAssetStore {
  return {
    async store(content, declaredFormat) {
      const format = normalizeAudioFormat(declaredFormat);
      if (!format) {
        throw new PipelineError(
          'UNSUPPORTED_FORMAT',
          `unsupported audio format "${declaredFormat}"; accepted: ${ACCEPTED_AUDIO_FORMATS.join(', ')}`
        );
      }

      if (content.length === 0) {
        throw new PipelineError('AUDIO_CONTENT_REQUIRED', 'audio content is empty');
      }

      if (content.length > options.maxBytes) {
        throw new PipelineError(
          'AUDIO_TOO_LARGE',
          `audio is ${content.length} bytes; the limit is ${options.maxBytes} bytes`
        );
      }

      return repository.insert(
        {
          assetId: randomUUID(),
          format,
          mimeType: mimeTypeForFormat(format),
          sizeBytes: content.length,
          durationMs: null
        },
        content
      );
    },

    async retrieve(assetId) {
      const asset = await repository.getById(assetId);
      if (!asset) {
        throw new PipelineError('AUDIO_ASSET_NOT_FOUND', `audio asset not found: ${assetId}`);
      }
      return asset;
    },

    async readContent(assetId) {
      const content = await repository.readContent(assetId);
      if (!content) {
        throw new PipelineError('AUDIO_ASSET_NOT_FOUND', `audio asset not found: ${assetId}`);
      }
      return content;
    }
  };
}
