/**
 * Release manifest client
 * 서명 검증이 끝난 바이트만 JSON으로 파싱한다
 */

import type { PrecompiledConfig } from '../config';
import type { Logger } from '../../utils/logger';
import { createSilentLogger } from '../../utils/logger';
import type { CacheStore } from './cache-store';
import { ManifestFormatError, ManifestSignatureError } from './errors';
import type { Manifest, PlatformEntry } from './types';
import { fetchSignedFile } from './verified-fetch';

/** 매니페스트 파일명 */
export const MANIFEST_FILE_NAME = 'binforge-manifest.json';

export interface ManifestClientOptions {
  config: PrecompiledConfig;
  store: CacheStore;
  logger?: Logger;
  signal?: AbortSignal;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 문자열 목록 파싱 (없으면 빈 배열, 공백은 제거, 빈 문자열은 버림)
 */
function parseStringList(raw: unknown, field: string, platformName: string): string[] {
  if (raw === undefined || raw === null) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new ManifestFormatError(`platform "${platformName}".${field} must be a list of strings`);
  }

  const values: string[] = [];
  for (const item of raw) {
    if (typeof item !== 'string') {
      throw new ManifestFormatError(`platform "${platformName}".${field} must contain only strings`);
    }
    const value = item.trim();
    if (value.length > 0) {
      values.push(value);
    }
  }
  return values;
}

function parsePlatformEntry(raw: unknown): PlatformEntry {
  if (!isRecord(raw)) {
    throw new ManifestFormatError('platform entry must be a map');
  }

  const name = raw.name;
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new ManifestFormatError('platform.name must be a non-empty string');
  }

  return {
    name: name.trim(),
    triples: parseStringList(raw.triples, 'triples', name),
    artifacts: parseStringList(raw.artifacts, 'artifacts', name),
  };
}

/**
 * platforms 노드를 단일 목록으로 정규화
 * - 리스트: [{name, ...}, ...]
 * - targets 하위 키: {default?, targets: [...]}
 * - 맵: {"<key>": {name, ...}, ...}
 */
function normalizePlatforms(node: unknown): PlatformEntry[] {
  if (Array.isArray(node)) {
    return node.map((entry) => parsePlatformEntry(entry));
  }

  if (!isRecord(node)) {
    throw new ManifestFormatError('platforms must be a list or a map');
  }

  if (node.targets !== undefined) {
    if (!Array.isArray(node.targets)) {
      throw new ManifestFormatError('platforms.targets must be a list');
    }
    return node.targets.map((entry) => parsePlatformEntry(entry));
  }

  return Object.values(node).map((entry) => parsePlatformEntry(entry));
}

/**
 * 매니페스트 JSON 파싱
 */
export function parseManifest(content: string, expectedBuildId?: string): Manifest {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ManifestFormatError(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isRecord(raw)) {
    throw new ManifestFormatError('manifest must be a JSON object');
  }

  let buildId: string | undefined;
  if (raw.build !== undefined && raw.build !== null) {
    if (!isRecord(raw.build)) {
      throw new ManifestFormatError('build must be a map');
    }
    const id = raw.build.id;
    if (id !== undefined && id !== null) {
      if (typeof id !== 'string') {
        throw new ManifestFormatError('build.id must be a string');
      }
      buildId = id;
    }
  }

  if (expectedBuildId !== undefined && buildId !== undefined && buildId !== expectedBuildId) {
    throw new ManifestFormatError(`build.id "${buildId}" does not match requested "${expectedBuildId}"`);
  }

  if (raw.platforms === undefined || raw.platforms === null) {
    throw new ManifestFormatError('platforms is required');
  }

  return { buildId, platforms: normalizePlatforms(raw.platforms) };
}

export class ManifestClient {
  private config: PrecompiledConfig;
  private store: CacheStore;
  private logger: Logger;
  private signal?: AbortSignal;

  constructor(options: ManifestClientOptions) {
    this.config = options.config;
    this.store = options.store;
    this.logger = options.logger ?? createSilentLogger();
    this.signal = options.signal;
  }

  /**
   * 매니페스트 다운로드 + 서명 검증 + 파싱
   */
  async fetchVerifiedManifest(buildId: string): Promise<Manifest> {
    const result = await fetchSignedFile({
      config: this.config,
      store: this.store,
      buildId,
      fileName: MANIFEST_FILE_NAME,
      cacheDir: this.store.manifestDir(buildId),
      fetchOptions: { stage: 'manifest', signal: this.signal },
    });

    if (!result.data) {
      this.logger.warn('매니페스트 서명 불일치, 캐시 삭제', { buildId, filePath: result.filePath });
      throw new ManifestSignatureError(buildId);
    }

    const manifest = parseManifest(result.data.toString('utf-8'), buildId);
    this.logger.debug('매니페스트 검증 완료', { buildId, platforms: manifest.platforms.length });
    return manifest;
  }
}
