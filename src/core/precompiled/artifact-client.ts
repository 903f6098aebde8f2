/**
 * Release artifact client
 */

import type { PrecompiledConfig } from '../config';
import type { Logger } from '../../utils/logger';
import { createSilentLogger } from '../../utils/logger';
import type { CacheStore } from './cache-store';
import { ArtifactSignatureError } from './errors';
import { fetchSignedFile } from './verified-fetch';

export interface ArtifactClientOptions {
  config: PrecompiledConfig;
  store: CacheStore;
  logger?: Logger;
  signal?: AbortSignal;
}

export class ArtifactClient {
  private config: PrecompiledConfig;
  private store: CacheStore;
  private logger: Logger;
  private signal?: AbortSignal;

  constructor(options: ArtifactClientOptions) {
    this.config = options.config;
    this.store = options.store;
    this.logger = options.logger ?? createSilentLogger();
    this.signal = options.signal;
  }

  /**
   * 아티팩트 다운로드 + 서명 검증
   * @returns 검증된 아카이브 파일 경로
   */
  async fetchVerifiedArtifact(buildId: string, artifactName: string): Promise<string> {
    const result = await fetchSignedFile({
      config: this.config,
      store: this.store,
      buildId,
      fileName: artifactName,
      cacheDir: this.store.artifactDir(buildId),
      fetchOptions: { stage: 'artifact', signal: this.signal },
    });

    if (!result.data) {
      this.logger.warn('아티팩트 서명 불일치, 캐시 삭제', { buildId, artifactName });
      throw new ArtifactSignatureError(artifactName);
    }

    this.logger.debug('아티팩트 검증 완료', { artifactName, size: result.data.length });
    return result.filePath;
  }
}
