/**
 * Precompiled resolution policy
 *
 * Resolving → Downloaded | NeedsFallback | Fatal
 *
 * 1. 설정 없음 → fallback("no config") (네트워크 접근 없음)
 * 2. mode=never → fallback("mode=never") (네트워크 접근 없음)
 * 3. build id → manifest → platform → artifact → extract 순서로 진행
 * 4. 단계 실패 시 mode=always면 fatal, 툴체인이 있으면 fallback, 없으면 fatal
 */

import * as path from 'path';
import type { PrecompiledConfig } from '../config';
import type { Logger } from '../../utils/logger';
import { createSilentLogger } from '../../utils/logger';
import { ArchiveExtractor } from './archive-extractor';
import { ArtifactClient } from './artifact-client';
import { BuildIdOptions, computeBuildId } from './build-id';
import { CacheStore, DEFAULT_CACHE_DIR_NAME, HttpClient } from './cache-store';
import {
  BuildInputMissingError,
  ConfigInvalidError,
  ResolutionStage,
  ToolchainUnavailableError,
  UnsupportedArchiveError,
} from './errors';
import { ManifestClient } from './manifest-client';
import { selectArtifact } from './platform-matcher';
import { detectHostTargetTriple, libraryExtensionFor } from './target';
import { detectToolchain } from './toolchain';
import type { LinkMode, Resolution } from './types';

export interface PrecompiledServiceOptions {
  projectDir: string;
  /** 캐시 루트 (기본 <projectDir>/.binforge) */
  cacheDir?: string;
  client?: HttpClient;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface PrecompiledServices {
  store: CacheStore;
  manifests: ManifestClient;
  artifacts: ArtifactClient;
  extractor: ArchiveExtractor;
}

export interface ResolveRequest extends PrecompiledServiceOptions {
  /** null이면 설정 없음 */
  config: PrecompiledConfig | null;
  /** 기본값: 호스트 트리플 */
  targetTriple?: string;
  linkMode?: LinkMode;
  /** 지정 시 해시 계산 생략 */
  buildId?: string;
  buildIdOptions?: BuildIdOptions;
  /** 툴체인 탐지 (기본: rustup 탐색) */
  detectToolchain?: () => Promise<boolean>;
}

/**
 * 단계 실패 (단계 이름과 원인을 함께 보존)
 */
export class StageFailure extends Error {
  constructor(
    readonly stage: ResolutionStage,
    readonly cause: Error
  ) {
    super(`[${stage}] ${cause.message}`);
    this.name = 'StageFailure';
  }
}

export function defaultCacheDir(projectDir: string): string {
  return path.join(projectDir, DEFAULT_CACHE_DIR_NAME);
}

/**
 * 캐시/클라이언트/추출기 생성
 */
export function createPrecompiledServices(
  config: PrecompiledConfig,
  options: PrecompiledServiceOptions
): PrecompiledServices {
  const logger = options.logger ?? createSilentLogger();
  const store = new CacheStore({
    cacheDir: options.cacheDir ?? defaultCacheDir(options.projectDir),
    client: options.client,
    timeout: options.timeout,
    maxRetries: options.maxRetries,
    retryDelay: options.retryDelay,
    logger,
  });

  return {
    store,
    manifests: new ManifestClient({ config, store, logger, signal: options.signal }),
    artifacts: new ArtifactClient({ config, store, logger, signal: options.signal }),
    extractor: new ArchiveExtractor({ store, logger }),
  };
}

async function runStage<T>(stage: ResolutionStage, task: () => Promise<T> | T): Promise<T> {
  try {
    return await task();
  } catch (error) {
    throw new StageFailure(stage, error instanceof Error ? error : new Error(String(error)));
  }
}

/**
 * 정책과 무관하게 항상 치명적인 실패인지
 * 설정 오류, 필수 입력 누락, 지원하지 않는 아카이브 형식만 해당한다
 */
function isAlwaysFatal(error: Error): boolean {
  return (
    error instanceof ConfigInvalidError ||
    error instanceof BuildInputMissingError ||
    error instanceof UnsupportedArchiveError
  );
}

/**
 * 사전 빌드 바이너리 해석
 */
export async function resolvePrecompiled(request: ResolveRequest): Promise<Resolution> {
  const logger = request.logger ?? createSilentLogger();
  const { config } = request;

  if (!config) {
    logger.info('precompiled_binaries 설정 없음, 로컬 빌드로 전환');
    return { kind: 'fallback', reason: 'no config' };
  }

  if (config.mode === 'never') {
    logger.info('사전 빌드 바이너리 비활성화 (mode=never), 로컬 빌드로 전환');
    return { kind: 'fallback', reason: 'mode=never' };
  }

  const targetTriple = request.targetTriple ?? detectHostTargetTriple();
  const expectedExtension = libraryExtensionFor(targetTriple, request.linkMode);
  const services = createPrecompiledServices(config, { ...request, logger });

  logger.info(`사전 빌드 바이너리 해석 중: ${targetTriple}`);
  logger.debug('정책', { mode: config.mode, repository: config.repository });

  try {
    const buildId =
      request.buildId ?? (await runStage('build-id', () => computeBuildId(request.projectDir, request.buildIdOptions)));
    logger.debug('빌드 ID', { buildId });

    const manifest = await runStage('manifest', () => services.manifests.fetchVerifiedManifest(buildId));
    const selection = await runStage('platform', () => selectArtifact(manifest, targetTriple));
    const archivePath = await runStage('artifact', () =>
      services.artifacts.fetchVerifiedArtifact(buildId, selection.artifactName)
    );
    const file = await runStage('extract', () =>
      services.extractor.extractLibrary(archivePath, expectedExtension, { buildId, targetTriple })
    );

    logger.info(`사전 빌드 바이너리 사용: ${targetTriple}`, { file });
    return { kind: 'downloaded', file, buildId, targetTriple, artifactName: selection.artifactName };
  } catch (error) {
    if (!(error instanceof StageFailure)) {
      throw error;
    }
    return decideOnFailure(error, request, config, logger);
  }
}

async function decideOnFailure(
  failure: StageFailure,
  request: ResolveRequest,
  config: PrecompiledConfig,
  logger: Logger
): Promise<Resolution> {
  const reason = failure.message;

  if (request.signal?.aborted) {
    logger.warn('해석이 중단되었습니다', { reason });
    return { kind: 'fatal', reason: `aborted: ${reason}`, error: failure.cause };
  }

  if (isAlwaysFatal(failure.cause)) {
    logger.error(`사전 빌드 바이너리 해석 실패: ${reason}`);
    return { kind: 'fatal', reason, error: failure.cause };
  }

  if (config.mode === 'always') {
    logger.error(`사전 빌드 바이너리가 필요합니다 (mode=always): ${reason}`);
    return { kind: 'fatal', reason, error: failure.cause };
  }

  const hasToolchain = request.detectToolchain ?? (() => detectToolchain());
  if (await hasToolchain()) {
    logger.warn(`${reason} 로컬 빌드로 전환합니다`);
    return { kind: 'fallback', reason };
  }

  const error = new ToolchainUnavailableError(reason);
  logger.error(error.message);
  return { kind: 'fatal', reason: error.message, error };
}
