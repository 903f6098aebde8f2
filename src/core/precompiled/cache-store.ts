/**
 * Precompiled artifact cache store
 * 로컬 파일이 있으면 그대로 신뢰하고, 없으면 다운로드 후 원자적으로 기록한다.
 * 캐시 무효화(evict)는 검증을 수행한 호출자의 책임이다.
 */

import axios, { AxiosInstance } from 'axios';
import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import { setTimeout as delay } from 'timers/promises';
import type { Logger } from '../../utils/logger';
import { createSilentLogger } from '../../utils/logger';
import { NetworkError, NotFoundError, ResolutionStage } from './errors';

/** 캐시 루트 하위 디렉토리 */
export const CACHE_DIRS = {
  manifests: 'manifests',
  artifacts: 'artifacts',
  extracted: 'extracted',
} as const;

/** 프로젝트 디렉토리 기준 기본 캐시 위치 */
export const DEFAULT_CACHE_DIR_NAME = '.binforge';

const DEFAULT_TIMEOUT = 30000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY = 500;

/** 테스트에서 교체 가능한 최소 HTTP 클라이언트 */
export type HttpClient = Pick<AxiosInstance, 'get'>;

export interface CacheStoreOptions {
  /** 캐시 루트 디렉토리 */
  cacheDir: string;
  client?: HttpClient;
  /** 요청 타임아웃 (ms) */
  timeout?: number;
  /** 최대 시도 횟수 */
  maxRetries?: number;
  /** 첫 재시도 대기 (ms), 이후 2배씩 증가 */
  retryDelay?: number;
  logger?: Logger;
}

export interface FetchOptions {
  /** 오류 메시지에 표시할 단계 */
  stage?: ResolutionStage;
  signal?: AbortSignal;
}

/**
 * 일시적 실패 여부: 응답 없음(네트워크/타임아웃), 5xx
 * 4xx는 429를 포함해 모두 재시도하지 않는다
 */
export function isTransientError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  if (error.code === 'ERR_CANCELED') {
    return false;
  }
  const status = error.response?.status;
  if (status === undefined) {
    return true;
  }
  return status >= 500;
}

/**
 * 대기 (중단되면 즉시 false)
 */
async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) {
      return false;
    }
    throw error;
  }
}

export class CacheStore {
  readonly cacheDir: string;
  private client: HttpClient;
  private maxRetries: number;
  private retryDelay: number;
  private logger: Logger;

  constructor(options: CacheStoreOptions) {
    this.cacheDir = options.cacheDir;
    this.client =
      options.client ??
      axios.create({
        timeout: options.timeout ?? DEFAULT_TIMEOUT,
        headers: { 'User-Agent': 'binforge/0.1' },
      });
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.retryDelay = options.retryDelay ?? DEFAULT_RETRY_DELAY;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * 빌드 ID별 매니페스트 디렉토리
   */
  manifestDir(buildId: string): string {
    return path.join(this.cacheDir, CACHE_DIRS.manifests, buildId);
  }

  /**
   * 빌드 ID별 아티팩트 디렉토리
   */
  artifactDir(buildId: string): string {
    return path.join(this.cacheDir, CACHE_DIRS.artifacts, buildId);
  }

  /**
   * (빌드 ID, 타겟)별 압축 해제 디렉토리
   */
  extractedDir(buildId: string, targetTriple: string): string {
    return path.join(this.cacheDir, CACHE_DIRS.extracted, buildId, targetTriple);
  }

  /**
   * 캐시에 있으면 반환, 없으면 다운로드 후 저장
   */
  async getOrFetch(localPath: string, url: string, options: FetchOptions = {}): Promise<Buffer> {
    if (await fs.pathExists(localPath)) {
      this.logger.debug('캐시 히트', { localPath });
      return fs.readFile(localPath);
    }

    const data = await this.download(url, options);
    await this.writeAtomic(localPath, data);
    this.logger.debug('다운로드 완료', { url, size: data.length });
    return data;
  }

  /**
   * 재시도 포함 다운로드 (일시적 실패만 재시도, 4xx는 즉시 실패)
   */
  private async download(url: string, options: FetchOptions): Promise<Buffer> {
    const stage = options.stage ?? 'artifact';
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.client.get<ArrayBuffer>(url, {
          responseType: 'arraybuffer',
          signal: options.signal,
        });
        return Buffer.from(response.data);
      } catch (error) {
        lastError = error;

        if (axios.isAxiosError(error) && error.response?.status === 404) {
          throw new NotFoundError(url, stage);
        }
        if (!isTransientError(error)) {
          break;
        }

        if (attempt < this.maxRetries) {
          const delay = this.retryDelay * 2 ** (attempt - 1);
          this.logger.warn('다운로드 실패, 재시도', {
            url,
            attempt,
            delay,
            error: error instanceof Error ? error.message : String(error),
          });
          if (!(await sleep(delay, options.signal))) {
            break;
          }
        }
      }
    }

    const status = axios.isAxiosError(lastError) ? lastError.response?.status : undefined;
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    throw new NetworkError(url, detail, stage, status);
  }

  /**
   * 임시 파일에 기록 후 rename (동시 실행 중인 다른 프로세스가 부분 파일을 보지 않도록)
   */
  async writeAtomic(filePath: string, data: Buffer): Promise<void> {
    await fs.ensureDir(path.dirname(filePath));
    const tempPath = `${filePath}.${process.pid}.${crypto.randomBytes(6).toString('hex')}.tmp`;

    try {
      await fs.writeFile(tempPath, data);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.remove(tempPath);
      throw error;
    }
  }

  /**
   * 파일 삭제 (없으면 무시)
   */
  async evict(...filePaths: string[]): Promise<void> {
    for (const filePath of filePaths) {
      await fs.remove(filePath);
    }
    this.logger.debug('캐시 제거', { files: filePaths });
  }

  /**
   * 단일 빌드 ID의 캐시 전체 삭제
   * @returns 삭제된 디렉토리 목록
   */
  async clearBuild(buildId: string): Promise<string[]> {
    const dirs = [
      this.manifestDir(buildId),
      this.artifactDir(buildId),
      path.join(this.cacheDir, CACHE_DIRS.extracted, buildId),
    ];
    const removed: string[] = [];

    for (const dir of dirs) {
      if (await fs.pathExists(dir)) {
        await fs.remove(dir);
        removed.push(dir);
      }
    }
    return removed;
  }
}
