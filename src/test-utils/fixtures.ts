/**
 * 사전 빌드 해석 테스트 유틸리티
 * 임시 crate 디렉토리, 서명 키, 메모리 릴리스 서버를 제공합니다.
 */

import { AxiosError, AxiosHeaders } from 'axios';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import type { PrecompiledConfig } from '../core/config';
import { generateKeyPair, signMessage } from '../core/precompiled/signature-verifier';

export const TEST_REPOSITORY = 'example-org/example-lib';
export const TEST_URL_PREFIX = 'https://releases.test/download/';

/**
 * 임시 디렉토리 생성
 */
export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `binforge-${prefix}-`));
}

export interface CrateFiles {
  descriptor?: string;
  lockFile?: string | null;
  config?: string | null;
}

/**
 * 테스트용 crate 디렉토리 작성
 */
export async function writeCrate(dir: string, files: CrateFiles = {}): Promise<void> {
  await fs.outputFile(path.join(dir, 'Cargo.toml'), files.descriptor ?? '[package]\nname = "demo"\nversion = "0.1.0"\n');
  if (files.lockFile !== null) {
    await fs.outputFile(path.join(dir, 'Cargo.lock'), files.lockFile ?? '# lock\nversion = 3\n');
  }
  if (files.config !== undefined && files.config !== null) {
    await fs.outputFile(path.join(dir, 'binforge.yaml'), files.config);
  }
}

/**
 * binforge.yaml 내용 생성
 */
export function configYaml(publicKey: Buffer, extra: Record<string, string> = {}): string {
  const lines = [
    'precompiled_binaries:',
    `  repository: ${TEST_REPOSITORY}`,
    `  public_key: "${publicKey.toString('hex')}"`,
    `  url_prefix: "${TEST_URL_PREFIX}"`,
  ];
  for (const [key, value] of Object.entries(extra)) {
    lines.push(`  ${key}: ${value}`);
  }
  return `${lines.join('\n')}\n`;
}

export interface TestKeys {
  publicKey: Buffer;
  privateKey: Buffer;
}

/**
 * 테스트 키로 구성된 설정
 */
export function testConfig(keys: TestKeys, overrides: Partial<PrecompiledConfig> = {}): PrecompiledConfig {
  return {
    repository: TEST_REPOSITORY,
    publicKey: keys.publicKey,
    urlPrefix: TEST_URL_PREFIX,
    mode: 'auto',
    ...overrides,
  };
}

/**
 * axios HTTP 오류 생성 (status가 없으면 응답 없는 네트워크 오류)
 */
export function httpError(url: string, status?: number): AxiosError {
  const config = { url, headers: new AxiosHeaders() };
  if (status === undefined) {
    return new AxiosError('socket hang up', 'ECONNRESET', config);
  }
  return new AxiosError(
    `Request failed with status code ${status}`,
    status >= 500 ? 'ERR_BAD_RESPONSE' : 'ERR_BAD_REQUEST',
    config,
    undefined,
    { data: null, status, statusText: '', headers: {}, config }
  );
}

export interface PublishOptions {
  /** 서명 이후 본문 변조 */
  tamper?: boolean;
  /** 서명 파일 생략 */
  withoutSignature?: boolean;
}

/**
 * 메모리 릴리스 서버
 * client.get은 등록된 URL이면 본문을, 아니면 404를 반환한다
 */
export function createReleaseServer(keys: TestKeys, urlPrefix: string = TEST_URL_PREFIX) {
  const files = new Map<string, Buffer>();

  const get = vi.fn();
  get.mockImplementation(async (url: string) => {
    const body = files.get(url);
    if (!body) {
      throw httpError(url, 404);
    }
    return { data: body };
  });

  const urlFor = (buildId: string, fileName: string): string => `${urlPrefix}${buildId}/${fileName}`;

  return {
    client: { get },
    get,
    files,
    urlFor,
    publish(buildId: string, fileName: string, content: Buffer | string, options: PublishOptions = {}): void {
      const data = Buffer.isBuffer(content) ? content : Buffer.from(content, 'utf-8');
      const signature = signMessage(keys.privateKey, data);
      files.set(urlFor(buildId, fileName), options.tamper ? Buffer.concat([data, Buffer.from('x')]) : data);
      if (!options.withoutSignature) {
        files.set(urlFor(buildId, `${fileName}.sig`), signature);
      }
    },
  };
}

export function newTestKeys(): TestKeys {
  return generateKeyPair();
}
