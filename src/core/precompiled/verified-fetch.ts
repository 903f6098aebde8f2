import * as path from 'path';
import { fileUrl, PrecompiledConfig } from '../config';
import type { CacheStore, FetchOptions } from './cache-store';
import { verifySignature } from './signature-verifier';

export const SIGNATURE_SUFFIX = '.sig';

export interface SignedFileRequest {
  config: PrecompiledConfig;
  store: CacheStore;
  buildId: string;
  fileName: string;
  /** 캐시 디렉토리 (buildId 기준) */
  cacheDir: string;
  fetchOptions?: FetchOptions;
}

export interface SignedFileResult {
  filePath: string;
  signaturePath: string;
  /** 서명 검증 성공 시에만 채워짐 */
  data: Buffer | null;
}

/**
 * 본문과 분리 서명을 가져와 검증
 * 실패하면 이전에 캐시되어 있던 파일까지 포함해 두 파일 모두 삭제하고 data=null 반환
 */
export async function fetchSignedFile(request: SignedFileRequest): Promise<SignedFileResult> {
  const { config, store, buildId, fileName, cacheDir, fetchOptions } = request;

  const filePath = path.join(cacheDir, fileName);
  const signaturePath = `${filePath}${SIGNATURE_SUFFIX}`;

  const data = await store.getOrFetch(filePath, fileUrl(config, buildId, fileName), fetchOptions);
  const signature = await store.getOrFetch(
    signaturePath,
    fileUrl(config, buildId, `${fileName}${SIGNATURE_SUFFIX}`),
    fetchOptions
  );

  if (!verifySignature(config.publicKey, data, signature)) {
    await store.evict(filePath, signaturePath);
    return { filePath, signaturePath, data: null };
  }

  return { filePath, signaturePath, data };
}
