/**
 * Precompiled binary resolution errors
 * 단계(stage)와 구체적 원인(code)을 함께 노출하여
 * "릴리스가 깨졌다"와 "릴리스가 이 플랫폼을 지원하지 않는다"를 구분할 수 있게 한다
 */

/** 해석 파이프라인 단계 */
export type ResolutionStage =
  | 'config'
  | 'build-id'
  | 'manifest'
  | 'platform'
  | 'artifact'
  | 'extract'
  | 'toolchain';

/** 에러 코드 */
export type PrecompiledErrorCode =
  | 'CONFIG_INVALID'
  | 'BUILD_INPUT_MISSING'
  | 'MANIFEST_SIGNATURE_INVALID'
  | 'MANIFEST_FORMAT_INVALID'
  | 'ARTIFACT_SIGNATURE_INVALID'
  | 'PLATFORM_NOT_FOUND'
  | 'ARTIFACT_NOT_FOUND'
  | 'LIBRARY_NOT_FOUND_IN_ARCHIVE'
  | 'UNSUPPORTED_ARCHIVE'
  | 'ARCHIVE_DECODE_FAILED'
  | 'NOT_FOUND'
  | 'NETWORK_ERROR'
  | 'TOOLCHAIN_UNAVAILABLE';

export abstract class PrecompiledError extends Error {
  abstract readonly code: PrecompiledErrorCode;

  constructor(
    message: string,
    readonly stage: ResolutionStage,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigInvalidError extends PrecompiledError {
  readonly code = 'CONFIG_INVALID';

  constructor(message: string, readonly configPath?: string) {
    super(message, 'config');
  }
}

export class BuildInputMissingError extends PrecompiledError {
  readonly code = 'BUILD_INPUT_MISSING';

  constructor(readonly fileName: string, readonly searchedPath: string) {
    super(`필수 파일이 없습니다: ${fileName} (${searchedPath})`, 'build-id');
  }
}

export class ManifestSignatureError extends PrecompiledError {
  readonly code = 'MANIFEST_SIGNATURE_INVALID';

  constructor(readonly buildId: string) {
    super(`매니페스트 서명 검증 실패 (buildId=${buildId})`, 'manifest');
  }
}

export class ManifestFormatError extends PrecompiledError {
  readonly code = 'MANIFEST_FORMAT_INVALID';

  constructor(message: string) {
    super(`매니페스트 형식 오류: ${message}`, 'manifest');
  }
}

export class ArtifactSignatureError extends PrecompiledError {
  readonly code = 'ARTIFACT_SIGNATURE_INVALID';

  constructor(readonly artifactName: string) {
    super(`아티팩트 서명 검증 실패: ${artifactName}`, 'artifact');
  }
}

export class PlatformNotFoundError extends PrecompiledError {
  readonly code = 'PLATFORM_NOT_FOUND';

  constructor(readonly targetTriple: string) {
    super(`매니페스트에 타겟 "${targetTriple}"과 일치하는 플랫폼이 없습니다`, 'platform');
  }
}

export class ArtifactNotFoundError extends PrecompiledError {
  readonly code = 'ARTIFACT_NOT_FOUND';

  constructor(readonly platformName: string, detail = '아티팩트가 없습니다') {
    super(`플랫폼 "${platformName}": ${detail}`, 'platform');
  }
}

export class LibraryNotFoundInArchiveError extends PrecompiledError {
  readonly code = 'LIBRARY_NOT_FOUND_IN_ARCHIVE';

  constructor(readonly archivePath: string, readonly expectedExtension: string) {
    super(`아카이브에서 "${expectedExtension}" 라이브러리를 찾을 수 없습니다: ${archivePath}`, 'extract');
  }
}

export class UnsupportedArchiveError extends PrecompiledError {
  readonly code = 'UNSUPPORTED_ARCHIVE';

  constructor(readonly archivePath: string) {
    super(`지원하지 않는 아카이브 형식: ${archivePath}`, 'extract');
  }
}

export class ArchiveDecodeError extends PrecompiledError {
  readonly code = 'ARCHIVE_DECODE_FAILED';

  constructor(readonly archivePath: string, detail: string, options?: { cause?: unknown }) {
    super(`아카이브 해석 실패 (${archivePath}): ${detail}`, 'extract', options);
  }
}

export class NotFoundError extends PrecompiledError {
  readonly code = 'NOT_FOUND';

  constructor(readonly url: string, stage: ResolutionStage) {
    super(`HTTP 404: ${url}`, stage);
  }
}

export class NetworkError extends PrecompiledError {
  readonly code = 'NETWORK_ERROR';

  constructor(readonly url: string, detail: string, stage: ResolutionStage, readonly status?: number) {
    super(`네트워크 오류 (${url}): ${detail}`, stage);
  }
}

export class ToolchainUnavailableError extends PrecompiledError {
  readonly code = 'TOOLCHAIN_UNAVAILABLE';

  constructor(reason: string) {
    super(`${reason} toolchain unavailable`, 'toolchain');
  }
}

export function isPrecompiledError(error: unknown): error is PrecompiledError {
  return error instanceof PrecompiledError;
}
