import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigInvalidError } from './precompiled/errors';
import { LogLevel, parseLogLevel } from '../utils/logger';

/** 프로젝트 설정 파일명 (빌드 ID 입력에도 포함됨) */
export const CONFIG_FILE_NAME = 'binforge.yaml';

/** 모드 환경 변수 (설정 파일의 mode보다 우선) */
export const MODE_ENV_VAR = 'BINFORGE_PRECOMPILED_MODE';

/** 기본 릴리스 호스트 */
const DEFAULT_RELEASE_HOST = 'https://github.com';

const PUBLIC_KEY_LENGTH = 32;

const PRECOMPILED_SECTION = 'precompiled_binaries';

const ALLOWED_KEYS = new Set(['repository', 'public_key', 'url_prefix', 'mode']);

const MODE_HINT = 'auto, always, never (aliases: download->always, build|off|disabled->never)';

/**
 * 사전 빌드 바이너리 사용 정책
 * - auto: 다운로드 실패 시 툴체인이 있으면 로컬 빌드
 * - always: 다운로드 실패는 곧 치명적 오류
 * - never: 네트워크 접근 없이 항상 로컬 빌드
 */
export type PrecompiledMode = 'auto' | 'always' | 'never';

// 설정 인터페이스 정의
export interface PrecompiledConfig {
  /** owner/repo 형식으로 정규화된 저장소 */
  repository: string;
  /** Ed25519 공개키 (32바이트) */
  publicKey: Buffer;
  /** 다운로드 URL 접두사 (없으면 GitHub 릴리스 경로) */
  urlPrefix?: string;
  mode: PrecompiledMode;
}

export interface BinforgeOptions {
  /** 설정 파일 경로 */
  configPath: string;
  /** precompiled_binaries 섹션이 없으면 null */
  precompiledBinaries: PrecompiledConfig | null;
}

/** 애플리케이션 레벨 재정의 */
export interface AppOverrides {
  mode?: PrecompiledMode;
  logLevel?: LogLevel;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * mode 문자열 파싱 (별칭 지원, 알 수 없으면 null)
 */
export function parseMode(raw: string): PrecompiledMode | null {
  switch (raw.trim().toLowerCase()) {
    case 'auto':
      return 'auto';
    case 'always':
    case 'download':
      return 'always';
    case 'never':
    case 'build':
    case 'off':
    case 'disabled':
      return 'never';
    default:
      return null;
  }
}

/**
 * 저장소 표기를 owner/repo로 정규화
 * github.com/owner/repo, https://github.com/owner/repo/ 형식도 허용
 */
export function normalizeRepository(raw: string): string | null {
  const value = raw
    .trim()
    .replace(/^https?:\/\//, '')
    .replace(/^github\.com\//, '')
    .replace(/\/+$/, '');

  const parts = value.split('/');
  if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
    return null;
  }
  return `${parts[0]}/${parts[1]}`;
}

/**
 * hex 문자열 디코딩 (잘못된 문자나 홀수 길이면 null)
 */
export function decodeHex(raw: string): Buffer | null {
  const value = raw.trim();
  if (value.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(value)) {
    return null;
  }
  return Buffer.from(value, 'hex');
}

/**
 * precompiled_binaries 섹션 검증
 * 누락되거나 잘못된 값은 기본값으로 대체하지 않고 즉시 거부한다
 */
export function parsePrecompiledConfig(node: unknown, configPath?: string): PrecompiledConfig {
  const fail = (message: string): never => {
    throw new ConfigInvalidError(message, configPath);
  };

  if (!isRecord(node)) {
    return fail(`${PRECOMPILED_SECTION} must be a map`);
  }

  for (const key of Object.keys(node)) {
    if (!ALLOWED_KEYS.has(key)) {
      fail(`${PRECOMPILED_SECTION}.${key} is not a recognized field`);
    }
  }

  let urlPrefix: string | undefined;
  if (node.url_prefix !== undefined && node.url_prefix !== null) {
    if (typeof node.url_prefix !== 'string') {
      fail(`${PRECOMPILED_SECTION}.url_prefix must be a string`);
    } else {
      urlPrefix = node.url_prefix;
    }
  }

  let mode: PrecompiledMode = 'auto';
  if (node.mode !== undefined && node.mode !== null) {
    if (typeof node.mode !== 'string') {
      return fail(`${PRECOMPILED_SECTION}.mode must be a string`);
    }
    mode = parseMode(node.mode) ?? fail(`${PRECOMPILED_SECTION}.mode must be one of: ${MODE_HINT}`);
  }

  if (typeof node.repository !== 'string') {
    return fail(`${PRECOMPILED_SECTION}.repository must be a string`);
  }
  const repository =
    normalizeRepository(node.repository) ??
    fail(`${PRECOMPILED_SECTION}.repository must be in owner/repo format (or github.com/owner/repo)`);

  if (typeof node.public_key !== 'string') {
    return fail(`${PRECOMPILED_SECTION}.public_key must be a string`);
  }
  const publicKey = decodeHex(node.public_key) ?? fail(`${PRECOMPILED_SECTION}.public_key must be hex`);
  if (publicKey.length !== PUBLIC_KEY_LENGTH) {
    fail(`${PRECOMPILED_SECTION}.public_key must be ${PUBLIC_KEY_LENGTH} bytes, got ${publicKey.length}`);
  }

  return { repository, publicKey, urlPrefix, mode };
}

/**
 * 프로젝트 디렉토리의 설정 파일을 로드합니다.
 * 파일이나 섹션이 없으면 precompiledBinaries는 null (오류가 아니라 라우팅 결정)
 */
export async function loadOptions(projectDir: string): Promise<BinforgeOptions> {
  const configPath = path.join(projectDir, CONFIG_FILE_NAME);

  if (!(await fs.pathExists(configPath))) {
    return { configPath, precompiledBinaries: null };
  }

  const content = await fs.readFile(configPath, 'utf-8');
  let root: unknown;
  try {
    root = yaml.load(content, { filename: configPath });
  } catch (error) {
    throw new ConfigInvalidError(`${CONFIG_FILE_NAME} 파싱 실패: ${error instanceof Error ? error.message : String(error)}`, configPath);
  }

  if (!isRecord(root)) {
    throw new ConfigInvalidError(`${CONFIG_FILE_NAME} must be a map`, configPath);
  }

  const section = root[PRECOMPILED_SECTION];
  if (section === undefined || section === null) {
    return { configPath, precompiledBinaries: null };
  }

  return { configPath, precompiledBinaries: parsePrecompiledConfig(section, configPath) };
}

/**
 * 릴리스 파일 다운로드 URL
 * `<urlPrefix><buildId>/<fileName>`
 */
export function fileUrl(config: PrecompiledConfig, buildId: string, fileName: string): string {
  const prefix =
    config.urlPrefix && config.urlPrefix.length > 0
      ? config.urlPrefix
      : `${DEFAULT_RELEASE_HOST}/${config.repository}/releases/download/`;
  return `${prefix}${buildId}/${fileName}`;
}

/**
 * 애플리케이션 설정의 precompiled_binaries 재정의 파싱
 * - false: mode=never
 * - true 또는 비어있는 맵: 재정의 없음
 */
export function parseAppOverrides(raw: unknown): AppOverrides | null {
  if (raw === undefined || raw === null) {
    return null;
  }
  if (!isRecord(raw)) {
    throw new ConfigInvalidError('app-level config must be a map');
  }

  const node = raw[PRECOMPILED_SECTION];
  if (node === undefined || node === null) {
    return null;
  }

  if (typeof node === 'boolean') {
    return node ? null : { mode: 'never' };
  }

  if (!isRecord(node)) {
    throw new ConfigInvalidError(`${PRECOMPILED_SECTION} must be a map or boolean`);
  }

  const overrides: AppOverrides = {};

  if (node.mode !== undefined && node.mode !== null) {
    if (typeof node.mode !== 'string') {
      throw new ConfigInvalidError(`${PRECOMPILED_SECTION}.mode must be a string`);
    }
    const mode = parseMode(node.mode);
    if (!mode) {
      throw new ConfigInvalidError(`${PRECOMPILED_SECTION}.mode must be one of: ${MODE_HINT}`);
    }
    overrides.mode = mode;
  }

  if (node.logging !== undefined && node.logging !== null) {
    if (!isRecord(node.logging)) {
      throw new ConfigInvalidError(`${PRECOMPILED_SECTION}.logging must be a map`);
    }
    const level = node.logging.level;
    if (level !== undefined && level !== null) {
      if (typeof level !== 'string') {
        throw new ConfigInvalidError(`${PRECOMPILED_SECTION}.logging.level must be a string`);
      }
      const parsed = parseLogLevel(level);
      if (!parsed) {
        throw new ConfigInvalidError(
          `${PRECOMPILED_SECTION}.logging.level must be one of: error, warn, info, debug`
        );
      }
      overrides.logLevel = parsed;
    }
  }

  if (overrides.mode === undefined && overrides.logLevel === undefined) {
    return null;
  }
  return overrides;
}

/**
 * 재정의를 적용한 설정 사본 반환 (원본은 변경하지 않음)
 */
export function applyOverrides(
  config: PrecompiledConfig,
  overrides: AppOverrides | null
): PrecompiledConfig {
  if (!overrides?.mode) {
    return { ...config };
  }
  return { ...config, mode: overrides.mode };
}

/**
 * 환경 변수의 mode 재정의 (없으면 null, 잘못된 값이면 오류)
 */
export function modeFromEnv(env: NodeJS.ProcessEnv = process.env): PrecompiledMode | null {
  const raw = env[MODE_ENV_VAR];
  if (raw === undefined || raw.trim() === '') {
    return null;
  }
  const mode = parseMode(raw);
  if (!mode) {
    throw new ConfigInvalidError(`${MODE_ENV_VAR} must be one of: ${MODE_HINT}`);
  }
  return mode;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  overrides?: AppOverrides | null;
}

/**
 * 설정 로드 후 재정의 적용 (우선순위: 환경 변수 > 앱 재정의 > 설정 파일)
 */
export async function loadPrecompiledConfig(
  projectDir: string,
  options: LoadConfigOptions = {}
): Promise<PrecompiledConfig | null> {
  const { precompiledBinaries } = await loadOptions(projectDir);
  if (!precompiledBinaries) {
    return null;
  }

  const config = applyOverrides(precompiledBinaries, options.overrides ?? null);
  const envMode = modeFromEnv(options.env);
  return envMode ? { ...config, mode: envMode } : config;
}
