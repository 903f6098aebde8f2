/**
 * Build identity hasher
 * 빌드에 영향을 주는 입력 파일들로부터 결정적인 빌드 ID를 계산한다.
 * 모든 소비자 구현이 같은 ID를 내야 하므로 직렬화 형식은 고정이다.
 */

import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import { CONFIG_FILE_NAME } from '../config';
import { BuildInputMissingError } from './errors';

/** 해시 형식 버전 (직렬화가 바뀌면 올린다) */
export const HASH_VERSION = 'b1';

export const PROJECT_DESCRIPTOR_FILE = 'Cargo.toml';
export const LOCK_FILE = 'Cargo.lock';

/** 해시 입력 이름 (정렬 기준이므로 변경 금지) */
export const BUILD_INPUT_NAMES = {
  descriptor: 'cargo.toml',
  lockFile: 'cargo.lock',
  targetTriple: 'rust.target_triple',
  interfaceDefinition: 'uniffi.udl',
  config: CONFIG_FILE_NAME,
} as const;

export interface BuildInput {
  name: string;
  /** 파일이 없으면 null (생략하지 않고 명시적으로 기록) */
  value: string | null;
}

export interface BuildIdOptions {
  /** 인터페이스 정의 파일 경로 (projectDir 기준, 지정하지 않으면 null로 해시) */
  interfaceDefinitionPath?: string;
}

/**
 * 정규 JSON 직렬화
 * 입력은 이름순(코드 유닛 순서) 정렬, 각 항목 키는 affects_abi, name, value 순서
 */
export function canonicalBuildInputs(inputs: BuildInput[]): string {
  const fields = inputs
    .map((input) => ({ affects_abi: true, name: input.name, value: input.value }))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  return JSON.stringify({ inputs: fields, version: HASH_VERSION });
}

/**
 * 정규 직렬화의 sha256으로 빌드 ID 생성
 */
export function hashBuildInputs(inputs: BuildInput[]): string {
  const digest = crypto.createHash('sha256').update(canonicalBuildInputs(inputs), 'utf8').digest('hex');
  return `${HASH_VERSION}-${digest}`;
}

/**
 * 프로젝트 디렉토리에서 해시 입력 수집
 */
export async function collectBuildInputs(
  projectDir: string,
  options: BuildIdOptions = {}
): Promise<BuildInput[]> {
  const descriptor = await readRequired(projectDir, PROJECT_DESCRIPTOR_FILE);
  const lockFile = await findLockFile(projectDir);
  const config = await readOptional(path.join(projectDir, CONFIG_FILE_NAME));
  const interfaceDefinition = options.interfaceDefinitionPath
    ? await readOptional(path.resolve(projectDir, options.interfaceDefinitionPath))
    : null;

  return [
    { name: BUILD_INPUT_NAMES.descriptor, value: descriptor },
    { name: BUILD_INPUT_NAMES.lockFile, value: lockFile },
    // 빌드 ID는 타겟과 무관하다
    { name: BUILD_INPUT_NAMES.targetTriple, value: null },
    { name: BUILD_INPUT_NAMES.interfaceDefinition, value: interfaceDefinition },
    { name: BUILD_INPUT_NAMES.config, value: config },
  ];
}

/**
 * 빌드 ID 계산
 */
export async function computeBuildId(projectDir: string, options: BuildIdOptions = {}): Promise<string> {
  const inputs = await collectBuildInputs(projectDir, options);
  return hashBuildInputs(inputs);
}

/**
 * projectDir에서 파일시스템 루트까지 올라가며 lock 파일 탐색
 * (워크스페이스 루트에 lock 파일이 있는 경우)
 */
export async function findLockFile(projectDir: string): Promise<string> {
  let current = path.resolve(projectDir);

  while (true) {
    const candidate = path.join(current, LOCK_FILE);
    if (await fs.pathExists(candidate)) {
      return fs.readFile(candidate, 'utf-8');
    }
    const parent = path.dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  throw new BuildInputMissingError(LOCK_FILE, path.join(projectDir, LOCK_FILE));
}

async function readRequired(projectDir: string, fileName: string): Promise<string> {
  const filePath = path.join(projectDir, fileName);
  if (!(await fs.pathExists(filePath))) {
    throw new BuildInputMissingError(fileName, filePath);
  }
  return fs.readFile(filePath, 'utf-8');
}

async function readOptional(filePath: string): Promise<string | null> {
  if (!(await fs.pathExists(filePath))) {
    return null;
  }
  return fs.readFile(filePath, 'utf-8');
}
