/**
 * Verified archive extractor
 * 검증된 아카이브에서 공유 라이브러리 하나를 (buildId, 타겟)별 캐시 디렉토리로 추출한다
 */

import AdmZip from 'adm-zip';
import * as fs from 'fs-extra';
import * as path from 'path';
import * as tar from 'tar';
import type { Logger } from '../../utils/logger';
import { createSilentLogger } from '../../utils/logger';
import type { CacheStore } from './cache-store';
import { ArchiveDecodeError, LibraryNotFoundInArchiveError, UnsupportedArchiveError } from './errors';

export type ArchiveKind = 'zip' | 'tar.gz';

/** 라이브러리 출력 폴더를 나타내는 경로 세그먼트 */
const LIBRARY_DIR_SEGMENT = 'lib';

const TAR_FILE_TYPES = new Set(['File', 'OldFile', 'ContiguousFile']);

export interface ArchiveEntry {
  /** 아카이브 내부 경로 ('/' 구분) */
  path: string;
  data: Buffer;
}

export interface ExtractTarget {
  buildId: string;
  targetTriple: string;
}

export interface ArchiveExtractorOptions {
  store: CacheStore;
  logger?: Logger;
}

/**
 * 파일명 접미사로 아카이브 형식 판별
 */
export function detectArchiveKind(archivePath: string): ArchiveKind | null {
  const lower = archivePath.toLowerCase();
  if (lower.endsWith('.zip')) {
    return 'zip';
  }
  if (lower.endsWith('.tar.gz') || lower.endsWith('.tgz')) {
    return 'tar.gz';
  }
  return null;
}

/**
 * 라이브러리 엔트리 선택
 * 확장자가 맞고 lib 디렉토리 아래에 있는 엔트리 우선, 없으면 확장자만 맞는 첫 엔트리
 */
export function selectLibraryEntry<T extends { path: string }>(
  entries: T[],
  expectedExtension: string
): T | null {
  let fallback: T | null = null;

  for (const entry of entries) {
    if (path.posix.extname(entry.path) !== expectedExtension) {
      continue;
    }
    const segments = entry.path.split('/').slice(0, -1);
    if (segments.includes(LIBRARY_DIR_SEGMENT)) {
      return entry;
    }
    fallback ??= entry;
  }

  return fallback;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 확장자가 일치하는 파일 엔트리 읽기 (zip)
 */
function readZipEntries(archivePath: string, data: Buffer, expectedExtension: string): ArchiveEntry[] {
  try {
    const zip = new AdmZip(data);
    return zip
      .getEntries()
      .filter((entry) => !entry.isDirectory && path.posix.extname(entry.entryName) === expectedExtension)
      .map((entry) => ({ path: entry.entryName, data: entry.getData() }));
  } catch (error) {
    throw new ArchiveDecodeError(archivePath, errorMessage(error), { cause: error });
  }
}

/**
 * 확장자가 일치하는 파일 엔트리 읽기 (tar.gz, 압축은 tar가 자동 감지)
 * strict 모드라서 손상된 gzip/헤더는 경고가 아니라 오류가 된다
 */
async function readTarEntries(archivePath: string, expectedExtension: string): Promise<ArchiveEntry[]> {
  const entries: ArchiveEntry[] = [];

  const listing = tar.t({
    file: archivePath,
    strict: true,
    onReadEntry: (entry) => {
      if (!TAR_FILE_TYPES.has(entry.type) || path.posix.extname(entry.path) !== expectedExtension) {
        return;
      }
      const chunks: Buffer[] = [];
      const record: ArchiveEntry = { path: entry.path, data: Buffer.alloc(0) };
      entries.push(record);
      entry.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      entry.on('end', () => {
        record.data = Buffer.concat(chunks);
      });
    },
  });

  try {
    await listing;
  } catch (error) {
    throw new ArchiveDecodeError(archivePath, errorMessage(error), { cause: error });
  }

  return entries;
}

/**
 * 디렉토리에 이미 추출된 라이브러리 조회
 */
async function findExtractedLibrary(dir: string, expectedExtension: string): Promise<string | null> {
  if (!(await fs.pathExists(dir))) {
    return null;
  }
  const names = (await fs.readdir(dir)).sort();
  for (const name of names) {
    const filePath = path.join(dir, name);
    if (path.extname(name) === expectedExtension && (await fs.stat(filePath)).isFile()) {
      return filePath;
    }
  }
  return null;
}

export class ArchiveExtractor {
  private store: CacheStore;
  private logger: Logger;

  constructor(options: ArchiveExtractorOptions) {
    this.store = options.store;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * 아카이브 엔트리 목록 읽기
   */
  async readEntries(archivePath: string, expectedExtension: string): Promise<ArchiveEntry[]> {
    const kind = detectArchiveKind(archivePath);
    switch (kind) {
      case 'zip':
        return readZipEntries(archivePath, await fs.readFile(archivePath), expectedExtension);
      case 'tar.gz':
        return readTarEntries(archivePath, expectedExtension);
      default:
        throw new UnsupportedArchiveError(archivePath);
    }
  }

  /**
   * 라이브러리 추출
   * 같은 (buildId, 타겟) 디렉토리에 이미 추출된 파일이 있으면 아카이브를 읽지 않고 반환
   */
  async extractLibrary(archivePath: string, expectedExtension: string, target: ExtractTarget): Promise<string> {
    if (!detectArchiveKind(archivePath)) {
      throw new UnsupportedArchiveError(archivePath);
    }

    const outputDir = this.store.extractedDir(target.buildId, target.targetTriple);
    const existing = await findExtractedLibrary(outputDir, expectedExtension);
    if (existing) {
      this.logger.debug('이미 추출된 라이브러리 사용', { file: existing });
      return existing;
    }

    const entries = await this.readEntries(archivePath, expectedExtension);
    const entry = selectLibraryEntry(entries, expectedExtension);
    if (!entry) {
      throw new LibraryNotFoundInArchiveError(archivePath, expectedExtension);
    }

    const outputPath = path.join(outputDir, path.posix.basename(entry.path));
    await this.store.writeAtomic(outputPath, entry.data);
    this.logger.debug('라이브러리 추출 완료', { entry: entry.path, outputPath });
    return outputPath;
  }
}
