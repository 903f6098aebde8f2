import chalk from 'chalk';
import Table from 'cli-table3';
import * as fs from 'fs-extra';
import * as path from 'path';
import { CACHE_DIRS, CacheStore, defaultCacheDir } from '../../core/precompiled';
import { EXIT_OK, EXIT_USAGE, resolveCrateDir } from '../context';

export interface CacheOptions {
  crateDir?: string;
  cacheDir?: string;
}

export interface CacheClearOptions extends CacheOptions {
  buildId?: string;
}

function cacheRoot(options: CacheOptions): string {
  return options.cacheDir ? path.resolve(options.cacheDir) : defaultCacheDir(resolveCrateDir(options.crateDir));
}

/**
 * 단일 빌드 ID 캐시 삭제
 */
export async function cacheClear(options: CacheClearOptions): Promise<number> {
  if (!options.buildId) {
    console.error(chalk.red('--build-id 옵션이 필요합니다'));
    return EXIT_USAGE;
  }

  const store = new CacheStore({ cacheDir: cacheRoot(options) });
  const removed = await store.clearBuild(options.buildId);

  if (removed.length === 0) {
    console.log(chalk.yellow(`삭제할 캐시가 없습니다: ${options.buildId}`));
    return EXIT_OK;
  }

  console.log(chalk.green(`✓ 캐시가 삭제되었습니다: ${options.buildId} (${removed.length}개 디렉토리)`));
  return EXIT_OK;
}

/**
 * 캐시된 빌드 ID 목록
 */
export async function cacheList(options: CacheOptions): Promise<number> {
  const root = cacheRoot(options);
  const buildIds = new Set<string>();

  for (const dir of Object.values(CACHE_DIRS)) {
    const dirPath = path.join(root, dir);
    if (await fs.pathExists(dirPath)) {
      for (const name of await fs.readdir(dirPath)) {
        buildIds.add(name);
      }
    }
  }

  if (buildIds.size === 0) {
    console.log(chalk.yellow('캐시된 빌드가 없습니다'));
    return EXIT_OK;
  }

  const table = new Table({
    head: [chalk.cyan('빌드 ID'), chalk.cyan('매니페스트'), chalk.cyan('아티팩트'), chalk.cyan('추출')],
  });

  for (const buildId of [...buildIds].sort()) {
    table.push([
      buildId,
      formatBytes(await getDirectorySize(path.join(root, CACHE_DIRS.manifests, buildId))),
      formatBytes(await getDirectorySize(path.join(root, CACHE_DIRS.artifacts, buildId))),
      formatBytes(await getDirectorySize(path.join(root, CACHE_DIRS.extracted, buildId))),
    ]);
  }

  console.log(chalk.cyan(`\n캐시 경로: ${root}\n`));
  console.log(table.toString());
  console.log(chalk.gray(`\n총 ${buildIds.size}개 빌드`));
  return EXIT_OK;
}

/**
 * 디렉토리 크기 계산
 */
export async function getDirectorySize(dirPath: string): Promise<number> {
  let size = 0;

  const exists = await fs.pathExists(dirPath);
  if (!exists) return 0;

  const files = await fs.readdir(dirPath);

  for (const file of files) {
    const filePath = path.join(dirPath, file);
    const stats = await fs.stat(filePath);

    if (stats.isDirectory()) {
      size += await getDirectorySize(filePath);
    } else {
      size += stats.size;
    }
  }

  return size;
}

/**
 * 바이트 포맷
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}
