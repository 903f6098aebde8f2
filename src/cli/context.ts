import * as path from 'path';
import { createLogger, Logger, LogLevel } from '../utils/logger';

/** 상세 로그 환경 변수 */
export const VERBOSE_ENV_VAR = 'BINFORGE_VERBOSE';

/** 종료 코드 */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type GlobalOptions = {
  verbose?: boolean;
  logDir?: string;
};

/**
 * CLI 공용 로거 생성
 */
export function createCliLogger(options: GlobalOptions = {}, env: NodeJS.ProcessEnv = process.env): Logger {
  const verbose = options.verbose === true || env[VERBOSE_ENV_VAR] === '1';
  const level: LogLevel = verbose ? 'debug' : 'info';
  return createLogger({ level, logsDir: options.logDir ? path.resolve(options.logDir) : undefined });
}

/**
 * crate 디렉토리 (기본: 현재 디렉토리)
 */
export function resolveCrateDir(crateDir?: string): string {
  return path.resolve(crateDir ?? process.cwd());
}
