import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';

/** 로컬 빌드에 필요한 툴체인 실행 파일 */
export const TOOLCHAIN_BINARY = 'rustup';

export interface ToolchainProbeOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  binary?: string;
}

/**
 * 툴체인 탐색 경로: ~/.cargo/bin 다음 PATH 순서
 */
export function toolchainSearchPaths(options: ToolchainProbeOptions = {}): string[] {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const separator = platform === 'win32' ? ';' : ':';
  const home = (platform === 'win32' ? env.USERPROFILE : env.HOME) ?? os.homedir();

  const paths = [path.join(home, '.cargo', 'bin')];
  if (env.PATH) {
    paths.push(...env.PATH.split(separator).filter((p) => p.length > 0));
  }
  return paths;
}

/**
 * 로컬 빌드 툴체인 존재 여부
 */
export async function detectToolchain(options: ToolchainProbeOptions = {}): Promise<boolean> {
  const platform = options.platform ?? process.platform;
  const binary = options.binary ?? TOOLCHAIN_BINARY;
  const fileName = platform === 'win32' ? `${binary}.exe` : binary;

  for (const dir of toolchainSearchPaths(options)) {
    if (await fs.pathExists(path.join(dir, fileName))) {
      return true;
    }
  }
  return false;
}
