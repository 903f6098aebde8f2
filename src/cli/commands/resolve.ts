import chalk from 'chalk';
import { loadPrecompiledConfig } from '../../core/config';
import { isPrecompiledError, LinkMode, resolvePrecompiled } from '../../core/precompiled';
import { createSilentLogger } from '../../utils/logger';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, resolveCrateDir } from '../context';
import type { CommandDeps } from './validate';

export interface ResolveOptions {
  crateDir?: string;
  buildId?: string;
  target?: string;
  linkMode?: string;
}

export interface ResolveDeps extends CommandDeps {
  detectToolchain?: () => Promise<boolean>;
}

function parseLinkMode(raw: string | undefined): LinkMode | null {
  if (raw === undefined) {
    return 'dynamic';
  }
  return raw === 'dynamic' || raw === 'static' ? raw : null;
}

/**
 * resolve 명령어 핸들러
 * 폴백 정책까지 적용한 최종 결과를 출력한다
 */
export async function resolveCommand(options: ResolveOptions, deps: ResolveDeps = {}): Promise<number> {
  const logger = deps.logger ?? createSilentLogger();
  const crateDir = resolveCrateDir(options.crateDir);

  const linkMode = parseLinkMode(options.linkMode);
  if (!linkMode) {
    console.error(chalk.red(`--link-mode는 dynamic 또는 static이어야 합니다: ${options.linkMode}`));
    return EXIT_USAGE;
  }

  let config: Awaited<ReturnType<typeof loadPrecompiledConfig>>;
  try {
    config = await loadPrecompiledConfig(crateDir, { env: deps.env });
  } catch (error) {
    if (isPrecompiledError(error)) {
      console.error(chalk.red(`설정 오류: ${error.message}`));
      return EXIT_USAGE;
    }
    throw error;
  }

  const resolution = await resolvePrecompiled({
    config,
    projectDir: crateDir,
    buildId: options.buildId,
    targetTriple: options.target,
    linkMode,
    client: deps.client,
    retryDelay: deps.retryDelay,
    detectToolchain: deps.detectToolchain,
    logger,
  });

  switch (resolution.kind) {
    case 'downloaded':
      console.log(`downloaded ${resolution.file}`);
      return EXIT_OK;
    case 'fallback':
      console.log(`fallback ${resolution.reason}`);
      return EXIT_OK;
    case 'fatal':
      console.error(chalk.red(`fatal ${resolution.reason}`));
      return EXIT_FAILURE;
  }
}
