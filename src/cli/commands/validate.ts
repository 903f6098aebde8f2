import chalk from 'chalk';
import Table from 'cli-table3';
import { CONFIG_FILE_NAME, loadPrecompiledConfig } from '../../core/config';
import {
  computeBuildId,
  createPrecompiledServices,
  detectHostTargetTriple,
  HttpClient,
  isPrecompiledError,
  selectArtifact,
} from '../../core/precompiled';
import { createSilentLogger, Logger } from '../../utils/logger';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, resolveCrateDir } from '../context';

// validate 옵션
export interface ValidateOptions {
  crateDir?: string;
  buildId?: string;
  target?: string;
}

export interface CommandDeps {
  logger?: Logger;
  client?: HttpClient;
  retryDelay?: number;
  env?: NodeJS.ProcessEnv;
}

/**
 * validate 명령어 핸들러
 * 매니페스트와 아티팩트 서명을 모두 검증한다 (압축 해제와 폴백 정책은 적용하지 않음)
 */
export async function validateCommand(options: ValidateOptions, deps: CommandDeps = {}): Promise<number> {
  const logger = deps.logger ?? createSilentLogger();
  const crateDir = resolveCrateDir(options.crateDir);

  let buildId: string;
  let target: string;
  let services: ReturnType<typeof createPrecompiledServices>;

  try {
    const config = await loadPrecompiledConfig(crateDir, { env: deps.env });
    if (!config) {
      console.error(chalk.red(`${CONFIG_FILE_NAME}에 precompiled_binaries 설정이 없습니다`));
      return EXIT_USAGE;
    }
    buildId = options.buildId ?? (await computeBuildId(crateDir));
    target = options.target ?? detectHostTargetTriple();
    services = createPrecompiledServices(config, {
      projectDir: crateDir,
      client: deps.client,
      retryDelay: deps.retryDelay,
      logger,
    });
  } catch (error) {
    if (isPrecompiledError(error)) {
      console.error(chalk.red(`설정 오류: ${error.message}`));
      return EXIT_USAGE;
    }
    throw error;
  }

  try {
    const manifest = await services.manifests.fetchVerifiedManifest(buildId);
    const selection = selectArtifact(manifest, target);
    const archivePath = await services.artifacts.fetchVerifiedArtifact(buildId, selection.artifactName);

    const table = new Table({
      head: [chalk.cyan('항목'), chalk.cyan('값')],
    });
    table.push(
      ['crateDir', crateDir],
      ['buildId', buildId],
      ['target', target],
      ['platform', selection.platform.name],
      ['artifact', selection.artifactName],
      ['path', archivePath]
    );

    console.log(chalk.green('✓ 사전 빌드 아티팩트 검증 완료'));
    console.log(table.toString());
    return EXIT_OK;
  } catch (error) {
    if (isPrecompiledError(error)) {
      console.error(chalk.red(`검증 실패 [${error.stage}/${error.code}]: ${error.message}`));
      return EXIT_FAILURE;
    }
    throw error;
  }
}
