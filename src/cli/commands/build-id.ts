import chalk from 'chalk';
import { computeBuildId, isPrecompiledError } from '../../core/precompiled';
import { EXIT_OK, EXIT_USAGE, resolveCrateDir } from '../context';

export interface BuildIdCommandOptions {
  crateDir?: string;
  interfaceDefinition?: string;
}

/**
 * 빌드 ID 출력 (stdout에는 ID만 출력)
 */
export async function buildIdCommand(options: BuildIdCommandOptions): Promise<number> {
  try {
    const buildId = await computeBuildId(resolveCrateDir(options.crateDir), {
      interfaceDefinitionPath: options.interfaceDefinition,
    });
    console.log(buildId);
    return EXIT_OK;
  } catch (error) {
    if (isPrecompiledError(error)) {
      console.error(chalk.red(error.message));
      return EXIT_USAGE;
    }
    throw error;
  }
}
