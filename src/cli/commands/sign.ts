import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';
import { decodeHex } from '../../core/config';
import { PRIVATE_KEY_SIZE, PUBLIC_KEY_SIZE, SIGNATURE_SUFFIX, signMessage } from '../../core/precompiled';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE } from '../context';

export interface SignOptions {
  privateKey?: string;
  out?: string;
}

/**
 * 파일의 분리 서명(.sig) 생성
 */
export async function signCommand(file: string, options: SignOptions): Promise<number> {
  const key = options.privateKey ? decodeHex(options.privateKey) : null;
  if (!key || (key.length !== PRIVATE_KEY_SIZE && key.length !== PUBLIC_KEY_SIZE)) {
    console.error(chalk.red(`--private-key는 ${PRIVATE_KEY_SIZE}바이트(또는 ${PUBLIC_KEY_SIZE}바이트 seed) hex여야 합니다`));
    return EXIT_USAGE;
  }

  const filePath = path.resolve(file);
  if (!(await fs.pathExists(filePath))) {
    console.error(chalk.red(`파일이 없습니다: ${filePath}`));
    return EXIT_FAILURE;
  }

  const content = await fs.readFile(filePath);
  let signature: Buffer;
  try {
    signature = signMessage(key, content);
  } catch (error) {
    console.error(chalk.red(`서명 실패: ${error instanceof Error ? error.message : String(error)}`));
    return EXIT_USAGE;
  }
  const outPath = options.out ? path.resolve(options.out) : `${filePath}${SIGNATURE_SUFFIX}`;
  await fs.outputFile(outPath, signature);

  console.log(chalk.green(`✓ 서명 생성: ${outPath}`));
  return EXIT_OK;
}
