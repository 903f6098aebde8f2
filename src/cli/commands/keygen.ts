import chalk from 'chalk';
import { generateKeyPair } from '../../core/precompiled';
import { EXIT_OK } from '../context';

/**
 * 서명 키 쌍 생성
 */
export function keygenCommand(): number {
  const { publicKey, privateKey } = generateKeyPair();

  console.log(`public_key=${publicKey.toString('hex')}`);
  console.log(`private_key=${privateKey.toString('hex')}`);
  console.error(chalk.yellow('private_key는 릴리스 서명에만 사용하고 저장소에 커밋하지 마세요'));
  return EXIT_OK;
}
