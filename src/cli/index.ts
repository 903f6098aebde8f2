#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { createCliLogger, EXIT_OK, EXIT_USAGE, GlobalOptions } from './context';

// 버전 정보
const VERSION = '0.1.0';

/**
 * CLI 프로그램 생성 (종료 코드는 process.exitCode로 전달)
 */
export function createProgram(): Command {
  const program = new Command();

  const finish = (code: number): void => {
    process.exitCode = code;
  };

  program
    .name('binforge')
    .description(chalk.cyan('binforge - 서명된 사전 빌드 네이티브 라이브러리 해석기'))
    .version(VERSION, '-v, --version', '버전 정보 표시')
    .helpOption('-h, --help', '도움말 표시')
    .option('--verbose', '디버그 로그 출력 (BINFORGE_VERBOSE=1과 동일)')
    .option('--log-dir <path>', '일별 로그 파일 디렉토리');

  const logger = (): ReturnType<typeof createCliLogger> => createCliLogger(program.opts<GlobalOptions>());

  // validate 명령어
  program
    .command('validate')
    .description('매니페스트와 아티팩트 서명 검증')
    .option('-C, --crate-dir <path>', 'crate 디렉토리')
    .option('-b, --build-id <id>', '빌드 ID (기본: 입력 파일 해시)')
    .option('-t, --target <triple>', '타겟 트리플 (기본: 호스트)')
    .action(async (options) => {
      const { validateCommand } = await import('./commands/validate');
      finish(await validateCommand(options, { logger: logger() }));
    });

  // resolve 명령어
  program
    .command('resolve')
    .description('사전 빌드 라이브러리 해석 (폴백 정책 적용)')
    .option('-C, --crate-dir <path>', 'crate 디렉토리')
    .option('-b, --build-id <id>', '빌드 ID (기본: 입력 파일 해시)')
    .option('-t, --target <triple>', '타겟 트리플 (기본: 호스트)')
    .option('-l, --link-mode <mode>', '링크 방식 (dynamic, static)', 'dynamic')
    .action(async (options) => {
      const { resolveCommand } = await import('./commands/resolve');
      finish(await resolveCommand(options, { logger: logger() }));
    });

  // build-id 명령어
  program
    .command('build-id')
    .description('빌드 ID 계산')
    .option('-C, --crate-dir <path>', 'crate 디렉토리')
    .option('-i, --interface-definition <path>', '인터페이스 정의 파일 (crate 디렉토리 기준)')
    .action(async (options) => {
      const { buildIdCommand } = await import('./commands/build-id');
      finish(await buildIdCommand(options));
    });

  // keygen 명령어
  program
    .command('keygen')
    .description('Ed25519 서명 키 쌍 생성')
    .action(async () => {
      const { keygenCommand } = await import('./commands/keygen');
      finish(keygenCommand());
    });

  // sign 명령어
  program
    .command('sign')
    .description('파일의 분리 서명(.sig) 생성')
    .argument('<file>', '서명할 파일')
    .option('-k, --private-key <hex>', '개인키 (hex)')
    .option('-o, --out <path>', '서명 파일 경로 (기본: <file>.sig)')
    .action(async (file: string, options) => {
      const { signCommand } = await import('./commands/sign');
      finish(await signCommand(file, options));
    });

  // cache 명령어
  program
    .command('cache')
    .description('캐시 관리')
    .addCommand(
      new Command('clear')
        .description('빌드 ID 캐시 삭제')
        .option('-b, --build-id <id>', '빌드 ID')
        .option('-C, --crate-dir <path>', 'crate 디렉토리')
        .option('--cache-dir <path>', '캐시 디렉토리 (기본: <crate-dir>/.binforge)')
        .action(async (options) => {
          const { cacheClear } = await import('./commands/cache');
          finish(await cacheClear(options));
        })
    )
    .addCommand(
      new Command('list')
        .description('캐시된 빌드 목록')
        .option('-C, --crate-dir <path>', 'crate 디렉토리')
        .option('--cache-dir <path>', '캐시 디렉토리 (기본: <crate-dir>/.binforge)')
        .action(async (options) => {
          const { cacheList } = await import('./commands/cache');
          finish(await cacheList(options));
        })
    );

  return program;
}

/**
 * 인자 파싱 및 실행
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  // 에러 핸들링: 인자 오류는 종료 코드 2
  program.exitOverride();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      const helpOrVersion =
        error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.help' ||
        error.code === 'commander.version';
      process.exitCode = helpOrVersion ? EXIT_OK : EXIT_USAGE;
      return;
    }
    throw error;
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = 1;
  });
}
