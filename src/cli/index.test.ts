import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs-extra';
import { createProgram, main } from './index';
import { createCliLogger } from './context';
import { makeTempDir, writeCrate } from '../test-utils/fixtures';

describe('binforge CLI', () => {
  beforeEach(() => {
    process.exitCode = undefined;
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('명령어 목록', () => {
    const names = createProgram().commands.map((command) => command.name());
    expect(names).toEqual(['validate', 'resolve', 'build-id', 'keygen', 'sign', 'cache']);
  });

  it('알 수 없는 명령어는 종료 코드 2', async () => {
    await main(['node', 'binforge', 'unknown-command']);
    expect(process.exitCode).toBe(2);
  });

  it('알 수 없는 옵션은 종료 코드 2', async () => {
    await main(['node', 'binforge', 'validate', '--no-such-option']);
    expect(process.exitCode).toBe(2);
  });

  it('--version은 종료 코드 0', async () => {
    await main(['node', 'binforge', '--version']);
    expect(process.exitCode).toBe(0);
  });

  it('명령어 종료 코드 전달', async () => {
    const crateDir = await makeTempDir('cli');
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    try {
      await writeCrate(crateDir);
      await main(['node', 'binforge', 'build-id', '--crate-dir', crateDir]);
      expect(process.exitCode).toBe(0);
      expect(logSpy).toHaveBeenCalledWith('b1-7191968e936cad2fc1caae30b4c1619c42871452c8ba467c1251e003098878b7');
    } finally {
      await fs.remove(crateDir);
    }
  });

  it('BINFORGE_VERBOSE=1이면 debug 레벨', () => {
    expect(createCliLogger({}, { BINFORGE_VERBOSE: '1' }).level).toBe('debug');
    expect(createCliLogger({ verbose: true }, {}).level).toBe('debug');
    expect(createCliLogger({}, {}).level).toBe('info');
  });
});
