import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs-extra';
import { buildIdCommand } from './build-id';
import { makeTempDir, writeCrate } from '../../test-utils/fixtures';

describe('build-id 명령어', () => {
  let crateDir: string;

  beforeEach(async () => {
    crateDir = await makeTempDir('build-id-cli');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(crateDir);
  });

  it('빌드 ID만 출력', async () => {
    await writeCrate(crateDir);
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    expect(await buildIdCommand({ crateDir })).toBe(0);
    expect(logSpy).toHaveBeenCalledWith('b1-7191968e936cad2fc1caae30b4c1619c42871452c8ba467c1251e003098878b7');
  });

  it('필수 입력이 없으면 2', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(await buildIdCommand({ crateDir })).toBe(2);
    expect(errorSpy.mock.calls.flat().join('\n')).toContain('필수 파일이 없습니다: Cargo.toml');
  });
});
