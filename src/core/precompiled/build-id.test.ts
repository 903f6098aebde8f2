/**
 * build-id.ts 단위 테스트
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import {
  canonicalBuildInputs,
  collectBuildInputs,
  computeBuildId,
  findLockFile,
  hashBuildInputs,
} from './build-id';
import { BuildInputMissingError } from './errors';
import { makeTempDir, writeCrate } from '../../test-utils/fixtures';

describe('build-id', () => {
  describe('canonicalBuildInputs', () => {
    it('이름순 정렬과 고정 키 순서', () => {
      expect(
        canonicalBuildInputs([
          { name: 'b', value: '2' },
          { name: 'a', value: null },
        ])
      ).toBe(
        '{"inputs":[{"affects_abi":true,"name":"a","value":null},{"affects_abi":true,"name":"b","value":"2"}],"version":"b1"}'
      );
    });
  });

  describe('hashBuildInputs', () => {
    it('정규 직렬화의 sha256', () => {
      expect(
        hashBuildInputs([
          { name: 'b', value: '2' },
          { name: 'a', value: null },
        ])
      ).toBe('b1-5df8d376bae93d5fab84f6f38167568db8dde8983c8ef6179da9f7fa188590d4');
    });

    it('입력 순서와 무관', () => {
      const a = hashBuildInputs([
        { name: 'x', value: '1' },
        { name: 'y', value: '2' },
      ]);
      const b = hashBuildInputs([
        { name: 'y', value: '2' },
        { name: 'x', value: '1' },
      ]);
      expect(a).toBe(b);
    });

    it('누락(null)과 빈 문자열을 구분', () => {
      expect(hashBuildInputs([{ name: 'x', value: null }])).not.toBe(hashBuildInputs([{ name: 'x', value: '' }]));
    });
  });

  describe('computeBuildId', () => {
    let crateDir: string;

    beforeEach(async () => {
      crateDir = await makeTempDir('build-id');
    });

    afterEach(async () => {
      await fs.remove(crateDir);
    });

    it('고정 입력에 대한 빌드 ID', async () => {
      await writeCrate(crateDir);
      expect(await computeBuildId(crateDir)).toBe(
        'b1-7191968e936cad2fc1caae30b4c1619c42871452c8ba467c1251e003098878b7'
      );
    });

    it('같은 입력이면 같은 ID', async () => {
      await writeCrate(crateDir, { config: 'precompiled_binaries: {}\n' });
      expect(await computeBuildId(crateDir)).toBe(await computeBuildId(crateDir));
    });

    it('lock 파일 한 바이트 변경 시 ID 변경', async () => {
      await writeCrate(crateDir);
      const before = await computeBuildId(crateDir);
      await fs.writeFile(path.join(crateDir, 'Cargo.lock'), '# lock\nversion = 4\n');
      expect(await computeBuildId(crateDir)).not.toBe(before);
    });

    it('설정 파일 유무가 ID에 반영', async () => {
      await writeCrate(crateDir);
      const without = await computeBuildId(crateDir);
      await fs.writeFile(path.join(crateDir, 'binforge.yaml'), 'x: 1\n');
      expect(await computeBuildId(crateDir)).not.toBe(without);
    });

    it('인터페이스 정의 파일 반영', async () => {
      await writeCrate(crateDir);
      await fs.outputFile(path.join(crateDir, 'src', 'api.udl'), 'namespace demo {};\n');

      const inputs = await collectBuildInputs(crateDir, { interfaceDefinitionPath: 'src/api.udl' });
      expect(inputs.find((input) => input.name === 'uniffi.udl')?.value).toBe('namespace demo {};\n');

      const withUdl = await computeBuildId(crateDir, { interfaceDefinitionPath: 'src/api.udl' });
      expect(withUdl).not.toBe(await computeBuildId(crateDir));
    });

    it('타겟 트리플 입력은 항상 null', async () => {
      await writeCrate(crateDir);
      const inputs = await collectBuildInputs(crateDir);
      expect(inputs.find((input) => input.name === 'rust.target_triple')).toEqual({
        name: 'rust.target_triple',
        value: null,
      });
    });

    it('Cargo.toml이 없으면 BuildInputMissingError', async () => {
      await fs.writeFile(path.join(crateDir, 'Cargo.lock'), 'x');
      await expect(computeBuildId(crateDir)).rejects.toMatchObject({
        code: 'BUILD_INPUT_MISSING',
        fileName: 'Cargo.toml',
        stage: 'build-id',
      });
    });
  });

  describe('findLockFile', () => {
    let rootDir: string;

    beforeEach(async () => {
      rootDir = await makeTempDir('lock');
    });

    afterEach(async () => {
      await fs.remove(rootDir);
    });

    it('상위 워크스페이스의 lock 파일 탐색', async () => {
      await fs.writeFile(path.join(rootDir, 'Cargo.lock'), 'workspace-lock');
      const memberDir = path.join(rootDir, 'crates', 'member');
      await fs.ensureDir(memberDir);

      expect(await findLockFile(memberDir)).toBe('workspace-lock');
    });

    it('가장 가까운 lock 파일 우선', async () => {
      await fs.writeFile(path.join(rootDir, 'Cargo.lock'), 'outer');
      const memberDir = path.join(rootDir, 'member');
      await fs.outputFile(path.join(memberDir, 'Cargo.lock'), 'inner');

      expect(await findLockFile(memberDir)).toBe('inner');
    });

    it('어디에도 없으면 BuildInputMissingError', async () => {
      // tmpdir 상위에 Cargo.lock이 없다고 가정
      await expect(findLockFile(rootDir)).rejects.toBeInstanceOf(BuildInputMissingError);
    });
  });
});
