/**
 * manifest-client.ts 단위 테스트
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { CacheStore } from './cache-store';
import { ManifestFormatError, ManifestSignatureError } from './errors';
import { MANIFEST_FILE_NAME, ManifestClient, parseManifest } from './manifest-client';
import { createReleaseServer, makeTempDir, newTestKeys, testConfig } from '../../test-utils/fixtures';

const BUILD_ID = 'b1-0123';

const LIST_MANIFEST = JSON.stringify({
  build: { id: BUILD_ID },
  platforms: [
    { name: 'linux-x86_64', triples: ['x86_64-unknown-linux-gnu'], artifacts: ['demo-linux-x86_64.tar.gz'] },
  ],
});

describe('manifest-client', () => {
  describe('parseManifest', () => {
    it('리스트 형식', () => {
      expect(parseManifest(LIST_MANIFEST, BUILD_ID)).toEqual({
        buildId: BUILD_ID,
        platforms: [
          {
            name: 'linux-x86_64',
            triples: ['x86_64-unknown-linux-gnu'],
            artifacts: ['demo-linux-x86_64.tar.gz'],
          },
        ],
      });
    });

    it('targets 하위 키 형식', () => {
      const manifest = parseManifest(
        JSON.stringify({
          platforms: {
            default: 'linux',
            targets: [{ name: 'linux', triples: ['x86_64-unknown-linux-gnu'], artifacts: ['a.zip'] }],
          },
        })
      );
      expect(manifest.platforms.map((p) => p.name)).toEqual(['linux']);
      expect(manifest.buildId).toBeUndefined();
    });

    it('맵 형식은 값 순서 유지', () => {
      const manifest = parseManifest(
        JSON.stringify({
          platforms: {
            second: { name: 'mac', artifacts: ['m.zip'] },
            first: { name: 'win', artifacts: ['w.zip'] },
          },
        })
      );
      expect(manifest.platforms.map((p) => p.name)).toEqual(['mac', 'win']);
    });

    it('공백 제거와 빈 문자열 제거, 누락 목록은 빈 배열', () => {
      const manifest = parseManifest(
        JSON.stringify({ platforms: [{ name: ' linux ', artifacts: [' a.zip ', '', '  '] }] })
      );
      expect(manifest.platforms[0]).toEqual({ name: 'linux', triples: [], artifacts: ['a.zip'] });
    });

    it('JSON이 아니면 ManifestFormatError', () => {
      expect(() => parseManifest('not json')).toThrow(ManifestFormatError);
    });

    it('platforms 누락', () => {
      expect(() => parseManifest('{}')).toThrow('매니페스트 형식 오류: platforms is required');
    });

    it('name 없는 엔트리 거부', () => {
      expect(() => parseManifest(JSON.stringify({ platforms: { linux: { artifacts: ['a.zip'] } } }))).toThrow(
        '매니페스트 형식 오류: platform.name must be a non-empty string'
      );
    });

    it('문자열이 아닌 아티팩트 거부', () => {
      expect(() => parseManifest(JSON.stringify({ platforms: [{ name: 'linux', artifacts: [1] }] }))).toThrow(
        '매니페스트 형식 오류: platform "linux".artifacts must contain only strings'
      );
    });

    it('빌드 ID 불일치 거부', () => {
      expect(() => parseManifest(LIST_MANIFEST, 'b1-other')).toThrow(
        `매니페스트 형식 오류: build.id "${BUILD_ID}" does not match requested "b1-other"`
      );
    });

    it('루트가 객체가 아니면 거부', () => {
      expect(() => parseManifest('[]')).toThrow('매니페스트 형식 오류: manifest must be a JSON object');
    });
  });

  describe('ManifestClient', () => {
    let cacheDir: string;
    const keys = newTestKeys();
    const config = testConfig(keys);

    beforeEach(async () => {
      cacheDir = await makeTempDir('manifest');
    });

    afterEach(async () => {
      await fs.remove(cacheDir);
    });

    const createClient = (server: ReturnType<typeof createReleaseServer>) => {
      const store = new CacheStore({ cacheDir, client: server.client, retryDelay: 0 });
      return { store, client: new ManifestClient({ config, store }) };
    };

    it('서명 검증 후 파싱', async () => {
      const server = createReleaseServer(keys);
      server.publish(BUILD_ID, MANIFEST_FILE_NAME, LIST_MANIFEST);
      const { store, client } = createClient(server);

      const manifest = await client.fetchVerifiedManifest(BUILD_ID);

      expect(manifest.platforms).toHaveLength(1);
      expect(server.get).toHaveBeenCalledWith(server.urlFor(BUILD_ID, MANIFEST_FILE_NAME), expect.anything());
      expect(server.get).toHaveBeenCalledWith(server.urlFor(BUILD_ID, `${MANIFEST_FILE_NAME}.sig`), expect.anything());
      expect(await fs.pathExists(path.join(store.manifestDir(BUILD_ID), MANIFEST_FILE_NAME))).toBe(true);
    });

    it('두 번째 호출은 캐시 사용', async () => {
      const server = createReleaseServer(keys);
      server.publish(BUILD_ID, MANIFEST_FILE_NAME, LIST_MANIFEST);
      const { client } = createClient(server);

      await client.fetchVerifiedManifest(BUILD_ID);
      await client.fetchVerifiedManifest(BUILD_ID);

      expect(server.get).toHaveBeenCalledTimes(2);
    });

    it('변조된 매니페스트는 두 파일 모두 삭제', async () => {
      const server = createReleaseServer(keys);
      server.publish(BUILD_ID, MANIFEST_FILE_NAME, LIST_MANIFEST, { tamper: true });
      const { store, client } = createClient(server);

      await expect(client.fetchVerifiedManifest(BUILD_ID)).rejects.toBeInstanceOf(ManifestSignatureError);

      const manifestPath = path.join(store.manifestDir(BUILD_ID), MANIFEST_FILE_NAME);
      expect(await fs.pathExists(manifestPath)).toBe(false);
      expect(await fs.pathExists(`${manifestPath}.sig`)).toBe(false);
    });

    it('이전에 캐시된 변조 파일도 삭제', async () => {
      const server = createReleaseServer(keys);
      server.publish(BUILD_ID, MANIFEST_FILE_NAME, LIST_MANIFEST);
      const { store, client } = createClient(server);
      const manifestPath = path.join(store.manifestDir(BUILD_ID), MANIFEST_FILE_NAME);
      await fs.outputFile(manifestPath, '{"platforms":[]}');

      await expect(client.fetchVerifiedManifest(BUILD_ID)).rejects.toMatchObject({
        code: 'MANIFEST_SIGNATURE_INVALID',
        stage: 'manifest',
      });
      expect(await fs.pathExists(manifestPath)).toBe(false);

      // 재시도 시 원격 파일로 복구
      const manifest = await client.fetchVerifiedManifest(BUILD_ID);
      expect(manifest.platforms[0].name).toBe('linux-x86_64');
    });

    it('매니페스트가 없으면 NotFoundError', async () => {
      const { client } = createClient(createReleaseServer(keys));

      await expect(client.fetchVerifiedManifest(BUILD_ID)).rejects.toMatchObject({
        code: 'NOT_FOUND',
        stage: 'manifest',
      });
    });
  });
});
