import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { ArtifactClient } from './artifact-client';
import { CacheStore } from './cache-store';
import { ArtifactSignatureError, NotFoundError } from './errors';
import { createReleaseServer, makeTempDir, newTestKeys, testConfig } from '../../test-utils/fixtures';

const BUILD_ID = 'b1-artifact';
const ARTIFACT = 'demo-linux-x86_64.tar.gz';

describe('artifact-client', () => {
  let cacheDir: string;
  const keys = newTestKeys();

  beforeEach(async () => {
    cacheDir = await makeTempDir('artifact');
  });

  afterEach(async () => {
    await fs.remove(cacheDir);
  });

  const createClient = (server: ReturnType<typeof createReleaseServer>) => {
    const store = new CacheStore({ cacheDir, client: server.client, retryDelay: 0 });
    return { store, client: new ArtifactClient({ config: testConfig(keys), store }) };
  };

  it('검증된 아카이브 경로 반환', async () => {
    const server = createReleaseServer(keys);
    server.publish(BUILD_ID, ARTIFACT, Buffer.from('archive-bytes'));
    const { store, client } = createClient(server);

    const filePath = await client.fetchVerifiedArtifact(BUILD_ID, ARTIFACT);

    expect(filePath).toBe(path.join(store.artifactDir(BUILD_ID), ARTIFACT));
    expect(await fs.readFile(filePath, 'utf-8')).toBe('archive-bytes');
    expect(await fs.pathExists(`${filePath}.sig`)).toBe(true);
  });

  it('변조된 아카이브는 삭제 후 ArtifactSignatureError', async () => {
    const server = createReleaseServer(keys);
    server.publish(BUILD_ID, ARTIFACT, Buffer.from('archive-bytes'), { tamper: true });
    const { store, client } = createClient(server);

    await expect(client.fetchVerifiedArtifact(BUILD_ID, ARTIFACT)).rejects.toBeInstanceOf(ArtifactSignatureError);

    expect(await fs.readdir(store.artifactDir(BUILD_ID))).toEqual([]);
  });

  it('다른 키로 서명된 아카이브 거부', async () => {
    const server = createReleaseServer(newTestKeys());
    server.publish(BUILD_ID, ARTIFACT, Buffer.from('archive-bytes'));
    const { client } = createClient(server);

    await expect(client.fetchVerifiedArtifact(BUILD_ID, ARTIFACT)).rejects.toMatchObject({
      code: 'ARTIFACT_SIGNATURE_INVALID',
      artifactName: ARTIFACT,
    });
  });

  it('서명 파일이 없으면 NotFoundError', async () => {
    const server = createReleaseServer(keys);
    server.publish(BUILD_ID, ARTIFACT, Buffer.from('archive-bytes'), { withoutSignature: true });
    const { client } = createClient(server);

    await expect(client.fetchVerifiedArtifact(BUILD_ID, ARTIFACT)).rejects.toBeInstanceOf(NotFoundError);
  });
});
