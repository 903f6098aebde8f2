import { describe, it, expect } from 'vitest';
import { ArtifactNotFoundError, PlatformNotFoundError } from './errors';
import { matchesTarget, selectArtifact } from './platform-matcher';
import type { Manifest } from './types';

const manifest: Manifest = {
  platforms: [
    {
      name: 'linux-x86_64',
      triples: ['x86_64-unknown-linux-gnu', 'x86_64-unknown-linux-musl'],
      artifacts: ['demo-linux-x86_64.tar.gz', 'demo-linux-x86_64.zip'],
    },
    { name: 'aarch64-apple-darwin', triples: [], artifacts: ['demo-macos.zip'] },
    { name: 'windows', triples: ['x86_64-pc-windows-msvc'], artifacts: [] },
    { name: 'linux-x86_64-dup', triples: ['x86_64-unknown-linux-gnu'], artifacts: ['other.tar.gz'] },
    { name: 'evil', triples: ['riscv64gc-unknown-linux-gnu'], artifacts: ['../escape.zip'] },
  ],
};

describe('platform-matcher', () => {
  it('triples 일치 시 첫 번째 아티팩트 선택', () => {
    const selection = selectArtifact(manifest, 'x86_64-unknown-linux-gnu');
    expect(selection.platform.name).toBe('linux-x86_64');
    expect(selection.artifactName).toBe('demo-linux-x86_64.tar.gz');
  });

  it('플랫폼 이름과 일치해도 선택', () => {
    expect(selectArtifact(manifest, 'aarch64-apple-darwin').artifactName).toBe('demo-macos.zip');
  });

  it('일치하는 플랫폼이 없으면 PlatformNotFoundError', () => {
    expect(() => selectArtifact(manifest, 'wasm32-unknown-unknown')).toThrow(PlatformNotFoundError);
  });

  it('아티팩트가 비어있으면 ArtifactNotFoundError', () => {
    expect(() => selectArtifact(manifest, 'x86_64-pc-windows-msvc')).toThrow(
      new ArtifactNotFoundError('windows')
    );
  });

  it('경로가 포함된 아티팩트 이름 거부', () => {
    expect(() => selectArtifact(manifest, 'riscv64gc-unknown-linux-gnu')).toThrow(
      '플랫폼 "evil": 잘못된 아티팩트 이름 "../escape.zip"'
    );
  });

  it('matchesTarget', () => {
    const [linux] = manifest.platforms;
    expect(matchesTarget(linux, 'x86_64-unknown-linux-musl')).toBe(true);
    expect(matchesTarget(linux, 'linux-x86_64')).toBe(true);
    expect(matchesTarget(linux, 'aarch64-unknown-linux-gnu')).toBe(false);
  });
});
