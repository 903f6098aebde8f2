import { ArtifactNotFoundError, PlatformNotFoundError } from './errors';
import type { ArtifactSelection, Manifest, PlatformEntry } from './types';

/**
 * 엔트리가 타겟과 일치하는지 (이름 또는 triples 포함)
 */
export function matchesTarget(platform: PlatformEntry, targetTriple: string): boolean {
  return platform.name === targetTriple || platform.triples.includes(targetTriple);
}

/**
 * 캐시 디렉토리를 벗어날 수 없는 단순 파일명인지
 */
function isPlainFileName(name: string): boolean {
  return name !== '.' && name !== '..' && !/[\\/]/.test(name);
}

/**
 * 타겟 트리플에 맞는 아티팩트 선택
 * 매니페스트 순서대로 검사해 첫 번째 일치 엔트리의 첫 번째 아티팩트를 사용한다
 */
export function selectArtifact(manifest: Manifest, targetTriple: string): ArtifactSelection {
  const platform = manifest.platforms.find((entry) => matchesTarget(entry, targetTriple));
  if (!platform) {
    throw new PlatformNotFoundError(targetTriple);
  }

  const artifactName = platform.artifacts[0];
  if (artifactName === undefined) {
    throw new ArtifactNotFoundError(platform.name);
  }
  if (!isPlainFileName(artifactName)) {
    throw new ArtifactNotFoundError(platform.name, `잘못된 아티팩트 이름 "${artifactName}"`);
  }

  return { platform, artifactName };
}
