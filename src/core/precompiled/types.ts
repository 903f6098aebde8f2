/**
 * Precompiled binary resolution types
 */

/**
 * 매니페스트 플랫폼 엔트리
 */
export interface PlatformEntry {
  /** 플랫폼 이름 (비어있지 않음) */
  name: string;
  /** 이 플랫폼이 지원하는 타겟 트리플 */
  triples: string[];
  /** 아티팩트 파일명 (순서가 우선순위) */
  artifacts: string[];
}

/**
 * 검증된 릴리스 매니페스트
 */
export interface Manifest {
  /** build.id (있을 경우) */
  buildId?: string;
  platforms: PlatformEntry[];
}

export interface ArtifactSelection {
  platform: PlatformEntry;
  artifactName: string;
}

/** 링크 방식 */
export type LinkMode = 'dynamic' | 'static';

/**
 * 해석 결과 (호출마다 생성, 저장하지 않음)
 */
export type Resolution =
  | {
      kind: 'downloaded';
      /** 압축 해제된 라이브러리 경로 */
      file: string;
      buildId: string;
      targetTriple: string;
      artifactName: string;
    }
  | {
      kind: 'fallback';
      reason: string;
    }
  | {
      kind: 'fatal';
      reason: string;
      error: Error;
    };
