/**
 * Target triple helpers
 */

import type { LinkMode } from './types';

// Node arch -> 트리플 아키텍처
const ARCH_MAP: Record<string, string> = {
  x64: 'x86_64',
  arm64: 'aarch64',
  arm: 'armv7',
  ia32: 'i686',
};

/**
 * 현재 호스트의 타겟 트리플
 */
export function detectHostTargetTriple(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch
): string {
  const cpu = ARCH_MAP[arch] ?? 'x86_64';

  switch (platform) {
    case 'darwin':
      return `${cpu === 'aarch64' ? 'aarch64' : 'x86_64'}-apple-darwin`;
    case 'win32':
      return `${cpu === 'aarch64' ? 'aarch64' : cpu === 'i686' ? 'i686' : 'x86_64'}-pc-windows-msvc`;
    case 'android':
      return cpu === 'armv7' ? 'armv7-linux-androideabi' : `${cpu}-linux-android`;
    case 'linux':
      return cpu === 'armv7' ? 'armv7-unknown-linux-gnueabihf' : `${cpu}-unknown-linux-gnu`;
    default:
      return 'x86_64-unknown-linux-gnu';
  }
}

type TargetOS = 'windows' | 'apple' | 'unix';

function targetOS(targetTriple: string): TargetOS {
  if (targetTriple.includes('-windows')) {
    return 'windows';
  }
  if (targetTriple.includes('-apple-')) {
    return 'apple';
  }
  return 'unix';
}

/**
 * 타겟과 링크 방식에 맞는 라이브러리 확장자
 */
export function libraryExtensionFor(targetTriple: string, linkMode: LinkMode = 'dynamic'): string {
  const os = targetOS(targetTriple);

  if (linkMode === 'static') {
    return os === 'windows' && targetTriple.endsWith('-msvc') ? '.lib' : '.a';
  }

  switch (os) {
    case 'windows':
      return '.dll';
    case 'apple':
      return '.dylib';
    default:
      return '.so';
  }
}
