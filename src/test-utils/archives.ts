/**
 * 테스트용 아카이브 생성 (zip: archiver, tar.gz: tar)
 */

import archiver from 'archiver';
import * as fs from 'fs-extra';
import * as path from 'path';
import * as tar from 'tar';

export type ArchiveFiles = Record<string, string | Buffer>;

async function stageFiles(stagingDir: string, files: ArchiveFiles): Promise<void> {
  await fs.emptyDir(stagingDir);
  for (const [name, content] of Object.entries(files)) {
    await fs.outputFile(path.join(stagingDir, name), content);
  }
}

/**
 * ZIP 아카이브 생성
 */
export async function createZipArchive(outputPath: string, files: ArchiveFiles): Promise<Buffer> {
  const stagingDir = `${outputPath}.staging`;
  await stageFiles(stagingDir, files);
  await fs.ensureDir(path.dirname(outputPath));

  try {
    await new Promise<void>((resolve, reject) => {
      const output = fs.createWriteStream(outputPath);
      const archive = archiver('zip', { zlib: { level: 9 } });

      output.on('close', () => resolve());
      archive.on('error', (err) => reject(err));

      archive.pipe(output);
      archive.directory(stagingDir, false);
      archive.finalize().catch(reject);
    });
  } finally {
    await fs.remove(stagingDir);
  }

  return fs.readFile(outputPath);
}

/**
 * TAR.GZ 아카이브 생성
 */
export async function createTarGzArchive(outputPath: string, files: ArchiveFiles): Promise<Buffer> {
  const stagingDir = `${outputPath}.staging`;
  await stageFiles(stagingDir, files);
  await fs.ensureDir(path.dirname(outputPath));

  try {
    await tar.create({ gzip: true, file: outputPath, cwd: stagingDir }, await fs.readdir(stagingDir));
  } finally {
    await fs.remove(stagingDir);
  }

  return fs.readFile(outputPath);
}
