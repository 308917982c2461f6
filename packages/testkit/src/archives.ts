/**
 * Archive fixture builders
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import AdmZip from "adm-zip";
import { create } from "tar";
import { createTempDir, removeDir } from "./fs.js";

/**
 * Relative file path → text content
 */
export type ArchiveEntries = Record<string, string>;

async function stageEntries(entries: ArchiveEntries): Promise<string> {
  const staging = await createTempDir("modelrepo-archive-");
  for (const [name, content] of Object.entries(entries)) {
    const target = join(staging, name);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }
  return staging;
}

/**
 * Write a tarball at `archivePath` holding `entries`
 * @param gzip - Compress the tarball (default: true)
 */
export async function writeTarArchive(
  archivePath: string,
  entries: ArchiveEntries,
  gzip = true
): Promise<string> {
  const staging = await stageEntries(entries);
  try {
    await create({ file: archivePath, cwd: staging, gzip, portable: true }, Object.keys(entries));
  } finally {
    await removeDir(staging);
  }
  return archivePath;
}

/**
 * Write a zip archive at `archivePath` holding `entries`
 */
export function writeZipArchive(archivePath: string, entries: ArchiveEntries): string {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.addFile(name, Buffer.from(content, "utf-8"));
  }
  zip.writeZip(archivePath);
  return archivePath;
}
