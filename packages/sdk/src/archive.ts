/**
 * Archive extraction into a repository
 *
 * Formats are detected from magic bytes, not file names:
 * - zip: "PK\x03\x04" (or "PK\x05\x06" for an empty archive)
 * - gzip: 0x1f 0x8b, extracted as a compressed tarball
 * - tar: "ustar" at offset 257
 */

import { open } from "node:fs/promises";
import AdmZip from "adm-zip";
import { extract } from "tar";

export type ArchiveFormat = "zip" | "tar.gz" | "tar";

const HEADER_BYTES = 512;
const USTAR_OFFSET = 257;

/**
 * Identify an archive from its first bytes
 * @returns The format, or `null` when the file is not a supported archive
 */
export async function detectArchiveFormat(file: string): Promise<ArchiveFormat | null> {
  const handle = await open(file, "r");
  let header: Buffer;
  try {
    const buffer = Buffer.alloc(HEADER_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, HEADER_BYTES, 0);
    header = buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }

  if (
    header.length >= 4 &&
    header[0] === 0x50 &&
    header[1] === 0x4b &&
    ((header[2] === 0x03 && header[3] === 0x04) || (header[2] === 0x05 && header[3] === 0x06))
  ) {
    return "zip";
  }

  if (header.length >= 2 && header[0] === 0x1f && header[1] === 0x8b) {
    return "tar.gz";
  }

  if (header.toString("latin1", USTAR_OFFSET, USTAR_OFFSET + 5) === "ustar") {
    return "tar";
  }

  return null;
}

/**
 * Extract `file` into `destination`, overwriting existing entries
 * @throws Error when the format is unsupported or the archive is corrupt
 */
export async function extractArchive(file: string, destination: string): Promise<ArchiveFormat> {
  const format = await detectArchiveFormat(file);

  switch (format) {
    case "zip":
      new AdmZip(file).extractAllTo(destination, true);
      break;
    case "tar":
    case "tar.gz":
      // strict turns recoverable tar warnings into failures
      await extract({ file, cwd: destination, strict: true });
      break;
    case null:
      throw new Error(`Unsupported archive format: ${file}`);
  }

  return format;
}
