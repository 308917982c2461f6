export { createTempDir, removeDir, withTempDir, withTempRepository } from "./fs.js";
export { writeTarArchive, writeZipArchive } from "./archives.js";
export type { ArchiveEntries } from "./archives.js";
export { createRecordingLogger } from "./logger.js";
export type { RecordedLog, RecordingLogger } from "./logger.js";
