/**
 * draftline - a modal text-editing engine for terminal writing tools
 *
 * Main entry point exporting core types, the session, persistence and
 * configuration.
 */

// =============================================================================
// Types
// =============================================================================

export * from './types/index.ts';

// =============================================================================
// Store
// =============================================================================

export * from './store/index.ts';

// =============================================================================
// Persistence
// =============================================================================

export type { FileSystem } from './persistence/filesystem.ts';
export { NodeFileSystem } from './persistence/node-fs.ts';
export { InMemoryFileSystem } from './persistence/in-memory-fs.ts';
export {
  loadDocument,
  saveDocument,
  writeBackup,
  backupPath,
  BACKUP_SUFFIX,
  TEMP_SUFFIX,
} from './persistence/document-file.ts';
export type { LoadedDocument } from './persistence/document-file.ts';
export { createVersionStore, makePreview } from './persistence/version-store.ts';
export type { VersionStore, VersionStoreOptions, VersionEntry } from './persistence/version-store.ts';
export { diffLines, summarize, splitLines } from './persistence/line-diff.ts';
export type { LineDiffSummary } from './persistence/line-diff.ts';
export { loadStats, saveStats } from './persistence/stats-store.ts';
export type { StatsFile } from './persistence/stats-store.ts';

// =============================================================================
// Configuration
// =============================================================================

export { resolveConfig, withConfig, DEFAULT_CONFIG } from './config/config.ts';
export type { ConfigInput } from './config/config.ts';

// =============================================================================
// Complexity-stratified API
// =============================================================================

export { query, scan } from './api/index.ts';
