// Vault directory layout
import fs from 'fs/promises';
import path from 'path';
import type { VaultSettings } from '@/lib/config/settings';

export interface VaultPaths {
  root: string;
  attachments: string;
  diary: string;
  notes: string;
}

export function resolveVaultPaths(vault: VaultSettings): VaultPaths {
  const root = path.resolve(vault.rootPath);
  return {
    root,
    attachments: path.join(root, vault.attachmentsFolder),
    diary: path.join(root, vault.diaryFolder),
    notes: path.join(root, vault.notesFolder),
  };
}

// Create the vault subfolders if absent
export async function initializeVault(paths: VaultPaths): Promise<void> {
  await fs.mkdir(paths.attachments, { recursive: true });
  await fs.mkdir(paths.diary, { recursive: true });
  await fs.mkdir(paths.notes, { recursive: true });
}

/**
 * Vault-relative path with forward slashes, as used inside [[wiki links]].
 * Pass stripExtension to drop the trailing file extension.
 */
export function toVaultLink(paths: VaultPaths, filePath: string, stripExtension = false): string {
  let relative = path.relative(paths.root, filePath).split(path.sep).join('/');
  if (stripExtension) {
    const ext = path.posix.extname(relative);
    if (ext) {
      relative = relative.slice(0, -ext.length);
    }
  }
  return relative;
}
