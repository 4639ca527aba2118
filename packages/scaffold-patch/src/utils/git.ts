import * as fs from 'fs';
import { simpleGit } from 'simple-git';

export async function isRepo(dir: string): Promise<boolean> {
  if (!fs.existsSync(dir)) return false;
  try {
    const git = simpleGit(dir);
    return await git.checkIsRepo();
  } catch {
    return false;
  }
}

/** `scaffold-patch-backup-YYYYMMDD` for the given day */
export function backupBranchName(date: Date = new Date()): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `scaffold-patch-backup-${y}${m}${d}`;
}

export type BackupResult =
  | { created: true; branch: string }
  | { created: false; branch: string; reason: 'not-a-repo' | 'exists' };

/**
 * Create a branch at HEAD so the tree before patching can be recovered.
 * Leaves the current checkout untouched.
 */
export async function createBackupBranch(repoDir: string, branch: string = backupBranchName()): Promise<BackupResult> {
  if (!await isRepo(repoDir)) {
    return { created: false, branch, reason: 'not-a-repo' };
  }
  const git = simpleGit(repoDir);
  const branches = await git.branchLocal();
  if (branches.all.includes(branch)) {
    return { created: false, branch, reason: 'exists' };
  }
  await git.branch([branch]);
  return { created: true, branch };
}
