import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { CleanupError, errorMessage } from '../common/errors';

export interface PurgeResult {
  filesRemoved: number;
  directoriesRemoved: number;
  failures: CleanupError[];
}

/**
 * Removes downloaded files once they are safely on the remote. Best effort:
 * an entry that cannot be removed is logged and skipped.
 */
@Injectable()
export class CleanupService {
  private readonly logger = new Logger(CleanupService.name);

  async purge(root: string): Promise<PurgeResult> {
    const result: PurgeResult = { filesRemoved: 0, directoriesRemoved: 0, failures: [] };
    if (!fs.existsSync(root)) return result;

    const files: string[] = [];
    const directories: string[] = [];
    await this.walk(root, files, directories, result);

    for (const file of files) {
      try {
        await fs.promises.unlink(file);
        result.filesRemoved++;
      } catch (err) {
        this.fail(result, file, err);
      }
    }

    // deepest first, so children go before their parents
    directories.sort((a, b) => b.split(path.sep).length - a.split(path.sep).length);
    for (const dir of [...directories, root]) {
      try {
        const remaining = await fs.promises.readdir(dir);
        if (remaining.length > 0) continue;
        await fs.promises.rmdir(dir);
        result.directoriesRemoved++;
      } catch (err) {
        this.fail(result, dir, err);
      }
    }

    this.logger.debug(`Purged ${root}: ${result.filesRemoved} file(s), ${result.directoriesRemoved} folder(s)`);
    return result;
  }

  private async walk(dir: string, files: string[], directories: string[], result: PurgeResult): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (err) {
      this.fail(result, dir, err);
      return;
    }
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        directories.push(full);
        await this.walk(full, files, directories, result);
      } else {
        files.push(full);
      }
    }
  }

  private fail(result: PurgeResult, entry: string, err: unknown): void {
    const failure = new CleanupError(entry, errorMessage(err), { cause: err });
    result.failures.push(failure);
    this.logger.error(failure.message);
  }
}
