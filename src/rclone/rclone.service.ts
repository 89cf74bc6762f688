import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig, RcloneConfig } from '../config/configuration';
import {
  MetadataNotFoundError,
  RemoteConfigurationError,
  TransferError,
  errorMessage,
} from '../common/errors';
import { CommandResult, CommandRunner } from './command-runner';

const COPY_TIMEOUT_MS = 3600000;
const METADATA_TIMEOUT_MS = 60000;
const PROBE_TIMEOUT_MS = 30000;

/** Field names rclone uses for the backend's file id, most likely first. */
const REMOTE_ID_ALIASES = ['ID', 'Id', 'id'];

export function pickRemoteId(meta: Record<string, unknown>): string | undefined {
  for (const alias of REMOTE_ID_ALIASES) {
    const value = meta[alias];
    if (typeof value === 'string' && value) return value;
  }
  for (const [key, value] of Object.entries(meta)) {
    if (key.toLowerCase().includes('id') && typeof value === 'string' && value) return value;
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Moves recordings to the configured rclone remote. Files for one day live
 * under `<remote>:<basePath>/<YYYY-MM-DD>/`.
 */
@Injectable()
export class RcloneService {
  private readonly logger = new Logger(RcloneService.name);
  private readonly rclone: RcloneConfig;
  private readonly debug: boolean;

  constructor(
    config: ConfigService<AppConfig, true>,
    private readonly runner: CommandRunner,
  ) {
    this.rclone = config.get('rclone', { infer: true });
    this.debug = config.get('transfer', { infer: true }).debug;
  }

  get remoteName(): string {
    return this.rclone.remoteName;
  }

  get basePath(): string {
    return this.rclone.basePath;
  }

  /** `basePath/dateFolder[/fileName]` without the remote prefix */
  logicalPath(dateFolder: string, fileName?: string): string {
    return [this.rclone.basePath, dateFolder, fileName].filter(Boolean).join('/');
  }

  remotePath(dateFolder: string, fileName?: string): string {
    return `${this.rclone.remoteName}:${this.logicalPath(dateFolder, fileName)}`;
  }

  /** Fails when rclone cannot run or the remote is not in its config. */
  async checkAvailability(): Promise<void> {
    let result: CommandResult;
    try {
      result = await this.exec(['listremotes'], PROBE_TIMEOUT_MS);
    } catch (error) {
      throw new RemoteConfigurationError(`${this.rclone.binary} is not installed or not in PATH: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (result.exitCode !== 0) {
      throw new RemoteConfigurationError(`rclone configuration check failed: ${result.stderr.trim() || `exit ${result.exitCode}`}`);
    }

    const remotes = result.stdout
      .split('\n')
      .map((line) => line.trim().replace(/:$/, ''))
      .filter(Boolean);
    if (!remotes.includes(this.rclone.remoteName)) {
      throw new RemoteConfigurationError(
        `rclone remote '${this.rclone.remoteName}' is not configured. Available remotes: ${remotes.join(', ') || '(none)'}`,
      );
    }
    this.logger.log(`rclone is available and remote '${this.rclone.remoteName}' is configured`);
  }

  /**
   * `rclone mkdir` succeeds on existing directories, so a non-zero exit is
   * only worth a warning; the following copy creates missing parents anyway.
   */
  async ensureDirectory(remotePath: string): Promise<boolean> {
    try {
      const result = await this.exec(['mkdir', remotePath], METADATA_TIMEOUT_MS);
      if (result.exitCode !== 0) {
        this.logger.warn(`Directory creation returned exit code ${result.exitCode} for ${remotePath}: ${result.stderr.trim()}`);
        return false;
      }
      this.logger.debug(`Created/verified remote directory: ${remotePath}`);
      return true;
    } catch (error) {
      this.logger.warn(`Failed to create remote directory ${remotePath}: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Copies the whole local folder to the date partition in one rclone call.
   * A failed copy may leave some files on the remote; nothing is rolled back.
   */
  async uploadDirectory(localPath: string, dateFolder: string): Promise<string> {
    const remoteDir = this.remotePath(dateFolder);
    this.logger.log(`Creating/validating remote directory: ${remoteDir}`);
    await this.ensureDirectory(remoteDir);

    this.logger.log(`Uploading directory ${localPath} to ${remoteDir}`);
    await this.copy(localPath, remoteDir);
    return this.logicalPath(dateFolder);
  }

  /** Reads the backend file id (the Drive file id on Google remotes) from `rclone lsjson`. */
  async resolveRemoteId(dateFolder: string, fileName: string): Promise<string> {
    const target = this.remotePath(dateFolder, fileName);
    let result: CommandResult;
    try {
      result = await this.exec(['lsjson', target], METADATA_TIMEOUT_MS);
    } catch (error) {
      throw new TransferError('metadata', `Failed to retrieve metadata via rclone: ${errorMessage(error)}`, { target }, {
        cause: error,
      });
    }
    if (result.exitCode !== 0) {
      throw new TransferError('metadata', `Failed to retrieve metadata via rclone: ${result.stderr.trim() || `exit ${result.exitCode}`}`, {
        target,
      });
    }

    let entries: unknown;
    try {
      entries = JSON.parse(result.stdout);
    } catch (error) {
      throw new MetadataNotFoundError(target, `unparseable rclone output (${errorMessage(error)})`);
    }
    if (!Array.isArray(entries) || entries.length === 0) {
      throw new MetadataNotFoundError(target, 'no entries');
    }
    const meta: unknown = entries[0];
    if (!isRecord(meta)) {
      throw new MetadataNotFoundError(target, 'unexpected entry shape');
    }
    const id = pickRemoteId(meta);
    if (!id) {
      throw new MetadataNotFoundError(target, `no id field among keys ${Object.keys(meta).join(', ')}`);
    }
    return id;
  }

  /** Lists the remote's top level with a bounded wait; never throws. */
  async testConnectivity(): Promise<boolean> {
    const root = `${this.rclone.remoteName}:`;
    try {
      const result = await this.exec(['lsd', root], PROBE_TIMEOUT_MS);
      if (result.timedOut) {
        this.logger.error(`Connection test to remote '${this.rclone.remoteName}' timed out`);
        return false;
      }
      if (result.exitCode !== 0) {
        this.logger.error(`Failed to connect to remote '${this.rclone.remoteName}': ${result.stderr.trim()}`);
        return false;
      }
      this.logger.log(`Successfully connected to remote '${this.rclone.remoteName}'`);
      return true;
    } catch (error) {
      this.logger.error(`Error testing connection: ${errorMessage(error)}`);
      return false;
    }
  }

  async getRemoteInfo(): Promise<Record<string, string>> {
    try {
      const result = await this.exec(['config', 'show', this.rclone.remoteName], PROBE_TIMEOUT_MS);
      if (result.exitCode !== 0) {
        this.logger.error(`Failed to get remote info: ${result.stderr.trim()}`);
        return {};
      }
      const info: Record<string, string> = {};
      for (const line of result.stdout.split('\n')) {
        const eq = line.indexOf('=');
        if (eq === -1 || line.trimStart().startsWith('[')) continue;
        info[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
      }
      return info;
    } catch (error) {
      this.logger.error(`Error getting remote info: ${errorMessage(error)}`);
      return {};
    }
  }

  private async copy(source: string, remoteDir: string): Promise<void> {
    const args = ['copy', source, remoteDir, '--stats-one-line', '--stats=1s'];
    if (this.rclone.checksum) args.push('--checksum');
    if (this.debug) args.push('--verbose');

    let result: CommandResult;
    try {
      result = await this.exec(args, COPY_TIMEOUT_MS);
    } catch (error) {
      throw new TransferError('upload', `rclone copy could not start: ${errorMessage(error)}`, { source, remoteDir }, {
        cause: error,
      });
    }
    if (result.exitCode !== 0) {
      const reason = result.timedOut ? 'timed out' : `exit code ${result.exitCode}`;
      const message = `rclone copy failed (${reason})${result.stderr.trim() ? ` - stderr: ${result.stderr.trim()}` : ''}`;
      this.logger.error(message);
      throw new TransferError('upload', message, { source, remoteDir, exitCode: result.exitCode });
    }
    this.logger.debug(`rclone copy finished in ${result.duration}ms`);
  }

  private exec(args: string[], timeout: number): Promise<CommandResult> {
    this.logger.verbose(`${this.rclone.binary} ${args.join(' ')}`);
    return this.runner.run(this.rclone.binary, args, { timeout });
  }
}
