import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosResponse } from 'axios';
import * as fs from 'fs';
import * as https from 'https';
import * as path from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { AppConfig, TransferConfig } from '../config/configuration';
import { AuthenticationError, IncompleteTransferError, TransferError, errorMessage } from '../common/errors';
import { ZoomAuthService } from '../zoom/zoom-auth.service';
import { ZoomMeetingRecording } from '../zoom/zoom-recordings.service';
import { planRecordingFiles } from './recording-files';

export interface DownloadedFile {
  name: string;
  path: string;
  /** YYYY-MM-DD partition shared by the local and the remote folder */
  dateFolder: string;
  recordingTime: string;
  fileSize: number;
}

export interface FetchResult {
  path: string;
  bytesWritten: number;
  expectedBytes?: number;
}

const CHUNK_SIZE = 1024 * 1024;

@Injectable()
export class RecordingDownloaderService {
  private readonly logger = new Logger(RecordingDownloaderService.name);
  private readonly transfer: TransferConfig;
  private readonly httpsAgent = new https.Agent({ keepAlive: true });

  constructor(
    config: ConfigService<AppConfig, true>,
    private readonly auth: ZoomAuthService,
  ) {
    this.transfer = config.get('transfer', { infer: true });
  }

  /** Staging area owned by one recording; removing it touches no other recording. */
  stagingRoot(recording: ZoomMeetingRecording): string {
    const key = recording.uuid.replace(/[^A-Za-z0-9_-]/g, '_') || String(recording.id);
    return path.join(this.transfer.downloadDir, key);
  }

  /** Local copy of the remote date partition for one recording. */
  folderFor(recording: ZoomMeetingRecording, dateFolder: string): string {
    return path.join(this.stagingRoot(recording), dateFolder);
  }

  /**
   * Downloads all files of a recording into `<downloadDir>/<recording>/<dateFolder>`.
   * Files of an unknown type are skipped with a warning; an empty result means
   * nothing could be retrieved.
   */
  async downloadRecording(recording: ZoomMeetingRecording, meetingName: string): Promise<DownloadedFile[]> {
    const plan = planRecordingFiles(recording, meetingName, this.transfer.timeZone);
    const folder = this.folderFor(recording, plan.dateFolder);

    for (const file of plan.unknown) {
      this.logger.warn(`Unknown file type: ${file.recording_type ?? '(none)'} (file ${file.id}) in "${recording.topic}"`);
    }

    if (this.transfer.dryRun) {
      for (const planned of plan.files) {
        this.logger.log(`[DRY RUN] Would download ${planned.fileName} into ${folder}`);
      }
      return [];
    }

    await fs.promises.mkdir(folder, { recursive: true });

    const downloaded: DownloadedFile[] = [];
    for (const planned of plan.files) {
      if (!planned.file.download_url) {
        this.logger.warn(`No download URL for ${planned.fileName}, skipping`);
        continue;
      }
      const outputPath = path.join(folder, planned.fileName);
      this.logger.log(`Downloading ${planned.fileName}`);
      const result = await this.fetch(planned.file.download_url, outputPath);
      if (!result) continue;

      const { size } = await fs.promises.stat(outputPath);
      downloaded.push({
        name: planned.fileName,
        path: outputPath,
        dateFolder: plan.dateFolder,
        recordingTime: recording.start_time,
        fileSize: size,
      });
    }

    return downloaded;
  }

  /**
   * Streams one file to disk. Returns null in dry-run mode, where no request
   * is made. The partial file is removed whenever the transfer fails.
   */
  async fetch(url: string, destination: string): Promise<FetchResult | null> {
    if (this.transfer.dryRun) {
      this.logger.log(`[DRY RUN] Would download ${path.basename(destination)}`);
      return null;
    }

    try {
      let res = await this.request(url, await this.auth.getAccessToken());
      if (res.status === 401 || res.status === 403) {
        // Token revoked or expired server-side: retry once with a fresh one.
        res.data.destroy();
        this.auth.invalidate();
        res = await this.request(url, await this.auth.getAccessToken());
      }
      if (res.status < 200 || res.status >= 300) {
        res.data.destroy();
        throw new TransferError('download', `Download of ${path.basename(destination)} failed status=${res.status}`, {
          status: res.status,
        });
      }

      const expectedBytes = Number(res.headers['content-length'] ?? 0) || undefined;
      const bytesWritten = await this.writeToFile(res.data, destination);

      if (expectedBytes && bytesWritten !== expectedBytes) {
        throw new IncompleteTransferError(destination, expectedBytes, bytesWritten);
      }

      this.logger.debug(`Wrote ${bytesWritten} bytes to ${destination}`);
      return { path: destination, bytesWritten, expectedBytes };
    } catch (error) {
      await this.removePartial(destination);
      this.logger.error(`Failed to download ${path.basename(destination)}: ${errorMessage(error)}`);
      if (error instanceof TransferError || error instanceof AuthenticationError) throw error;
      throw new TransferError('download', `Failed to download ${path.basename(destination)}: ${errorMessage(error)}`, {
        path: destination,
      }, { cause: error });
    }
  }

  private request(url: string, accessToken: string): Promise<AxiosResponse<Readable>> {
    return axios.get<Readable>(url, {
      responseType: 'stream',
      headers: {
        Authorization: `Bearer ${accessToken}`,
        Accept: 'application/octet-stream, */*',
      },
      timeout: this.transfer.downloadTimeoutMs,
      maxContentLength: Infinity,
      httpsAgent: this.httpsAgent,
      validateStatus: () => true,
    });
  }

  /** Every stream in the chain is destroyed when any of them fails. */
  private async writeToFile(body: Readable, destination: string): Promise<number> {
    let written = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        written += chunk.length;
        callback(null, chunk);
      },
    });
    await pipeline(body, counter, fs.createWriteStream(destination, { flags: 'w', highWaterMark: CHUNK_SIZE }));
    return written;
  }

  private async removePartial(destination: string): Promise<void> {
    try {
      await fs.promises.rm(destination, { force: true });
    } catch (err) {
      this.logger.warn(`Could not remove partial file ${destination}: ${errorMessage(err)}`);
    }
  }
}
