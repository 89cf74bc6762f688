import { Injectable, Logger } from '@nestjs/common';
import { format, subDays } from 'date-fns';
import { AuthenticationError, UserNotFoundError, errorMessage } from '../common/errors';
import { CleanupService } from '../cleanup/cleanup.service';
import { RcloneService } from '../rclone/rclone.service';
import { DownloadedFile, RecordingDownloaderService } from '../recordings/recording-downloader.service';
import { isPrimaryVideo } from '../recordings/recording-files';
import { SlackService } from '../slack/slack.service';
import { ZoomMeetingRecording, ZoomRecordingsService, ZoomUser } from '../zoom/zoom-recordings.service';
import { RecordingState, RecordingStateMachine, RecordingStateTransition } from './recording-state';

export interface TransferRunOptions {
  /** case-insensitive substring of the meeting topic */
  meetingName: string;
  email: string;
  days?: number;
}

export interface RecordingOutcome {
  topic: string;
  uuid: string;
  startTime: string;
  state: RecordingState;
  files: string[];
  remotePath?: string;
  notified: string[];
  error?: string;
  transitions: readonly RecordingStateTransition[];
}

export interface TransferReport {
  userFound: boolean;
  user?: ZoomUser;
  from: string;
  to: string;
  matched: number;
  recordings: RecordingOutcome[];
}

export const DEFAULT_SEARCH_DAYS = 7;

/**
 * Runs one transfer: find the user, list and filter recordings, then move
 * each recording through download, upload, notification and cleanup. A
 * failing recording is recorded in the report and the run moves on.
 */
@Injectable()
export class TransferService {
  private readonly logger = new Logger(TransferService.name);

  constructor(
    private readonly zoom: ZoomRecordingsService,
    private readonly downloader: RecordingDownloaderService,
    private readonly rclone: RcloneService,
    private readonly slack: SlackService,
    private readonly cleanup: CleanupService,
  ) {}

  async run(options: TransferRunOptions): Promise<TransferReport> {
    const days = options.days ?? DEFAULT_SEARCH_DAYS;
    const endDate = new Date();
    const startDate = subDays(endDate, days);
    const report: TransferReport = {
      userFound: false,
      from: format(startDate, 'yyyy-MM-dd'),
      to: format(endDate, 'yyyy-MM-dd'),
      matched: 0,
      recordings: [],
    };

    this.logger.log(`Starting Zoom recording transfer (searching last ${days} days)`);
    await this.rclone.checkAvailability();

    let user: ZoomUser;
    try {
      user = await this.zoom.resolveUser(options.email);
    } catch (error) {
      if (error instanceof UserNotFoundError) {
        this.logger.error(`User lookup failed: ${error.message}`);
        return report;
      }
      throw error;
    }
    report.userFound = true;
    report.user = user;

    const recordings = await this.zoom.listRecordings(user.id, startDate, endDate);
    const targets = this.zoom.filterByTopic(recordings, options.meetingName);
    report.matched = targets.length;

    if (targets.length === 0) {
      this.logger.log(`No recordings found matching '${options.meetingName}' in the last ${days} days`);
      return report;
    }

    for (const recording of targets) {
      report.recordings.push(await this.processRecording(recording, options.meetingName));
    }

    const done = report.recordings.filter((r) => r.state === 'Done').length;
    const failed = report.recordings.filter((r) => r.state === 'DownloadFailed' || r.state === 'UploadFailed').length;
    this.logger.log(`Finished processing all recordings: ${done} transferred, ${failed} failed, ${targets.length - done - failed} skipped`);
    return report;
  }

  async processRecording(recording: ZoomMeetingRecording, meetingName: string): Promise<RecordingOutcome> {
    const topic = recording.topic;
    const machine = new RecordingStateMachine(topic);
    const outcome: RecordingOutcome = {
      topic,
      uuid: recording.uuid,
      startTime: recording.start_time,
      state: machine.state,
      files: [],
      notified: [],
      transitions: machine.transitions,
    };
    const finish = (): RecordingOutcome => {
      outcome.state = machine.state;
      return outcome;
    };

    const minutes = this.zoom.effectiveDuration(recording);
    if (!this.zoom.isLongEnough(recording)) {
      this.logger.log(`Skipping short recording: ${topic} (${minutes.toFixed(1)} min)`);
      machine.transition('Skipped', `effective duration ${minutes.toFixed(1)} min`);
      return finish();
    }

    this.logger.log(`Processing recording: ${topic}`);
    machine.transition('Downloading');
    let files: DownloadedFile[];
    try {
      files = await this.downloader.downloadRecording(recording, meetingName);
    } catch (error) {
      if (error instanceof AuthenticationError) throw error;
      outcome.error = errorMessage(error);
      this.logger.error(`Error downloading recording ${topic} [stage=download]: ${outcome.error}`);
      machine.transition('DownloadFailed', outcome.error);
      return finish();
    }

    if (files.length === 0) {
      this.logger.warn(`No files were downloaded for recording: ${topic}`);
      machine.transition('DownloadFailed', 'no files retrieved');
      return finish();
    }
    outcome.files = files.map((f) => f.name);
    machine.transition('Downloaded');

    const dateFolder = files[0].dateFolder;
    const localDir = this.downloader.folderFor(recording, dateFolder);
    machine.transition('Uploading');
    try {
      outcome.remotePath = await this.rclone.uploadDirectory(localDir, dateFolder);
    } catch (error) {
      outcome.error = errorMessage(error);
      this.logger.error(
        `Failed to upload recording ${topic} [stage=upload, files=${outcome.files.join(', ')}]: ${outcome.error}. ` +
          `Local copies kept in ${localDir}`,
      );
      machine.transition('UploadFailed', outcome.error);
      return finish();
    }
    this.logger.log(`Successfully uploaded ${files.length} file(s) to ${outcome.remotePath}`);
    machine.transition('Uploaded');

    machine.transition('Notifying');
    if (this.slack.enabled) {
      for (const file of files.filter((f) => isPrimaryVideo(f.name))) {
        const remoteId = await this.lookupRemoteId(file);
        if (await this.slack.notify(topic, file.name, remoteId)) {
          outcome.notified.push(file.name);
        }
      }
    } else if (this.slack.requested) {
      this.logger.warn(`No Slack webhook URL configured, nothing announced for ${topic}`);
    } else {
      this.logger.debug(`Notifications off, nothing announced for ${topic}`);
    }

    machine.transition('Cleaning');
    await this.cleanup.purge(this.downloader.stagingRoot(recording));
    this.logger.log(`Cleaned up downloaded files for ${topic}`);
    machine.transition('Done');
    return finish();
  }

  private async lookupRemoteId(file: DownloadedFile): Promise<string> {
    try {
      const id = await this.rclone.resolveRemoteId(file.dateFolder, file.name);
      this.logger.log(`Successfully uploaded ${file.name} (ID: ${id})`);
      return id;
    } catch (error) {
      const fallback = this.rclone.logicalPath(file.dateFolder, file.name);
      this.logger.warn(`Could not resolve remote id for ${file.name} [stage=metadata]: ${errorMessage(error)}. Using ${fallback}`);
      return fallback;
    }
  }
}
