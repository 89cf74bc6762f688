import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import {
  AuthenticationError,
  MetadataNotFoundError,
  TransferError,
  UserNotFoundError,
} from '../common/errors';
import { CleanupService } from '../cleanup/cleanup.service';
import { RcloneService } from '../rclone/rclone.service';
import { DownloadedFile, RecordingDownloaderService } from '../recordings/recording-downloader.service';
import { SlackService } from '../slack/slack.service';
import { recordingFile, zoomRecording } from '../testing/test-helpers';
import { ZoomMeetingRecording, ZoomRecordingsService } from '../zoom/zoom-recordings.service';
import { TransferService } from './transfer.service';

const USER = { id: 'user-1', email: 'host@example.com', displayName: 'Test Host' };

function downloaded(dateFolder: string, name: string, uuid = 'uuid-1'): DownloadedFile {
  return {
    name,
    path: `/downloads/${uuid}/${dateFolder}/${name}`,
    dateFolder,
    recordingTime: `${dateFolder}T10:00:00Z`,
    fileSize: 1024,
  };
}

describe('TransferService', () => {
  let service: TransferService;

  const zoom = {
    resolveUser: jest.fn(),
    listRecordings: jest.fn(),
    filterByTopic: jest.fn(),
    effectiveDuration: jest.fn(),
    isLongEnough: jest.fn(),
  };
  const downloader = {
    downloadRecording: jest.fn(),
    stagingRoot: jest.fn((recording: ZoomMeetingRecording) => `/downloads/${recording.uuid}`),
    folderFor: jest.fn((recording: ZoomMeetingRecording, dateFolder: string) => `/downloads/${recording.uuid}/${dateFolder}`),
  };
  const rclone = {
    checkAvailability: jest.fn(),
    uploadDirectory: jest.fn(),
    resolveRemoteId: jest.fn(),
    logicalPath: jest.fn((dateFolder: string, fileName?: string) =>
      ['Team/Recordings', dateFolder, fileName].filter(Boolean).join('/'),
    ),
  };
  const slack = { enabled: true, requested: true, notify: jest.fn() };
  const cleanup = { purge: jest.fn() };

  const weekly = zoomRecording();
  const weeklyFiles = [
    downloaded('2024-01-15', '15 January 2024 - Weekly Sync.mp4'),
    downloaded('2024-01-15', '15 January 2024 - Weekly Sync.m4a'),
  ];

  beforeEach(async () => {
    jest.clearAllMocks();
    slack.enabled = true;
    slack.requested = true;
    zoom.resolveUser.mockResolvedValue(USER);
    zoom.listRecordings.mockResolvedValue([weekly]);
    zoom.filterByTopic.mockImplementation((recordings: ZoomMeetingRecording[], query: string) =>
      recordings.filter((r) => r.topic.toLowerCase().includes(query.toLowerCase())),
    );
    zoom.effectiveDuration.mockImplementation((r: ZoomMeetingRecording) => r.duration);
    zoom.isLongEnough.mockImplementation((r: ZoomMeetingRecording) => r.duration >= 5);
    downloader.downloadRecording.mockResolvedValue(weeklyFiles);
    rclone.checkAvailability.mockResolvedValue(undefined);
    rclone.uploadDirectory.mockImplementation(async (_local: string, dateFolder: string) => `Team/Recordings/${dateFolder}`);
    rclone.resolveRemoteId.mockResolvedValue('drive-file-1');
    slack.notify.mockResolvedValue(true);
    cleanup.purge.mockResolvedValue({ filesRemoved: 2, directoriesRemoved: 1, failures: [] });

    const module = await Test.createTestingModule({
      providers: [
        TransferService,
        { provide: ZoomRecordingsService, useValue: zoom },
        { provide: RecordingDownloaderService, useValue: downloader },
        { provide: RcloneService, useValue: rclone },
        { provide: SlackService, useValue: slack },
        { provide: CleanupService, useValue: cleanup },
      ],
    }).compile();
    service = module.get<TransferService>(TransferService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('moves a matching recording all the way to Done', async () => {
    const report = await service.run({ meetingName: 'Weekly Sync', email: 'host@example.com', days: 7 });

    expect(report.userFound).toBe(true);
    expect(report.matched).toBe(1);
    expect(report.recordings).toHaveLength(1);
    const [outcome] = report.recordings;
    expect(outcome.state).toBe('Done');
    expect(outcome.files).toEqual(['15 January 2024 - Weekly Sync.mp4', '15 January 2024 - Weekly Sync.m4a']);
    expect(outcome.remotePath).toBe('Team/Recordings/2024-01-15');
    expect(outcome.notified).toEqual(['15 January 2024 - Weekly Sync.mp4']);
    expect(outcome.transitions.map((t) => t.to)).toEqual([
      'Downloading',
      'Downloaded',
      'Uploading',
      'Uploaded',
      'Notifying',
      'Cleaning',
      'Done',
    ]);

    expect(downloader.downloadRecording).toHaveBeenCalledWith(weekly, 'Weekly Sync');
    expect(rclone.uploadDirectory).toHaveBeenCalledWith('/downloads/uuid-1/2024-01-15', '2024-01-15');
    expect(rclone.resolveRemoteId).toHaveBeenCalledWith('2024-01-15', '15 January 2024 - Weekly Sync.mp4');
    expect(slack.notify).toHaveBeenCalledTimes(1);
    expect(slack.notify).toHaveBeenCalledWith('Weekly Sync Meeting', '15 January 2024 - Weekly Sync.mp4', 'drive-file-1');
    expect(cleanup.purge).toHaveBeenCalledWith('/downloads/uuid-1');
  });

  it('skips recordings that are too short', async () => {
    zoom.listRecordings.mockResolvedValue([zoomRecording({ duration: 3, recording_files: [recordingFile()] })]);

    const report = await service.run({ meetingName: 'Weekly Sync', email: 'host@example.com' });

    expect(report.recordings.map((r) => r.state)).toEqual(['Skipped']);
    expect(downloader.downloadRecording).not.toHaveBeenCalled();
  });

  it('reports nothing when no topic matches', async () => {
    const report = await service.run({ meetingName: 'Board Review', email: 'host@example.com' });

    expect(report.matched).toBe(0);
    expect(report.recordings).toEqual([]);
    expect(downloader.downloadRecording).not.toHaveBeenCalled();
  });

  it('stops quietly when the user does not exist', async () => {
    zoom.resolveUser.mockRejectedValue(new UserNotFoundError('nobody@example.com'));

    const report = await service.run({ meetingName: 'Weekly Sync', email: 'nobody@example.com' });

    expect(report.userFound).toBe(false);
    expect(report.recordings).toEqual([]);
    expect(zoom.listRecordings).not.toHaveBeenCalled();
  });

  it('keeps local files after a failed upload and moves on', async () => {
    const later = zoomRecording({ uuid: 'uuid-2', start_time: '2024-01-16T10:00:00Z' });
    zoom.listRecordings.mockResolvedValue([weekly, later]);
    downloader.downloadRecording
      .mockResolvedValueOnce(weeklyFiles)
      .mockResolvedValueOnce([downloaded('2024-01-16', '16 January 2024 - Weekly Sync.mp4', 'uuid-2')]);
    rclone.uploadDirectory
      .mockRejectedValueOnce(new TransferError('upload', 'rclone copy failed (exit code 3)'))
      .mockResolvedValueOnce('Team/Recordings/2024-01-16');

    const report = await service.run({ meetingName: 'Weekly Sync', email: 'host@example.com' });

    expect(report.recordings.map((r) => r.state)).toEqual(['UploadFailed', 'Done']);
    expect(report.recordings[0].error).toBe('rclone copy failed (exit code 3)');
    expect(cleanup.purge).toHaveBeenCalledTimes(1);
    expect(cleanup.purge).toHaveBeenCalledWith('/downloads/uuid-2');
    expect(slack.notify).toHaveBeenCalledTimes(1);
  });

  it('leaves the kept files of a failed upload alone when another recording shares its date', async () => {
    const sameDay = zoomRecording({ uuid: 'uuid-2', start_time: '2024-01-15T14:00:00Z' });
    zoom.listRecordings.mockResolvedValue([weekly, sameDay]);
    downloader.downloadRecording
      .mockResolvedValueOnce(weeklyFiles)
      .mockResolvedValueOnce([downloaded('2024-01-15', '15 January 2024 - Weekly Sync.mp4', 'uuid-2')]);
    rclone.uploadDirectory
      .mockRejectedValueOnce(new TransferError('upload', 'rclone copy failed (exit code 5)'))
      .mockResolvedValueOnce('Team/Recordings/2024-01-15');

    const report = await service.run({ meetingName: 'Weekly Sync', email: 'host@example.com' });

    expect(report.recordings.map((r) => r.state)).toEqual(['UploadFailed', 'Done']);
    expect(rclone.uploadDirectory.mock.calls).toEqual([
      ['/downloads/uuid-1/2024-01-15', '2024-01-15'],
      ['/downloads/uuid-2/2024-01-15', '2024-01-15'],
    ]);
    expect(cleanup.purge.mock.calls).toEqual([['/downloads/uuid-2']]);
  });

  it('marks a failed download and moves on', async () => {
    const later = zoomRecording({ uuid: 'uuid-2' });
    zoom.listRecordings.mockResolvedValue([weekly, later]);
    downloader.downloadRecording
      .mockRejectedValueOnce(new TransferError('download', 'Download of a.mp4 failed status=404'))
      .mockResolvedValueOnce(weeklyFiles);

    const report = await service.run({ meetingName: 'Weekly Sync', email: 'host@example.com' });

    expect(report.recordings.map((r) => r.state)).toEqual(['DownloadFailed', 'Done']);
    expect(rclone.uploadDirectory).toHaveBeenCalledTimes(1);
  });

  it('treats an empty download as a failure', async () => {
    downloader.downloadRecording.mockResolvedValue([]);

    const report = await service.run({ meetingName: 'Weekly Sync', email: 'host@example.com' });

    expect(report.recordings[0].state).toBe('DownloadFailed');
    expect(rclone.uploadDirectory).not.toHaveBeenCalled();
  });

  it('announces the logical path when the remote id cannot be found', async () => {
    rclone.resolveRemoteId.mockRejectedValue(new MetadataNotFoundError('testdrive:x', 'no entries'));

    const report = await service.run({ meetingName: 'Weekly Sync', email: 'host@example.com' });

    expect(report.recordings[0].state).toBe('Done');
    expect(slack.notify).toHaveBeenCalledWith(
      'Weekly Sync Meeting',
      '15 January 2024 - Weekly Sync.mp4',
      'Team/Recordings/2024-01-15/15 January 2024 - Weekly Sync.mp4',
    );
  });

  it('skips notifications when Slack is off but still cleans up', async () => {
    slack.enabled = false;
    slack.requested = false;
    const warn = jest.spyOn(Logger.prototype, 'warn');

    const report = await service.run({ meetingName: 'Weekly Sync', email: 'host@example.com' });

    expect(report.recordings[0].state).toBe('Done');
    expect(report.recordings[0].notified).toEqual([]);
    expect(rclone.resolveRemoteId).not.toHaveBeenCalled();
    expect(slack.notify).not.toHaveBeenCalled();
    expect(cleanup.purge).toHaveBeenCalledTimes(1);
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns when notifications are wanted but no webhook is configured', async () => {
    slack.enabled = false;
    const warn = jest.spyOn(Logger.prototype, 'warn');

    const report = await service.run({ meetingName: 'Weekly Sync', email: 'host@example.com' });

    expect(report.recordings[0].state).toBe('Done');
    expect(slack.notify).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('No Slack webhook URL configured, nothing announced for Weekly Sync Meeting');
  });

  it('aborts the run on an authentication failure', async () => {
    downloader.downloadRecording.mockRejectedValue(new AuthenticationError('Failed to get Zoom access token: 401'));

    await expect(service.run({ meetingName: 'Weekly Sync', email: 'host@example.com' })).rejects.toThrow(
      AuthenticationError,
    );
  });

  it('does not start when the remote is unavailable', async () => {
    rclone.checkAvailability.mockRejectedValue(new Error("rclone remote 'testdrive' is not configured"));

    await expect(service.run({ meetingName: 'Weekly Sync', email: 'host@example.com' })).rejects.toThrow(
      "rclone remote 'testdrive' is not configured",
    );
    expect(zoom.resolveUser).not.toHaveBeenCalled();
  });
});
