import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { format } from 'date-fns';
import { AppConfig, ZoomConfig } from '../config/configuration';
import { UserNotFoundError } from '../common/errors';
import { ZoomAuthService } from './zoom-auth.service';

export interface ZoomRecordingFile {
  id: string;
  meeting_id?: string;
  recording_start?: string;
  recording_end?: string;
  file_type?: string;
  file_extension?: string;
  file_size?: number;
  play_url?: string;
  download_url: string;
  status?: string;
  recording_type?: string;
}

export interface ZoomMeetingRecording {
  uuid: string;
  id: number;
  account_id?: string;
  host_id?: string;
  topic: string;
  type?: number;
  start_time: string;
  duration: number;
  share_url?: string;
  total_size?: number;
  recording_count?: number;
  recording_files: ZoomRecordingFile[];
}

export interface ZoomRecordingsResponse {
  from: string;
  to: string;
  page_count?: number;
  page_size?: number;
  total_records?: number;
  next_page_token?: string;
  meetings?: ZoomMeetingRecording[];
}

export interface ZoomUser {
  id: string;
  email: string;
  displayName: string;
}

interface ZoomUserResponse {
  id: string;
  email: string;
  first_name?: string;
  last_name?: string;
  display_name?: string;
}

/** Recordings shorter than this (in minutes) are never transferred. */
export const MIN_RECORDING_MINUTES = 5;

@Injectable()
export class ZoomRecordingsService {
  private readonly logger = new Logger(ZoomRecordingsService.name);
  private readonly zoom: ZoomConfig;

  constructor(
    config: ConfigService<AppConfig, true>,
    private readonly auth: ZoomAuthService,
  ) {
    this.zoom = config.get('zoom', { infer: true });
  }

  async resolveUser(email: string): Promise<ZoomUser> {
    this.logger.log(`Looking up user with email: ${email}`);
    const accessToken = await this.auth.getAccessToken();

    try {
      const { data } = await axios.get<ZoomUserResponse>(
        `${this.zoom.apiBaseUrl}/users/${encodeURIComponent(email)}`,
        { headers: this.headers(accessToken) },
      );
      const displayName =
        [data.first_name, data.last_name].filter(Boolean).join(' ') || data.display_name || data.email;
      this.logger.log(`Found user: ${displayName} (ID: ${data.id})`);
      return { id: data.id, email: data.email, displayName };
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        throw new UserNotFoundError(email);
      }
      throw error;
    }
  }

  /**
   * Lists every cloud recording of the user between the two days (inclusive),
   * following Zoom's page tokens.
   */
  async listRecordings(userId: string, startDate: Date, endDate: Date): Promise<ZoomMeetingRecording[]> {
    const from = format(startDate, 'yyyy-MM-dd');
    const to = format(endDate, 'yyyy-MM-dd');
    const recordings: ZoomMeetingRecording[] = [];
    let nextPageToken: string | undefined;
    let pageCount = 0;

    this.logger.log(`Fetching recordings for user ID: ${userId}`);
    this.logger.debug(`Date range: ${from} to ${to}`);

    do {
      const accessToken = await this.auth.getAccessToken();
      const searchParams = new URLSearchParams({ from, to, page_size: '300' });
      if (nextPageToken) searchParams.append('next_page_token', nextPageToken);

      const { data } = await axios.get<ZoomRecordingsResponse>(
        `${this.zoom.apiBaseUrl}/users/${encodeURIComponent(userId)}/recordings?${searchParams}`,
        { headers: this.headers(accessToken) },
      );

      recordings.push(...(data.meetings ?? []));
      nextPageToken = data.next_page_token || undefined;
      pageCount++;

      if (nextPageToken && pageCount >= this.zoom.maxPages) {
        this.logger.warn(`Reached maximum pages limit (${this.zoom.maxPages}), stopping`);
        break;
      }
    } while (nextPageToken);

    this.logger.log(`Found ${recordings.length} recordings`);
    return recordings;
  }

  filterByTopic(recordings: ZoomMeetingRecording[], nameQuery: string): ZoomMeetingRecording[] {
    const needle = nameQuery.toLowerCase();
    return recordings.filter((r) => (r.topic ?? '').toLowerCase().includes(needle));
  }

  /**
   * Longer of the declared duration and the span covered by the files, in minutes.
   * Zoom sometimes reports 0 or 1 for meetings that ran much longer.
   */
  effectiveDuration(recording: ZoomMeetingRecording): number {
    const declared = Number(recording.duration) || 0;
    let earliest = Infinity;
    let latest = -Infinity;
    for (const file of recording.recording_files ?? []) {
      const start = file.recording_start ? Date.parse(file.recording_start) : NaN;
      const end = file.recording_end ? Date.parse(file.recording_end) : NaN;
      if (!Number.isNaN(start)) earliest = Math.min(earliest, start);
      if (!Number.isNaN(end)) latest = Math.max(latest, end);
    }
    const computed = Number.isFinite(earliest) && Number.isFinite(latest) && latest > earliest
      ? (latest - earliest) / 60000
      : 0;
    return Math.max(declared, computed);
  }

  isLongEnough(recording: ZoomMeetingRecording): boolean {
    return this.effectiveDuration(recording) >= MIN_RECORDING_MINUTES;
  }

  private headers(accessToken: string): Record<string, string> {
    return {
      Authorization: `Bearer ${accessToken}`,
      'Content-Type': 'application/json',
    };
  }
}
