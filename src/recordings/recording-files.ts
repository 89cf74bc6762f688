import { ZoomMeetingRecording, ZoomRecordingFile } from '../zoom/zoom-recordings.service';

// Keys are lower-case Zoom `recording_type` values.
const EXTENSION_BY_TYPE: Readonly<Record<string, string>> = {
  'shared_screen_with_speaker_view(cc)': '.mp4',
  shared_screen_with_speaker_view: '.mp4',
  audio_only: '.m4a',
  closed_caption: '.vtt',
  chat_file: '.txt',
};

export const PRIMARY_VIDEO_EXTENSION = '.mp4';

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

export interface PlannedFile {
  file: ZoomRecordingFile;
  typeTag: string;
  extension: string;
  fileName: string;
}

export interface RecordingFilePlan {
  /** "DD Month YYYY - <meeting name>" */
  baseName: string;
  /** YYYY-MM-DD in the target timezone */
  dateFolder: string;
  files: PlannedFile[];
  /** files whose type has no extension; the caller decides how to report them */
  unknown: ZoomRecordingFile[];
}

export function extensionFor(typeTag: string | undefined): string | undefined {
  if (!typeTag) return undefined;
  const key = typeTag.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(EXTENSION_BY_TYPE, key) ? EXTENSION_BY_TYPE[key] : undefined;
}

export function isPrimaryVideo(fileName: string): boolean {
  return fileName.toLowerCase().endsWith(PRIMARY_VIDEO_EXTENSION);
}

export function localDate(isoTimestamp: string, timeZone: string): { year: string; month: number; day: string } {
  const date = new Date(isoTimestamp);
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`Invalid recording timestamp: ${isoTimestamp}`);
  }
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '';
  return { year: get('year'), month: Number(get('month')), day: get('day') };
}

export function dateFolderFor(isoTimestamp: string, timeZone: string): string {
  const { year, month, day } = localDate(isoTimestamp, timeZone);
  return `${year}-${String(month).padStart(2, '0')}-${day}`;
}

export function baseNameFor(isoTimestamp: string, meetingName: string, timeZone: string): string {
  const { year, month, day } = localDate(isoTimestamp, timeZone);
  return `${day} ${MONTHS[month - 1]} ${year} - ${meetingName}`;
}

/**
 * Groups the recording's files by type and assigns each one its output name.
 * Within a type that has several files the k-th gets a `_k` suffix.
 */
export function planRecordingFiles(
  recording: ZoomMeetingRecording,
  meetingName: string,
  timeZone: string,
): RecordingFilePlan {
  const baseName = baseNameFor(recording.start_time, meetingName, timeZone);
  const dateFolder = dateFolderFor(recording.start_time, timeZone);

  const byType = new Map<string, ZoomRecordingFile[]>();
  for (const file of recording.recording_files ?? []) {
    const tag = (file.recording_type ?? '').toLowerCase();
    const group = byType.get(tag);
    if (group) group.push(file);
    else byType.set(tag, [file]);
  }

  const files: PlannedFile[] = [];
  const unknown: ZoomRecordingFile[] = [];
  for (const [typeTag, group] of byType) {
    const extension = extensionFor(typeTag);
    if (!extension) {
      unknown.push(...group);
      continue;
    }
    group.forEach((file, index) => {
      const suffix = group.length > 1 ? `_${index + 1}` : '';
      files.push({ file, typeTag, extension, fileName: `${baseName}${suffix}${extension}` });
    });
  }

  return { baseName, dateFolder, files, unknown };
}
