import * as path from 'path';

export interface ZoomConfig {
  accountId?: string;
  clientId?: string;
  clientSecret?: string;
  apiBaseUrl: string;
  tokenUrl: string;
  maxPages: number;
}

export interface TransferConfig {
  downloadDir: string;
  timeZone: string;
  dryRun: boolean;
  debug: boolean;
  downloadTimeoutMs: number;
}

export interface RcloneConfig {
  binary: string;
  remoteName: string;
  basePath: string;
  checksum: boolean;
}

export interface SlackConfig {
  webhookUrl?: string;
  enabled: boolean;
  footer: string;
}

export type AppConfig = {
  zoom: ZoomConfig;
  transfer: TransferConfig;
  rclone: RcloneConfig;
  slack: SlackConfig;
};

/** Values given on the command line; they win over the environment. */
export interface CliOverrides {
  remoteName?: string;
  basePath?: string;
  slackWebhookUrl?: string;
  notify?: boolean;
  dryRun?: boolean;
  debug?: boolean;
}

type Env = Record<string, string | undefined>;

function bool(value: string | undefined, def: boolean): boolean {
  if (value === undefined || value.trim() === '') return def;
  return ['true', '1', 't', 'yes'].includes(value.trim().toLowerCase());
}

function int(value: string | undefined, def: number): number {
  if (!value) return def;
  const n = Number(value);
  return Number.isFinite(n) ? n : def;
}

function str(value: string | undefined): string | undefined {
  const v = value?.trim();
  return v ? v : undefined;
}

export function buildConfig(env: Env, overrides: CliOverrides = {}): AppConfig {
  return {
    zoom: {
      accountId: str(env.ZOOM_ACCOUNT_ID),
      clientId: str(env.ZOOM_CLIENT_ID),
      clientSecret: str(env.ZOOM_CLIENT_SECRET),
      apiBaseUrl: str(env.ZOOM_API_BASE_URL) ?? 'https://api.zoom.us/v2',
      tokenUrl: str(env.ZOOM_TOKEN_URL) ?? 'https://zoom.us/oauth/token',
      maxPages: int(env.ZOOM_MAX_PAGES, 50),
    },
    transfer: {
      downloadDir: path.resolve(str(env.DOWNLOAD_DIR) ?? path.join(process.cwd(), 'downloads')),
      timeZone: str(env.TIMEZONE) ?? 'Australia/Melbourne',
      dryRun: overrides.dryRun ?? bool(env.DRY_RUN, false),
      debug: overrides.debug ?? bool(env.DEBUG, false),
      downloadTimeoutMs: int(env.DOWNLOAD_TIMEOUT_MS, 0), // 0 = no limit
    },
    rclone: {
      binary: str(env.RCLONE_BINARY) ?? 'rclone',
      remoteName: overrides.remoteName ?? str(env.RCLONE_REMOTE_NAME) ?? 'recordingdrive',
      basePath: (overrides.basePath ?? str(env.RCLONE_BASE_PATH) ?? 'Recordings').replace(/^\/+|\/+$/g, ''),
      checksum: bool(env.RCLONE_CHECKSUM, true),
    },
    slack: {
      webhookUrl: overrides.slackWebhookUrl ?? str(env.SLACK_WEBHOOK_URL),
      enabled: overrides.notify ?? true,
      footer: str(env.SLACK_FOOTER) ?? 'Sent by zoom-recording-transfer',
    },
  };
}

export default (overrides: CliOverrides = {}) =>
  (): AppConfig =>
    buildConfig(process.env, overrides);
