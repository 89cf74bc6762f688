import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { AppConfig, SlackConfig } from '../config/configuration';
import { NotificationDeliveryError, errorMessage } from '../common/errors';

export interface SlackMessage {
  text: string;
  blocks: Array<
    | { type: 'section'; text: { type: 'mrkdwn'; text: string } }
    | { type: 'context'; elements: Array<{ type: 'mrkdwn'; text: string }> }
  >;
}

export function driveLink(remoteId: string): string {
  return `https://drive.google.com/file/d/${remoteId}/view`;
}

@Injectable()
export class SlackService {
  private readonly logger = new Logger(SlackService.name);
  private readonly slack: SlackConfig;

  constructor(config: ConfigService<AppConfig, true>) {
    this.slack = config.get('slack', { infer: true });
  }

  /** Notifications were not switched off on the command line. */
  get requested(): boolean {
    return this.slack.enabled;
  }

  get enabled(): boolean {
    return this.slack.enabled && Boolean(this.slack.webhookUrl);
  }

  buildMessage(recordingName: string, fileName: string, remoteId: string): SlackMessage {
    return {
      text: `New recording uploaded: ${recordingName}`,
      blocks: [
        {
          type: 'section',
          text: {
            type: 'mrkdwn',
            text:
              `*New recording uploaded*\n• Recording: ${recordingName}\n• File: ${fileName}\n` +
              `• <${driveLink(remoteId)}|View in Google Drive>`,
          },
        },
        {
          type: 'context',
          elements: [{ type: 'mrkdwn', text: `_${this.slack.footer}_` }],
        },
      ],
    };
  }

  /** Fire-and-forget: delivery problems are logged, never thrown. */
  async notify(recordingName: string, fileName: string, remoteId: string): Promise<boolean> {
    if (!this.slack.enabled) {
      this.logger.log(`Slack notifications disabled, not announcing ${fileName}`);
      return false;
    }
    if (!this.slack.webhookUrl) {
      this.logger.warn('No Slack webhook URL configured, skipping notification');
      return false;
    }

    try {
      const res = await axios.post(this.slack.webhookUrl, this.buildMessage(recordingName, fileName, remoteId), {
        headers: { 'Content-Type': 'application/json' },
        validateStatus: () => true,
      });
      if (res.status < 200 || res.status >= 300) {
        throw new NotificationDeliveryError(fileName, `webhook answered ${res.status}`);
      }
      this.logger.log(`Slack notification sent for ${fileName}`);
      return true;
    } catch (error) {
      const failure = error instanceof NotificationDeliveryError
        ? error
        : new NotificationDeliveryError(fileName, errorMessage(error), { cause: error });
      this.logger.error(failure.message);
      return false;
    }
  }
}
