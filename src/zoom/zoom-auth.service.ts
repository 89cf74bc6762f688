import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { AppConfig, ZoomConfig } from '../config/configuration';
import { AuthenticationError, errorMessage } from '../common/errors';

export interface ZoomCredential {
  accessToken: string;
  /** epoch ms, already reduced by the safety margin */
  expiresAt: number;
}

interface ZoomTokenResponse {
  access_token?: string;
  token_type?: string;
  expires_in?: number;
  scope?: string;
}

export const TOKEN_SAFETY_MARGIN_SECONDS = 300;

/**
 * Server-to-Server OAuth session for the Zoom API.
 *
 * The credential is cached until five minutes before Zoom says it expires.
 * Callers that arrive while an exchange is running wait for that exchange
 * instead of starting their own.
 */
@Injectable()
export class ZoomAuthService {
  private readonly logger = new Logger(ZoomAuthService.name);
  private readonly zoom: ZoomConfig;
  private credential: ZoomCredential | null = null;
  private pending: Promise<ZoomCredential> | null = null;

  constructor(config: ConfigService<AppConfig, true>) {
    this.zoom = config.get('zoom', { infer: true });
  }

  async getToken(): Promise<ZoomCredential> {
    if (this.credential && Date.now() < this.credential.expiresAt) {
      return this.credential;
    }
    if (!this.pending) {
      this.pending = this.exchange().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  async getAccessToken(): Promise<string> {
    const { accessToken } = await this.getToken();
    return accessToken;
  }

  invalidate(): void {
    this.credential = null;
  }

  private async exchange(): Promise<ZoomCredential> {
    const { accountId, clientId, clientSecret, tokenUrl } = this.zoom;
    if (!accountId || !clientId || !clientSecret) {
      throw new AuthenticationError('ZOOM_ACCOUNT_ID, ZOOM_CLIENT_ID and ZOOM_CLIENT_SECRET must be set');
    }

    this.logger.debug(`Getting access token with accountId: ${accountId}, clientId: ${clientId}`);
    const auth = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');

    let data: ZoomTokenResponse;
    try {
      const response = await axios.post<ZoomTokenResponse>(
        tokenUrl,
        new URLSearchParams({ grant_type: 'account_credentials', account_id: accountId }).toString(),
        {
          headers: {
            Authorization: `Basic ${auth}`,
            'Content-Type': 'application/x-www-form-urlencoded',
          },
        },
      );
      data = response.data;
    } catch (error) {
      const detail = axios.isAxiosError(error) && error.response
        ? `${error.response.status} ${JSON.stringify(error.response.data)}`
        : errorMessage(error);
      this.logger.error(`Failed to get Zoom access token: ${detail}`);
      throw new AuthenticationError(`Failed to get Zoom access token: ${detail}`, { cause: error });
    }

    if (!data?.access_token) {
      throw new AuthenticationError('Zoom token response did not contain an access_token');
    }

    const ttlSeconds = Number(data.expires_in ?? 3600);
    this.credential = {
      accessToken: data.access_token,
      expiresAt: Date.now() + (ttlSeconds - TOKEN_SAFETY_MARGIN_SECONDS) * 1000,
    };
    this.logger.debug(`Obtained access token valid for ${ttlSeconds - TOKEN_SAFETY_MARGIN_SECONDS}s`);
    return this.credential;
  }
}
