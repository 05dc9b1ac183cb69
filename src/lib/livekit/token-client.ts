/**
 * TokenClient
 * Exchanges a room and identity for a short-lived access token
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { TokenRequestError } from '../utils/errors';

const DEFAULT_TTL_SECONDS = 3600;

export interface TokenRequest {
  room: string;
  identity: string;
  /** Lifetime in seconds */
  ttl?: number;
}

const TokenResponseSchema = z.object({
  token: z.string().min(1),
  room: z.string(),
  identity: z.string(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

export interface TokenClientOptions {
  endpoint: string;
  timeout?: number;
  /** Custom axios instance, mainly for tests */
  http?: AxiosInstance;
}

export class TokenClient {
  private readonly http: AxiosInstance;
  private readonly endpoint: string;

  constructor(options: TokenClientOptions) {
    this.endpoint = options.endpoint;
    this.http =
      options.http ??
      axios.create({
        timeout: options.timeout ?? 10000,
        headers: {
          'Content-Type': 'application/json',
        },
      });
  }

  async requestToken({ room, identity, ttl = DEFAULT_TTL_SECONDS }: TokenRequest): Promise<TokenResponse> {
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(this.endpoint, { room, identity, ttl });
      data = response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      logger.error('Token request failed', error, { room, status });
      throw new TokenRequestError(
        status ? `Token request failed with status ${status}` : 'Token request failed',
        status,
        error
      );
    }

    const parsed = TokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      logger.error('Invalid token response', parsed.error, { room });
      throw new TokenRequestError('Token response invalid', undefined, parsed.error);
    }

    logger.debug('Token issued', { room, identity });
    return parsed.data;
  }
}

/**
 * Build a TokenClient from CHAT_TOKEN_ENDPOINT, or undefined when unset
 */
export function createTokenClientFromEnv(env: NodeJS.ProcessEnv = process.env): TokenClient | undefined {
  const endpoint = env.CHAT_TOKEN_ENDPOINT;
  if (!endpoint) {
    logger.warn('Token endpoint not configured');
    return undefined;
  }
  return new TokenClient({ endpoint, timeout: Number(env.CHAT_TOKEN_TIMEOUT) || undefined });
}
