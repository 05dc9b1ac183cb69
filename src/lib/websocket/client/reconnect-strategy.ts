/**
 * ReconnectStrategy
 * Retry budget and exponential backoff with jitter
 */

import { WEBSOCKET_CONSTANTS, type WebSocketConfig } from '../config/websocket-config';

export type RandomSource = () => number;

export class ReconnectStrategy {
  private attemptCount = 0;
  private reconnectPrevented = false;

  constructor(
    private readonly config: WebSocketConfig,
    private readonly random: RandomSource = Math.random
  ) {}

  get attempts(): number {
    return this.attemptCount;
  }

  get maxAttempts(): number {
    return this.config.infiniteReconnect ? Infinity : this.config.maxReconnectAttempts;
  }

  get isPrevented(): boolean {
    return this.reconnectPrevented;
  }

  canRetry(): boolean {
    if (this.reconnectPrevented) {
      return false;
    }
    return this.config.infiniteReconnect || this.attemptCount < this.config.maxReconnectAttempts;
  }

  recordAttempt(): void {
    this.attemptCount++;
  }

  /**
   * base * 2^min(attempts - 1, 10), plus up to 30% jitter, capped at the max delay.
   */
  getNextDelay(): number {
    const exponent = Math.min(this.attemptCount - 1, WEBSOCKET_CONSTANTS.BACKOFF.MAX_EXPONENT);
    const exponential = this.config.reconnectBaseDelay * Math.pow(2, exponent);
    const jitter = this.random() * WEBSOCKET_CONSTANTS.BACKOFF.JITTER_RATIO * exponential;

    return Math.min(exponential + jitter, this.config.reconnectMaxDelay);
  }

  /**
   * Only call once a connection is fully open.
   */
  reset(): void {
    this.attemptCount = 0;
    this.reconnectPrevented = false;
  }

  preventAutoReconnect(): void {
    this.reconnectPrevented = true;
  }
}
