/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import axios, { AxiosInstance } from 'axios';
import * as winston from 'winston';

import { errorMessage } from '../lib/error.js';
import * as metrics from '../metrics.js';
import {
  DivergenceNotification,
  NotificationResult,
  NotificationSink,
} from '../types.js';

const DEFAULT_CHANNEL = '#general';
const USERNAME = 'Solana Block QA Tracker';
const ICON_EMOJI = ':warning:';
const DEFAULT_TIMEOUT_MS = 5_000;

export interface SlackMessage {
  channel: string;
  username: string;
  icon_emoji: string;
  text: string;
}

export function formatDivergenceMessage(
  notification: DivergenceNotification,
): string {
  return [
    '🚨 *Solana Block QA Alert* 🚨',
    `Block differences detected at slot ${notification.sequence}`,
    `• Firehose checksum: \`${notification.fingerprintA}\``,
    `• RPC Fetcher checksum: \`${notification.fingerprintB}\``,
    `• Firehose JSON file: \`${notification.artifactPathA}\``,
    `• RPC Fetcher JSON file: \`${notification.artifactPathB}\``,
    `• Time: ${notification.timestamp}`,
  ].join('\n');
}

export class SlackWebhookNotifier implements NotificationSink {
  // Dependencies
  private log: winston.Logger;
  private slackAxios: AxiosInstance;

  // Settings
  readonly webhookUrl: string;
  readonly channel: string;

  constructor({
    log,
    webhookUrl,
    channel,
    timeoutMs = DEFAULT_TIMEOUT_MS,
  }: {
    log: winston.Logger;
    webhookUrl: string;
    channel: string;
    timeoutMs?: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.webhookUrl = webhookUrl;
    this.channel = channel !== '' ? channel : DEFAULT_CHANNEL;
    this.slackAxios = axios.create({
      timeout: timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  get enabled(): boolean {
    return this.webhookUrl !== '';
  }

  buildMessage(notification: DivergenceNotification): SlackMessage {
    return {
      channel: this.channel,
      username: USERNAME,
      icon_emoji: ICON_EMOJI,
      text: formatDivergenceMessage(notification),
    };
  }

  async notify(
    notification: DivergenceNotification,
  ): Promise<NotificationResult> {
    const log = this.log.child({
      method: 'notify',
      sequence: notification.sequence,
    });

    if (!this.enabled) {
      log.info('Slack webhook URL not set, skipping notification');
      metrics.notificationsCounter.inc({ status: 'disabled' });
      return { delivered: false };
    }

    try {
      await this.slackAxios.post(
        this.webhookUrl,
        this.buildMessage(notification),
      );
      log.info('Divergence notification sent', { channel: this.channel });
      metrics.notificationsCounter.inc({ status: 'delivered' });
      return { delivered: true };
    } catch (error) {
      log.error('Failed to send divergence notification', {
        channel: this.channel,
        message: errorMessage(error),
      });
      metrics.notificationsCounter.inc({ status: 'failed' });
      return { delivered: false };
    }
  }
}
