// src/connectors/discord/DiscordNotifier.ts

import type { CoreDeps, Notifier } from '../types';
import { DeliveryError, WatchError, errorMessage } from '../../utils/errors';

/** Discord rejects webhook messages longer than this */
export const DISCORD_MESSAGE_LIMIT = 2000;

export interface DiscordNotifierOptions {
  webhookUrl?: string;
}

export class DiscordNotifier implements Notifier {
  constructor(
    private deps: Pick<CoreDeps, 'http' | 'logger'>,
    private options: DiscordNotifierOptions
  ) {}

  async send(content: string): Promise<void> {
    const normalized = content.trim();
    if (!normalized) {
      throw new DeliveryError('Discord message content must not be empty');
    }

    const webhookUrl = this.options.webhookUrl;
    if (!webhookUrl) {
      throw new DeliveryError('DISCORD_WEBHOOK_URL is not configured');
    }

    const message = truncateMessage(normalized);
    if (message !== normalized) {
      this.deps.logger.warn('Discord message truncated', {
        originalLength: normalized.length,
        limit: DISCORD_MESSAGE_LIMIT,
      });
    }

    try {
      await this.deps.http.post(webhookUrl, { content: message }, {
        provider: 'discord',
        headers: { 'Content-Type': 'application/json' },
      });
    } catch (error) {
      throw new DeliveryError(`Failed to post Discord message: ${errorMessage(error)}`, {
        cause: errorMessage(error),
        code: error instanceof WatchError ? error.code : undefined,
      });
    }
  }
}

export function truncateMessage(content: string, limit: number = DISCORD_MESSAGE_LIMIT): string {
  const chars = Array.from(content);
  if (chars.length <= limit) return content;
  return `${chars.slice(0, limit - 1).join('')}…`;
}
