import type { FastifyBaseLogger } from 'fastify';
import type { NotificationMessage, Notifier } from './notifier.types.js';

const WEBHOOK_TIMEOUT_MS = 15_000;

export const ALERT_COLORS = {
  signal: 16763904,
  buy: 3447003,
  sell: 15158332,
  top: 16711680,
  dip: 3066993,
  profitTaking: 16744448,
  trailingStop: 10038562,
  portfolioUp: 3066993,
  portfolioDown: 15158332,
  summary: 5793266,
} as const;

export function toDiscordPayload(message: NotificationMessage) {
  return {
    embeds: [
      {
        title: message.title,
        description: message.description,
        color: message.color,
        fields: message.fields,
        footer: { text: message.footer },
      },
    ],
  };
}

export function createDiscordNotifier(
  webhookUrl: string,
  log: FastifyBaseLogger,
): Notifier {
  return {
    async send(message) {
      if (!webhookUrl) {
        log.warn({ title: message.title }, 'discord webhook not configured, skipping message');
        return false;
      }
      try {
        const res = await fetch(webhookUrl, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(toDiscordPayload(message)),
          signal: AbortSignal.timeout(WEBHOOK_TIMEOUT_MS),
        });
        if (!res.ok) {
          const body = await res.text();
          log.error(
            { status: res.status, body, title: message.title },
            'discord webhook rejected message',
          );
          return false;
        }
        return true;
      } catch (err) {
        log.error({ err, title: message.title }, 'failed to send discord message');
        return false;
      }
    },
  };
}
