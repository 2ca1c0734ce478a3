import { afterEach, describe, expect, it, vi } from 'vitest';

import { createDiscordNotifier, toDiscordPayload } from '../src/services/notifier.js';
import type { NotificationMessage } from '../src/services/notifier.types.js';
import { mockLogger } from './helpers.js';

const message: NotificationMessage = {
  title: 'Price Alert: Sui',
  description: '**BUY target reached**',
  color: 3447003,
  fields: [{ name: 'Current Price', value: '$2.40', inline: true }],
  footer: 'Price alert generated at 2026-03-01 00:00:00 UTC',
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('discord notifier', () => {
  it('wraps the message in a single embed', () => {
    expect(toDiscordPayload(message)).toEqual({
      embeds: [
        {
          title: 'Price Alert: Sui',
          description: '**BUY target reached**',
          color: 3447003,
          fields: [{ name: 'Current Price', value: '$2.40', inline: true }],
          footer: { text: 'Price alert generated at 2026-03-01 00:00:00 UTC' },
        },
      ],
    });
  });

  it('posts JSON to the webhook', async () => {
    const fetchMock = vi.spyOn(global, 'fetch').mockResolvedValue(new Response(null, { status: 204 }));
    const ok = await createDiscordNotifier('https://discord.test/hook', mockLogger()).send(message);
    expect(ok).toBe(true);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://discord.test/hook');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual(toDiscordPayload(message));
  });

  it('reports failure for a rejected message', async () => {
    vi.spyOn(global, 'fetch').mockResolvedValue(new Response('bad', { status: 400 }));
    const log = mockLogger();
    expect(await createDiscordNotifier('https://discord.test/hook', log).send(message)).toBe(false);
    expect(log.error).toHaveBeenCalledTimes(1);
  });

  it('reports failure for a network error', async () => {
    vi.spyOn(global, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
    expect(await createDiscordNotifier('https://discord.test/hook', mockLogger()).send(message)).toBe(false);
  });

  it('skips sending without a webhook', async () => {
    const fetchMock = vi.spyOn(global, 'fetch');
    const log = mockLogger();
    expect(await createDiscordNotifier('', log).send(message)).toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledTimes(1);
  });
});
