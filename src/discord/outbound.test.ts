import { describe, expect, it, vi } from 'vitest';
import { createDiscordOutbound } from './outbound.js';
import type { SendableChannelLike } from './outbound.js';

function makeChannel() {
  return {
    send: vi.fn<SendableChannelLike['send']>(async () => ({ id: 'sent-1' })),
    sendTyping: vi.fn(async () => {}),
    messages: { delete: vi.fn(async (_id: string) => {}) },
  };
}

function makeClient(cached: Record<string, unknown>, fetched: Record<string, unknown> = {}) {
  return {
    channels: {
      cache: { get: (id: string) => cached[id] },
      fetch: vi.fn(async (id: string) => fetched[id] ?? null),
    },
  };
}

describe('createDiscordOutbound', () => {
  it('sends with bridge mention rules and returns the new id', async () => {
    const channel = makeChannel();
    const outbound = createDiscordOutbound(makeClient({ '100': channel }));
    await expect(outbound.send('100', 'hello')).resolves.toBe('sent-1');
    expect(channel.send).toHaveBeenCalledWith({ content: 'hello', allowedMentions: { parse: ['users', 'roles'] } });
  });

  it('threads replies without failing on deleted targets', async () => {
    const channel = makeChannel();
    const outbound = createDiscordOutbound(makeClient({ '100': channel }));
    await outbound.send('100', 'hello', 'dc-0');
    expect(channel.send).toHaveBeenCalledWith({
      content: 'hello',
      allowedMentions: { parse: ['users', 'roles'] },
      reply: { messageReference: 'dc-0', failIfNotExists: false },
    });
  });

  it('skips empty content', async () => {
    const channel = makeChannel();
    const outbound = createDiscordOutbound(makeClient({ '100': channel }));
    await expect(outbound.send('100', '  ')).resolves.toBeNull();
    expect(channel.send).not.toHaveBeenCalled();
  });

  it('fetches channels missing from the cache', async () => {
    const channel = makeChannel();
    const client = makeClient({}, { '100': channel });
    const outbound = createDiscordOutbound(client);
    await outbound.typing('100');
    await outbound.delete('100', 'dc-5');
    expect(client.channels.fetch).toHaveBeenCalledWith('100');
    expect(channel.sendTyping).toHaveBeenCalledTimes(1);
    expect(channel.messages.delete).toHaveBeenCalledWith('dc-5');
  });

  it('rejects channels it cannot send to', async () => {
    const outbound = createDiscordOutbound(makeClient({ '100': { name: 'voice' } }));
    await expect(outbound.send('100', 'hi')).rejects.toThrow('Discord channel 100 is not a text channel');
    await expect(outbound.typing('404')).rejects.toThrow('Discord channel 404 is not a text channel');
  });
});
