// tests/integration/DiscordNotifier.test.ts

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import nock from 'nock';
import { DiscordNotifier, truncateMessage } from '../../src/connectors/discord/DiscordNotifier';
import { DeliveryError } from '../../src/utils/errors';
import { testCore } from '../support/fakes';

const WEBHOOK = 'https://discord.test/api/webhooks/1/test-secret';

describe('DiscordNotifier', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('posts trimmed content to the webhook', async () => {
    const scope = nock('https://discord.test')
      .post('/api/webhooks/1/test-secret', { content: 'hello' })
      .reply(204);

    await new DiscordNotifier(testCore(), { webhookUrl: WEBHOOK }).send('  hello \n');

    expect(scope.isDone()).toBe(true);
  });

  it('truncates content over the Discord limit', async () => {
    let posted = '';
    nock('https://discord.test')
      .post('/api/webhooks/1/test-secret', (body: { content: string }) => {
        posted = body.content;
        return true;
      })
      .reply(204);

    await new DiscordNotifier(testCore(), { webhookUrl: WEBHOOK }).send('x'.repeat(2500));

    expect(posted).toHaveLength(2000);
    expect(posted.endsWith('x…')).toBe(true);
  });

  it('rejects empty content', async () => {
    await expect(
      new DiscordNotifier(testCore(), { webhookUrl: WEBHOOK }).send('   ')
    ).rejects.toThrow('Discord message content must not be empty');
  });

  it('rejects when no webhook is configured', async () => {
    await expect(new DiscordNotifier(testCore(), {}).send('hello')).rejects.toThrow(
      'DISCORD_WEBHOOK_URL is not configured'
    );
  });

  it('turns HTTP failures into delivery errors', async () => {
    nock('https://discord.test').post('/api/webhooks/1/test-secret').reply(400, { message: 'bad' });

    const error = await new DiscordNotifier(testCore(), { webhookUrl: WEBHOOK })
      .send('hello')
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DeliveryError);
    expect(error).toHaveProperty('message', 'Failed to post Discord message: Client error: 400');
  });
});

describe('truncateMessage', () => {
  it('leaves short content alone', () => {
    expect(truncateMessage('short', 10)).toBe('short');
  });

  it('counts characters, not UTF-16 units', () => {
    expect(truncateMessage('😀😀😀', 2)).toBe('😀…');
  });
});
