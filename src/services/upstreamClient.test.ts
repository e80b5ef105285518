import { UpstreamError } from '../errors/index.js';
import { createLogger } from '../lib/logger.js';
import { KeyedUpstreamClient } from './upstreamClient.js';

describe('KeyedUpstreamClient', () => {
  let fetchImpl: jest.Mock<Promise<Response>, Parameters<typeof fetch>>;
  let client: KeyedUpstreamClient;

  beforeEach(() => {
    fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
    client = new KeyedUpstreamClient({
      apiKey: 'test-upstream-key',
      keyHeader: 'API-Key',
      logger: createLogger('silent'),
      fetchImpl,
    });
  });

  it('attaches the API key and returns a successful response', async () => {
    fetchImpl.mockResolvedValue(new Response('{"success":true}', { status: 200 }));
    const url = new URL('https://api.example/player?uuid=abc');

    const response = await client.fetch(url);

    expect(await response.text()).toBe('{"success":true}');
    expect(fetchImpl).toHaveBeenCalledWith(url, { method: 'GET', headers: { 'API-Key': 'test-upstream-key' } });
  });

  it('turns a non-200 status into a bad gateway', async () => {
    fetchImpl.mockResolvedValue(new Response('{"cause":"Invalid API key"}', { status: 403 }));

    await expect(client.fetch(new URL('https://api.example/player?uuid=abc'))).rejects.toEqual(new UpstreamError());
  });

  it('treats other successful statuses as failures', async () => {
    fetchImpl.mockResolvedValue(new Response(null, { status: 204 }));

    await expect(client.fetch(new URL('https://api.example/status'))).rejects.toBeInstanceOf(UpstreamError);
  });

  it('turns a network failure into a bad gateway', async () => {
    fetchImpl.mockRejectedValue(new TypeError('fetch failed'));

    await expect(client.fetch(new URL('https://api.example/status'))).rejects.toThrow(
      'Bad Gateway: upstream unreachable',
    );
  });
});
