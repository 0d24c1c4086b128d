const { get } = vi.hoisted(() => ({
  get: vi.fn<(...args: unknown[]) => Promise<unknown>>(),
}));

vi.mock('got', () => ({
  default: { extend: () => ({ get }) },
}));

import { decodeBody, HttpTextClient } from '../../src/transport/http-client.js';
import { TransportError } from '../../src/shared/errors.js';

const PAGE_URL = 'https://blog.example/post-1';

function networkError(code: string): Error {
  return Object.assign(new Error(`connect ${code}`), { code });
}

describe('decodeBody', () => {
  it('decodes valid UTF-8', () => {
    expect(decodeBody(new TextEncoder().encode('Gagnez un vélo \u{1F6B2}'))).toBe(
      'Gagnez un vélo \u{1F6B2}',
    );
  });

  it('returns null for invalid UTF-8', () => {
    expect(decodeBody(new Uint8Array([0x48, 0x69, 0xff, 0xfe]))).toBeNull();
  });

  it('decodes an empty body to empty text', () => {
    expect(decodeBody(new Uint8Array())).toBe('');
  });
});

describe('HttpTextClient.fetchText', () => {
  const client = new HttpTextClient({ timeoutMs: 1000, maxAttempts: 2, retryBaseDelayMs: 0 });

  beforeEach(() => {
    get.mockReset();
  });

  it('returns the body of any status with the given headers', async () => {
    get.mockResolvedValueOnce({ statusCode: 404, body: Buffer.from('<p>gone</p>') });

    await expect(client.fetchText(PAGE_URL, { Accept: 'text/html' })).resolves.toBe('<p>gone</p>');
    expect(get).toHaveBeenCalledWith(PAGE_URL, {
      headers: { Accept: 'text/html' },
      responseType: 'buffer',
    });
  });

  it('retries a reset connection once', async () => {
    get
      .mockRejectedValueOnce(networkError('ECONNRESET'))
      .mockResolvedValueOnce({ statusCode: 200, body: Buffer.from('ok') });

    await expect(client.fetchText(PAGE_URL)).resolves.toBe('ok');
    expect(get).toHaveBeenCalledTimes(2);
  });

  it('reports an unreachable host after the last attempt', async () => {
    get.mockRejectedValue(networkError('ECONNREFUSED'));

    const failure = await client.fetchText(PAGE_URL).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(TransportError);
    expect(failure).toMatchObject({ reason: 'unreachable', url: PAGE_URL });
    expect(get).toHaveBeenCalledTimes(2);
  });

  it('reports a body that is not UTF-8 as undecodable', async () => {
    get.mockResolvedValueOnce({ statusCode: 200, body: Buffer.from([0xff, 0xfe, 0x00]) });

    await expect(client.fetchText(PAGE_URL)).rejects.toMatchObject({ reason: 'undecodable' });
  });
});
