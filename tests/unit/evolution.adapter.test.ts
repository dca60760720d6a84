jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { env } from '../../src/config/env';
import { createWhatsAppSender, EvolutionAdapter } from '../../src/services/whatsapp/evolution.adapter';
import { ServiceError } from '../../src/utils/errors';

function response(status: number, body = '') {
  return new Response(body, { status });
}

describe('EvolutionAdapter', () => {
  const fetchMock = jest.fn();
  const originalFetch = global.fetch;

  beforeEach(() => {
    fetchMock.mockReset();
    global.fetch = fetchMock;
  });

  afterAll(() => {
    global.fetch = originalFetch;
  });

  const adapter = new EvolutionAdapter({
    baseUrl: 'http://evolution.local/',
    apiKey: 'test-evolution-key',
    instance: 'franquias',
    maxAttempts: 3,
    retryBaseDelayMs: 0,
  });

  it('posts the text to the instance endpoint', async () => {
    fetchMock.mockResolvedValue(response(201, '{}'));

    await adapter.sendText('5551999999999', 'Olá!');

    expect(fetchMock).toHaveBeenCalledWith('http://evolution.local/message/sendText/franquias', {
      method: 'POST',
      headers: { apikey: 'test-evolution-key', 'Content-Type': 'application/json' },
      body: JSON.stringify({ number: '5551999999999', text: 'Olá!' }),
    });
  });

  it('retries server errors and then succeeds', async () => {
    fetchMock.mockResolvedValueOnce(response(502, 'bad gateway')).mockResolvedValueOnce(response(200, '{}'));

    await adapter.sendText('5551999999999', 'Olá!');

    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('retries after a rate limit', async () => {
    fetchMock.mockResolvedValueOnce(response(429)).mockResolvedValueOnce(response(200, '{}'));

    await adapter.sendText('5551999999999', 'Olá!');

    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('gives up immediately on client errors', async () => {
    fetchMock.mockResolvedValue(response(400, 'invalid number'));

    const sending = adapter.sendText('123', 'Olá!');

    await expect(sending).rejects.toBeInstanceOf(ServiceError);
    await expect(sending).rejects.toThrow(
      'EvolutionAPI.sendText failed: Evolution API POST /message/sendText/franquias returned 400: invalid number'
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('throws after exhausting network retries', async () => {
    fetchMock.mockRejectedValue(new Error('ECONNRESET'));

    await expect(adapter.sendText('5551999999999', 'Olá!')).rejects.toThrow('EvolutionAPI.sendText failed: ECONNRESET');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});

describe('createWhatsAppSender', () => {
  it('returns null when the Evolution API is not configured', () => {
    expect(createWhatsAppSender({ ...env, EVOLUTION_API_URL: undefined })).toBeNull();
  });

  it('builds an adapter from the environment', () => {
    const sender = createWhatsAppSender({
      ...env,
      EVOLUTION_API_URL: 'http://evolution.local',
      EVOLUTION_API_KEY: 'test-evolution-key',
      EVOLUTION_INSTANCE_ID: 'franquias',
    });

    expect(sender).toBeInstanceOf(EvolutionAdapter);
  });
});
