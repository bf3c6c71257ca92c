import { DestinationRelayer } from '../../../src/services/DestinationRelayer';
import { DeliveryFailure } from '../../../src/errors';
import { TX_HASH_1, createSilentLogger, transferEvent } from '../../helpers/factories';

const ENDPOINT = 'http://localhost:4000/relay';

describe('DestinationRelayer', () => {
  let relayer: DestinationRelayer;
  let fetchSpy: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    relayer = new DestinationRelayer(
      { endpoint: ENDPOINT, apiKey: 'test-api-key', requestTimeoutMs: 10000 },
      createSilentLogger()
    );
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should post the payload with authentication headers', async () => {
    fetchSpy.mockResolvedValue(new Response(JSON.stringify({ accepted: true }), { status: 200 }));

    const result = await relayer.deliver(transferEvent({ destinationChainId: null, token: null }));

    expect(result).toEqual({ ok: true, status: 200, body: { accepted: true } });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(fetchSpy).toHaveBeenCalledWith(ENDPOINT, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-API-KEY': 'test-api-key' },
      body: expect.any(String),
      signal: expect.anything()
    });

    const init = fetchSpy.mock.calls[0][1];
    expect(JSON.parse(String(init?.body))).toEqual({
      source_tx_hash: TX_HASH_1,
      source_chain_id: 1,
      destination_chain_id: null,
      user: '0x000000000000000000000000000000000000000A',
      token: null,
      amount: '1000',
      block_number: 120
    });
  });

  it('should treat any 2xx status as success', async () => {
    fetchSpy.mockResolvedValue(new Response(null, { status: 202 }));

    const result = await relayer.deliver(transferEvent());

    expect(result).toEqual({ ok: true, status: 202, body: null });
  });

  it('should return a DeliveryFailure carrying the status and body on a non-2xx response', async () => {
    fetchSpy.mockResolvedValue(new Response('internal error', { status: 500 }));

    const result = await relayer.deliver(transferEvent());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DeliveryFailure);
    expect(result.error.message).toBe('Destination responded with HTTP 500');
    expect(result.error.status).toBe(500);
    expect(result.error.responseBody).toBe('internal error');
  });

  it('should return a DeliveryFailure on a network error', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

    const result = await relayer.deliver(transferEvent());

    expect(result).toEqual({ ok: false, error: expect.any(DeliveryFailure) });
    if (result.ok) return;
    expect(result.error.message).toBe('Request to destination failed: fetch failed');
    expect(result.error.status).toBeNull();
  });

  it('should report a timeout', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    fetchSpy.mockRejectedValue(timeout);

    const result = await relayer.deliver(transferEvent());

    if (result.ok) throw new Error('expected a failed delivery');
    expect(result.error.message).toBe('Request to destination failed: timed out after 10000ms');
  });

  it('should make exactly one call per delivery', async () => {
    fetchSpy.mockResolvedValue(new Response('bad gateway', { status: 502 }));

    await relayer.deliver(transferEvent());

    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });
});
