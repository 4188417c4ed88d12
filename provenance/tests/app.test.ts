import { AddressInfo } from 'net';
import { Server } from 'http';
import { API_PREFIX, createApp } from '../src/app';
import { ProvenanceService } from '../src/core/provenance-service';
import { InMemoryStorageGateway } from '../src/storage/memory-gateway';

interface ApiBody {
  success: boolean;
  data: Record<string, unknown>;
}

async function readBody(response: Response): Promise<ApiBody> {
  return (await response.json()) as ApiBody;
}

describe('provenance HTTP API', () => {
  let server: Server;
  let baseUrl: string;
  let service: ProvenanceService;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    service = new ProvenanceService(new InMemoryStorageGateway(), { encoding: 'legacy-delimited' });
    const app = createApp(service, { jsonBodyLimit: '1mb' });

    await new Promise<void>((resolve) => {
      server = app.listen(0, () => resolve());
    });

    const address = server.address() as AddressInfo;
    baseUrl = `http://127.0.0.1:${address.port}${API_PREFIX}`;
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  test('health reports the service', async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual(
      expect.objectContaining({ success: true, service: 'provenance', status: 'ok' })
    );
  });

  test('readiness reflects the storage backend', async () => {
    const ready = await fetch(`${baseUrl}/ready`);
    expect(ready.status).toBe(200);

    jest.spyOn(service, 'checkReadiness').mockRejectedValue(new Error('node down'));
    const notReady = await fetch(`${baseUrl}/ready`);
    expect(notReady.status).toBe(503);
    await expect(notReady.json()).resolves.toEqual(
      expect.objectContaining({ success: false, ready: false, error: 'Dependencies not ready' })
    );
  });

  test('packaging a SKU returns 201 with the receipt', async () => {
    const response = await post('/packaging/sku', {
      sku_id: 'SKU1',
      parent_batch_id: 'BATCH-9',
      product_name: 'Wheat Flour',
      brand: 'Harvest',
      unit_weight_grams: 500,
      units_packaged: 200,
      package_type: 'pouch',
    });

    expect(response.status).toBe(201);
    const body = await readBody(response);
    expect(body.success).toBe(true);
    expect(body.data.skuId).toBe('SKU1');
    expect(body.data.merkleRoot).toBe('SKU1');
    expect(body.data.parentBatchHash).toBe('0x321c3b408111680ce98b5993c5232f5299ffb12c796080d0050bae22524c197c');
  });

  test('AI score can be verified through the API', async () => {
    const created = await post('/ai/score', {
      batch_id: 'BATCH-7',
      quality_score: 82.5,
      sustainability_score: 70,
      traceability_score: 91,
      model_name: 'grader',
      model_version: '1.2.0',
      features: { moisture: 11 },
      predictions: { grade: 'A' },
      confidence: 0.93,
    });
    expect(created.status).toBe(201);
    const { data } = await readBody(created);

    const verified = await fetch(`${baseUrl}/ai/score/${String(data.ipfsCid)}/verify`);
    expect(verified.status).toBe(200);
    const body = await readBody(verified);
    expect(body.data).toEqual({
      contentAddress: data.ipfsCid,
      valid: true,
      revealHash: data.revealHash,
      commitHash: data.commitHash,
    });
  });

  test('raw content can be uploaded, read and unpinned', async () => {
    const uploaded = await post('/ipfs/upload', { data: { note: 'sample' }, pin: true });
    expect(uploaded.status).toBe(201);
    const { data } = await readBody(uploaded);

    const fetched = await fetch(`${baseUrl}/ipfs/get/${String(data.cid)}`);
    expect((await readBody(fetched)).data).toEqual({ cid: data.cid, data: { note: 'sample' } });

    const unpinned = await fetch(`${baseUrl}/ipfs/pin/${String(data.cid)}`, { method: 'DELETE' });
    expect((await readBody(unpinned)).data).toEqual({ cid: data.cid, pinned: false });

    const status = await fetch(`${baseUrl}/ipfs/pin/${String(data.cid)}`);
    expect((await readBody(status)).data).toEqual({ cid: data.cid, pinned: false });
  });

  test('malformed JSON bodies are rejected with 400', async () => {
    const response = await fetch(`${baseUrl}/fpo/purchase`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"batch_id":',
    });

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual(
      expect.objectContaining({ success: false, error: 'ValidationError', message: 'Request body is not valid JSON' })
    );
  });

  test('validation failures name the field', async () => {
    const response = await post('/logistics/milestone', { shipment_id: 'SHIP-1' });

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual(
      expect.objectContaining({ success: false, message: 'current_location is required' })
    );
  });

  test('unknown routes return 404', async () => {
    const response = await fetch(`${baseUrl}/harvest`);
    expect(response.status).toBe(404);
    await expect(response.json()).resolves.toEqual(
      expect.objectContaining({ success: false, error: 'NotFound', message: 'Route not found' })
    );
  });

  test('caller request ids are echoed back', async () => {
    const response = await fetch(`${baseUrl}/health`, { headers: { 'x-request-id': 'trace-42' } });
    expect(response.headers.get('x-request-id')).toBe('trace-42');
  });
});
