import {
  ENVELOPE_VERSION,
  buildEnvelope,
  markPersisted,
  parseStoredEnvelope,
  serializeEnvelope,
} from '../src/core/envelope';
import { SerializationError } from '../src/utils/errors';

function buildDraft(payload: Record<string, unknown> = { quantity_kg: 100, batch_id: 'B1' }) {
  return buildEnvelope({
    stage: 'fpo_purchase',
    createdAt: new Date(Date.UTC(2024, 4, 1)),
    encoding: 'legacy-delimited',
    identifiers: { batchId: 'B1' },
    derivedHashes: { batchHash: '0xabc' },
    payload,
  });
}

describe('record envelope', () => {
  test('draft envelopes are frozen and carry no content address', () => {
    const draft = buildDraft();
    expect(Object.isFrozen(draft)).toBe(true);
    expect(Object.isFrozen(draft.payload)).toBe(true);
    expect(draft.contentAddress).toBeUndefined();
  });

  test('serializes to canonical JSON with snake-case keys', () => {
    const serialized = serializeEnvelope(buildDraft());
    expect(serialized.json).toBe(
      '{"created_at":"2024-05-01T00:00:00.000Z","derived_hashes":{"batchHash":"0xabc"},' +
        `"envelope_version":"${ENVELOPE_VERSION}","hash_encoding":"legacy-delimited","identifiers":{"batchId":"B1"},` +
        '"payload":{"batch_id":"B1","quantity_kg":100},"record_type":"fpo_purchase"}'
    );
    expect(Buffer.from(serialized.bytes).toString('utf8')).toBe(serialized.json);
  });

  test('serialization failures surface as SerializationError', () => {
    expect(() => serializeEnvelope(buildDraft({ quantity_kg: Number.POSITIVE_INFINITY }))).toThrow(SerializationError);
  });

  test('markPersisted returns a frozen copy with the content address', () => {
    const draft = buildDraft();
    const persisted = markPersisted(draft, 'bafy-test');
    expect(persisted.contentAddress).toBe('bafy-test');
    expect(persisted.identifiers).toEqual({ batchId: 'B1' });
    expect(Object.isFrozen(persisted)).toBe(true);
    expect(draft.contentAddress).toBeUndefined();
  });

  test('parseStoredEnvelope reads back a serialized envelope', () => {
    const parsed = parseStoredEnvelope(serializeEnvelope(buildDraft()).bytes);
    expect(parsed).toEqual({
      envelope_version: ENVELOPE_VERSION,
      record_type: 'fpo_purchase',
      created_at: '2024-05-01T00:00:00.000Z',
      hash_encoding: 'legacy-delimited',
      identifiers: { batchId: 'B1' },
      derived_hashes: { batchHash: '0xabc' },
      payload: { batch_id: 'B1', quantity_kg: 100 },
    });
  });

  test('parseStoredEnvelope returns null for foreign content', () => {
    const encode = (value: string) => Buffer.from(value, 'utf8');
    expect(parseStoredEnvelope(encode('not json'))).toBeNull();
    expect(parseStoredEnvelope(encode('[1,2]'))).toBeNull();
    expect(parseStoredEnvelope(encode('{"hello":"world"}'))).toBeNull();

    const unknownStage = serializeEnvelope(buildDraft()).json.replace('"fpo_purchase"', '"harvest"');
    expect(parseStoredEnvelope(encode(unknownStage))).toBeNull();
  });
});
