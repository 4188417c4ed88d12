import type { StageContext } from '../src/core/stage';
import {
  aiScoreStage,
  computeCropIdHash,
  computeLocationHash,
  computeParentBatchHash,
  computeProcessingHashes,
  computePurchaseBatchHash,
  computeScoreBatchHash,
  computeSkuMerkleRoot,
  computeWarehouseStateHash,
  createSkuStage,
  farmerRegistrationStage,
  fpoPurchaseStage,
  logisticsMilestoneStage,
  processBatchStage,
  warehouseUpdateStage,
} from '../src/core/stages';
import { generalHash } from '../src/core/hasher';
import { ValidationError } from '../src/utils/errors';

const context: StageContext = {
  createdAt: new Date(Date.UTC(2024, 4, 1, 10, 20, 30)),
  encoding: 'legacy-delimited',
  generateDid: (method) => `did:${method}:test-1`,
  generateNonce: () => '00112233445566778899aabbccddeeff',
};

const purchaseBody = {
  farmer_did: 'did:farmer:test-1',
  fpo_name: 'Green Valley FPO',
  batch_id: 'BATCH-1',
  quantity_kg: 100,
  price_per_kg: 22.5,
  quality_grade: 'A',
};

describe('farmer registration', () => {
  test('identity comes from the DID source and the crop id hash covers the anchor timestamp', () => {
    const request = farmerRegistrationStage.validate({
      farmer_name: 'Asha',
      crop_type: 'wheat',
      land_area_hectares: 2.5,
      location: 'Nashik',
    });
    const identifiers = farmerRegistrationStage.identify(request, context);

    expect(identifiers).toEqual({ farmerDid: 'did:farmer:test-1' });
    expect(farmerRegistrationStage.preHash(request, identifiers, context)).toEqual({
      cropIdHash: '0x8d6badec4de12abec1cc2e2f9930cdf1861682344606f5232aed03a58b061aee',
    });
    expect(computeCropIdHash('did:farmer:test-1', 'wheat', context.createdAt, 'legacy-delimited')).toBe(
      '0x8d6badec4de12abec1cc2e2f9930cdf1861682344606f5232aed03a58b061aee'
    );
    expect(request.land_ownership_docs).toEqual([]);
  });

  test('rejects a blank farmer name', () => {
    expect(() =>
      farmerRegistrationStage.validate({ farmer_name: '  ', crop_type: 'wheat', land_area_hectares: 1, location: 'x' })
    ).toThrow('farmer_name is required');
  });

  test('rejects out-of-range GPS coordinates', () => {
    expect(() =>
      farmerRegistrationStage.validate({
        farmer_name: 'Asha',
        crop_type: 'wheat',
        land_area_hectares: 1,
        location: 'x',
        gps_coordinates: { latitude: 91, longitude: 0 },
      })
    ).toThrow('gps_coordinates.latitude must be at most 90');
  });
});

describe('FPO purchase', () => {
  test('batch hash covers farmer, batch, quantity and FPO in order', () => {
    const request = fpoPurchaseStage.validate(purchaseBody);
    expect(computePurchaseBatchHash(request, 'legacy-delimited')).toBe(
      '0xad626a65ac947c1c563f25883b4f4e9c5f721bbc007ec073e002e6b6420f2416'
    );
  });

  test('length-prefixed encoding yields a different digest for the same request', () => {
    const request = fpoPurchaseStage.validate(purchaseBody);
    expect(computePurchaseBatchHash(request, 'length-prefixed')).toBe(
      '0x7e58e771d8e783acc7dc8d6fffcc27fdae7606821997f20343e24ce94c6dc90d'
    );
  });

  test('quantity must be positive', () => {
    expect(() => fpoPurchaseStage.validate({ ...purchaseBody, quantity_kg: 0 })).toThrow(
      'quantity_kg must be greater than 0'
    );
  });

  test('non-object bodies are rejected', () => {
    expect(() => fpoPurchaseStage.validate('BATCH-1')).toThrow(ValidationError);
  });
});

describe('warehouse update', () => {
  const request = warehouseUpdateStage.validate({
    warehouse_id: 'WH-1',
    batch_id: 'BATCH-1',
    storage_location: 'Bay 4',
    temperature_celsius: 4,
  });

  test('state hash is computed only after storage and covers the content address', () => {
    expect(warehouseUpdateStage.preHash(request, { warehouseId: 'WH-1', batchId: 'BATCH-1' }, context)).toEqual({});
    expect(warehouseUpdateStage.postHash(request, 'bafy-test', context)).toEqual({
      stateHash: '0x8e2a716f3df824ca15df764c08f54544eea79e237f0b50ba76ec722dee0f767f',
    });
  });

  test('different content addresses give different state hashes', () => {
    expect(computeWarehouseStateHash(request, 'bafy-a', 'legacy-delimited')).not.toBe(
      computeWarehouseStateHash(request, 'bafy-b', 'legacy-delimited')
    );
  });

  test('pest inspection requires a timestamp', () => {
    expect(() =>
      warehouseUpdateStage.validate({
        warehouse_id: 'WH-1',
        batch_id: 'BATCH-1',
        storage_location: 'Bay 4',
        pest_inspection: { inspected_at: 'yesterday', pest_found: false },
      })
    ).toThrow('pest_inspection.inspected_at must be an ISO-8601 timestamp');
  });
});

describe('logistics milestone', () => {
  const body = {
    shipment_id: 'SHIP-1',
    current_location: 'Nagpur hub',
    gps_coordinates: { latitude: 21.15, longitude: 79.09 },
    milestone_type: 'in_transit',
    carrier_name: 'Road Freight',
    vehicle_id: 'MH-31-0001',
  };

  test('location hash covers shipment, place and coordinates', () => {
    const request = logisticsMilestoneStage.validate(body);
    expect(computeLocationHash(request, 'legacy-delimited')).toBe(
      '0xc6bab258dfb33335bdd50edc8fd75db25b9220fe08fa0c920e74a32ed022c775'
    );
    expect(request.is_delivered).toBe(false);
    expect(request.shock_events).toEqual([]);
  });

  test('unknown milestone types are rejected', () => {
    expect(() => logisticsMilestoneStage.validate({ ...body, milestone_type: 'teleported' })).toThrow(
      'milestone_type must be one of: picked_up, in_transit, at_checkpoint, delivered, delayed, incident'
    );
  });

  test('shock events are validated individually', () => {
    expect(() =>
      logisticsMilestoneStage.validate({
        ...body,
        shock_events: [{ timestamp: '2024-05-01T10:00:00Z', g_force: -1 }],
      })
    ).toThrow('shock_events[0].g_force must be at least 0');
  });
});

describe('process batch', () => {
  const request = processBatchStage.validate({
    input_batch_id: 'BATCH-1',
    processor_name: 'Mill Co',
    processing_type: 'milling',
    input_quantity_kg: 1000,
    output_quantity_kg: 800,
    yield_percentage: 80,
    waste_percentage: 20,
    output_batch_ids: ['OUT-1', 'OUT-2'],
  });

  test('produces input, per-output and transform hashes', () => {
    expect(computeProcessingHashes(request, 'legacy-delimited')).toEqual({
      inputBatchHash: '0xf9060bdb6b3a8e2fc70e2ba205bedda6400d0cf37f3e901689a03baaf2a85a55',
      outputBatchHashes: [
        '0x0530c4f82f1298ba4aa7a291b379b51b579d4461737fa2821ff813d7e0c5d049',
        '0x378c3fa9fb4dc6dc1c05f454f9deb5a9395afc8f1cd2b7b43946ebbc3882ce9a',
      ],
      transformHash: '0x558567d1c915e8bf1ff56254c48bd46ce4a861dcaf0da685689fd59e6fb8fa5c',
    });
  });

  test('an empty output list yields no output hashes', () => {
    const withoutOutputs = processBatchStage.validate({
      input_batch_id: 'BATCH-1',
      processor_name: 'Mill Co',
      processing_type: 'milling',
      input_quantity_kg: 1000,
      output_quantity_kg: 800,
      yield_percentage: 80,
      waste_percentage: 20,
      output_batch_ids: [],
    });

    const hashes = computeProcessingHashes(withoutOutputs, 'legacy-delimited');
    expect(hashes.outputBatchHashes).toEqual([]);
    expect(hashes.inputBatchHash).toBe('0xf9060bdb6b3a8e2fc70e2ba205bedda6400d0cf37f3e901689a03baaf2a85a55');
  });

  test('the output list itself is required', () => {
    expect(() =>
      processBatchStage.validate({
        input_batch_id: 'BATCH-1',
        processor_name: 'Mill Co',
        processing_type: 'milling',
        input_quantity_kg: 1000,
        output_quantity_kg: 800,
        yield_percentage: 80,
        waste_percentage: 20,
      })
    ).toThrow('output_batch_ids is required');
  });
});

describe('create SKU', () => {
  const body = {
    sku_id: 'SKU1',
    parent_batch_id: 'BATCH-9',
    product_name: 'Wheat Flour',
    brand: 'Harvest',
    unit_weight_grams: 500,
    units_packaged: 200,
    package_type: 'pouch',
  };

  test('without proof leaves the merkle root is the SKU id itself', () => {
    const request = createSkuStage.validate(body);
    expect(computeSkuMerkleRoot(request)).toBe('SKU1');
    expect(computeParentBatchHash(request, 'legacy-delimited')).toBe(
      '0x321c3b408111680ce98b5993c5232f5299ffb12c796080d0050bae22524c197c'
    );
  });

  test('proof leaves are combined into a root', () => {
    const request = createSkuStage.validate({ ...body, merkle_proof: ['a', 'b'] });
    expect(computeSkuMerkleRoot(request)).toBe(generalHash('ab'));
  });

  test('empty proof leaves are hashed as given', () => {
    const request = createSkuStage.validate({ ...body, merkle_proof: ['', 'a'] });
    expect(computeSkuMerkleRoot(request)).toBe(generalHash('a'));
  });

  test('proof leaves must be strings', () => {
    expect(() => createSkuStage.validate({ ...body, merkle_proof: ['a', 7] })).toThrow('merkle_proof[1] must be a string');
  });

  test('units packaged must be a whole number', () => {
    expect(() => createSkuStage.validate({ ...body, units_packaged: 1.5 })).toThrow('units_packaged must be an integer');
  });
});

describe('AI score', () => {
  const body = {
    batch_id: 'BATCH-7',
    quality_score: 82.5,
    sustainability_score: 70,
    traceability_score: 91,
    model_name: 'grader',
    model_version: '1.2.0',
    features: { moisture: 11 },
    predictions: { grade: 'A' },
    confidence: 0.93,
  };

  test('pre-hash carries the batch hash and a commit-reveal pair', () => {
    const request = aiScoreStage.validate(body);
    const hashes = aiScoreStage.preHash(request, { batchId: 'BATCH-7' }, context);

    expect(hashes.batchHash).toBe('0x278fba72f4a94358362b461b2d5c11279c6225191e4659fb60872281f7420162');
    expect(computeScoreBatchHash(request, 'legacy-delimited')).toBe(hashes.batchHash);
    expect(hashes.nonce).toBe('00112233445566778899aabbccddeeff');
    expect(hashes.commitHash).toBe(generalHash(`${hashes.revealHash}${hashes.nonce}`));
  });

  test('scores outside 0..100 are rejected', () => {
    expect(() => aiScoreStage.validate({ ...body, quality_score: 101 })).toThrow('quality_score must be at most 100');
  });

  test('features must be JSON', () => {
    expect(() => aiScoreStage.validate({ ...body, features: undefined })).toThrow('features is required and must be JSON');
  });
});
