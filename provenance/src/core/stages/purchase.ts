import type { FpoPurchaseReceipt, FpoPurchaseRequest } from '../../types';
import { encodeFields, formatDecimal, type HashEncoding } from '../encoding';
import { solidityHash, type Digest } from '../hasher';
import { noHashes, type NoHashes, type StageDefinition } from '../stage';
import { asRecord, optionalNumber, optionalString, requireNumber, requireString, stringList } from '../validation';

export function computePurchaseBatchHash(request: FpoPurchaseRequest, encoding: HashEncoding): Digest {
  return solidityHash(
    encodeFields(
      [request.farmer_did, request.batch_id, formatDecimal(request.quantity_kg), request.fpo_name],
      encoding
    )
  );
}

export const fpoPurchaseStage: StageDefinition<
  FpoPurchaseRequest,
  { batchId: string; farmerDid: string },
  { batchHash: Digest },
  NoHashes,
  FpoPurchaseReceipt
> = {
  stage: 'fpo_purchase',

  validate(input) {
    const body = asRecord(input, 'body');
    return {
      farmer_did: requireString(body, 'farmer_did'),
      fpo_name: requireString(body, 'fpo_name'),
      batch_id: requireString(body, 'batch_id'),
      quantity_kg: requireNumber(body, 'quantity_kg', { min: 0, exclusiveMin: true }),
      price_per_kg: requireNumber(body, 'price_per_kg', { min: 0 }),
      quality_grade: requireString(body, 'quality_grade'),
      quality_report_url: optionalString(body, 'quality_report_url'),
      weight_slip_url: optionalString(body, 'weight_slip_url'),
      photos: stringList(body, 'photos'),
      moisture_content: optionalNumber(body, 'moisture_content', { min: 0, max: 100 }),
      impurity_percentage: optionalNumber(body, 'impurity_percentage', { min: 0, max: 100 }),
      payment_reference: optionalString(body, 'payment_reference'),
    };
  },

  identify(request) {
    return { batchId: request.batch_id, farmerDid: request.farmer_did };
  },

  preHash(request, _identifiers, { encoding }) {
    return { batchHash: computePurchaseBatchHash(request, encoding) };
  },

  postHash: noHashes,

  toReceipt({ identifiers, hashes, contentAddress, createdAt }) {
    return {
      batchId: identifiers.batchId,
      batchHash: hashes.batchHash,
      ipfsCid: contentAddress,
      purchasedAt: createdAt,
    };
  },
};
