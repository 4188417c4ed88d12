import type { CreateSkuReceipt, CreateSkuRequest } from '../../types';
import { encodeFields, type HashEncoding } from '../encoding';
import { solidityHash, type Digest } from '../hasher';
import { computeMerkleRoot } from '../merkle';
import { noHashes, type NoHashes, type StageDefinition } from '../stage';
import {
  asRecord,
  optionalString,
  optionalTimestamp,
  requireNumber,
  requireString,
  stringList,
} from '../validation';

export function computeParentBatchHash(request: CreateSkuRequest, encoding: HashEncoding): Digest {
  return solidityHash(encodeFields([request.parent_batch_id, request.product_name], encoding));
}

/** Root over the supplied proof leaves, or over the SKU id alone (which is then returned as is). */
export function computeSkuMerkleRoot(request: CreateSkuRequest): string {
  return computeMerkleRoot(request.merkle_proof ?? [request.sku_id]);
}

export const createSkuStage: StageDefinition<
  CreateSkuRequest,
  { skuId: string; parentBatchId: string },
  { parentBatchHash: Digest; merkleRoot: string },
  NoHashes,
  CreateSkuReceipt
> = {
  stage: 'create_sku',

  validate(input) {
    const body = asRecord(input, 'body');
    const hasProof = body.merkle_proof !== undefined && body.merkle_proof !== null;

    return {
      sku_id: requireString(body, 'sku_id'),
      parent_batch_id: requireString(body, 'parent_batch_id'),
      product_name: requireString(body, 'product_name'),
      brand: requireString(body, 'brand'),
      unit_weight_grams: requireNumber(body, 'unit_weight_grams', { min: 0, exclusiveMin: true }),
      units_packaged: requireNumber(body, 'units_packaged', { min: 0, integer: true }),
      package_type: requireString(body, 'package_type'),
      barcode: optionalString(body, 'barcode'),
      qr_code: optionalString(body, 'qr_code'),
      nutritional_info_url: optionalString(body, 'nutritional_info_url'),
      regulatory_certifications: stringList(body, 'regulatory_certifications'),
      label_images: stringList(body, 'label_images'),
      expiry_date: optionalTimestamp(body, 'expiry_date'),
      best_before_date: optionalTimestamp(body, 'best_before_date'),
      merkle_proof: hasProof ? stringList(body, 'merkle_proof') : undefined,
    };
  },

  identify(request) {
    return { skuId: request.sku_id, parentBatchId: request.parent_batch_id };
  },

  preHash(request, _identifiers, { encoding }) {
    return {
      parentBatchHash: computeParentBatchHash(request, encoding),
      merkleRoot: computeSkuMerkleRoot(request),
    };
  },

  postHash: noHashes,

  toReceipt({ identifiers, hashes, contentAddress, createdAt }) {
    return {
      skuId: identifiers.skuId,
      parentBatchHash: hashes.parentBatchHash,
      merkleRoot: hashes.merkleRoot,
      ipfsCid: contentAddress,
      packagedAt: createdAt,
    };
  },
};
