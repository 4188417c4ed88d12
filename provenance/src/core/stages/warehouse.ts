import type { PestInspection, WarehouseUpdateReceipt, WarehouseUpdateRequest } from '../../types';
import { encodeFields, formatOptionalReading, type HashEncoding } from '../encoding';
import { solidityHash, type Digest } from '../hasher';
import { noHashes, type NoHashes, type StageDefinition } from '../stage';
import {
  asRecord,
  optionalNumber,
  optionalString,
  requireBoolean,
  requireString,
  requireTimestamp,
  stringList,
  type RawRecord,
} from '../validation';

/** Needs the content address, so it can only run once the record is stored. */
export function computeWarehouseStateHash(
  request: WarehouseUpdateRequest,
  contentAddress: string,
  encoding: HashEncoding
): Digest {
  return solidityHash(
    encodeFields(
      [
        request.warehouse_id,
        request.batch_id,
        formatOptionalReading(request.temperature_celsius),
        formatOptionalReading(request.humidity_percentage),
        contentAddress,
      ],
      encoding
    )
  );
}

function validatePestInspection(body: RawRecord): PestInspection | undefined {
  if (body.pest_inspection === undefined || body.pest_inspection === null) {
    return undefined;
  }

  const inspection = asRecord(body.pest_inspection, 'pest_inspection');
  return {
    inspected_at: requireTimestamp(inspection, 'inspected_at', 'pest_inspection'),
    pest_found: requireBoolean(inspection, 'pest_found', 'pest_inspection'),
    pest_type: optionalString(inspection, 'pest_type', 'pest_inspection'),
    treatment_applied: optionalString(inspection, 'treatment_applied', 'pest_inspection'),
  };
}

export const warehouseUpdateStage: StageDefinition<
  WarehouseUpdateRequest,
  { warehouseId: string; batchId: string },
  NoHashes,
  { stateHash: Digest },
  WarehouseUpdateReceipt
> = {
  stage: 'warehouse_update',

  validate(input) {
    const body = asRecord(input, 'body');
    return {
      warehouse_id: requireString(body, 'warehouse_id'),
      batch_id: requireString(body, 'batch_id'),
      storage_location: requireString(body, 'storage_location'),
      temperature_celsius: optionalNumber(body, 'temperature_celsius'),
      humidity_percentage: optionalNumber(body, 'humidity_percentage', { min: 0, max: 100 }),
      co2_level_ppm: optionalNumber(body, 'co2_level_ppm', { min: 0 }),
      iot_logs_url: optionalString(body, 'iot_logs_url'),
      inspection_reports: stringList(body, 'inspection_reports'),
      pest_inspection: validatePestInspection(body),
      quality_degradation: optionalNumber(body, 'quality_degradation', { min: 0, max: 100 }),
    };
  },

  identify(request) {
    return { warehouseId: request.warehouse_id, batchId: request.batch_id };
  },

  preHash: noHashes,

  postHash(request, contentAddress, { encoding }) {
    return { stateHash: computeWarehouseStateHash(request, contentAddress, encoding) };
  },

  toReceipt({ identifiers, hashes, contentAddress, createdAt }) {
    return {
      warehouseId: identifiers.warehouseId,
      stateHash: hashes.stateHash,
      ipfsCid: contentAddress,
      updatedAt: createdAt,
    };
  },
};
