import { PROCESSING_TYPES, type ProcessBatchReceipt, type ProcessBatchRequest, type ProcessingParameters } from '../../types';
import { encodeFields, formatDecimal, formatVariantName, type HashEncoding } from '../encoding';
import { solidityHash, type Digest } from '../hasher';
import { noHashes, type NoHashes, type StageDefinition } from '../stage';
import {
  asRecord,
  optionalNumber,
  requireEnum,
  requireNumber,
  requireString,
  stringList,
  type RawRecord,
} from '../validation';

export type ProcessingHashes = {
  inputBatchHash: Digest;
  outputBatchHashes: Digest[];
  transformHash: Digest;
};

/** Three independent families: the consumed batch, each produced batch, and the transformation itself. */
export function computeProcessingHashes(request: ProcessBatchRequest, encoding: HashEncoding): ProcessingHashes {
  const inputBatchHash = solidityHash(
    encodeFields(
      [request.input_batch_id, request.processor_name, formatDecimal(request.input_quantity_kg)],
      encoding
    )
  );

  const outputBatchHashes = request.output_batch_ids.map((outputBatchId) =>
    solidityHash(encodeFields([outputBatchId, formatDecimal(request.output_quantity_kg)], encoding))
  );

  const transformHash = solidityHash(
    encodeFields(
      [
        formatVariantName(request.processing_type),
        formatDecimal(request.yield_percentage),
        formatDecimal(request.waste_percentage),
      ],
      encoding
    )
  );

  return { inputBatchHash, outputBatchHashes, transformHash };
}

function validateParameters(body: RawRecord): ProcessingParameters | undefined {
  if (body.processing_parameters === undefined || body.processing_parameters === null) {
    return undefined;
  }

  const prefix = 'processing_parameters';
  const parameters = asRecord(body.processing_parameters, prefix);
  return {
    temperature_celsius: optionalNumber(parameters, 'temperature_celsius', {}, prefix),
    pressure_bar: optionalNumber(parameters, 'pressure_bar', { min: 0 }, prefix),
    duration_minutes: optionalNumber(parameters, 'duration_minutes', { min: 0, integer: true }, prefix),
    method: requireString(parameters, 'method', prefix),
  };
}

export const processBatchStage: StageDefinition<
  ProcessBatchRequest,
  { inputBatchId: string },
  ProcessingHashes,
  NoHashes,
  ProcessBatchReceipt
> = {
  stage: 'process_batch',

  validate(input) {
    const body = asRecord(input, 'body');
    return {
      input_batch_id: requireString(body, 'input_batch_id'),
      processor_name: requireString(body, 'processor_name'),
      processing_type: requireEnum(body, 'processing_type', PROCESSING_TYPES),
      input_quantity_kg: requireNumber(body, 'input_quantity_kg', { min: 0, exclusiveMin: true }),
      output_quantity_kg: requireNumber(body, 'output_quantity_kg', { min: 0 }),
      yield_percentage: requireNumber(body, 'yield_percentage', { min: 0, max: 100 }),
      waste_percentage: requireNumber(body, 'waste_percentage', { min: 0, max: 100 }),
      lab_results_url: stringList(body, 'lab_results_url'),
      certifications: stringList(body, 'certifications'),
      output_batch_ids: stringList(body, 'output_batch_ids', { required: true, nonEmpty: true }),
      processing_parameters: validateParameters(body),
    };
  },

  identify(request) {
    return { inputBatchId: request.input_batch_id };
  },

  preHash(request, _identifiers, { encoding }) {
    return computeProcessingHashes(request, encoding);
  },

  postHash: noHashes,

  toReceipt({ hashes, contentAddress, createdAt }) {
    return {
      inputBatchHash: hashes.inputBatchHash,
      transformHash: hashes.transformHash,
      outputBatchHashes: [...hashes.outputBatchHashes],
      ipfsCid: contentAddress,
      processedAt: createdAt,
    };
  },
};
