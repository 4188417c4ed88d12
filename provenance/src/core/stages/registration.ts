import type { FarmerRegistrationReceipt, FarmerRegistrationRequest } from '../../types';
import { encodeFields, formatAnchorTimestamp, type HashEncoding } from '../encoding';
import { solidityHash, type Digest } from '../hasher';
import { noHashes, type NoHashes, type StageDefinition } from '../stage';
import { asRecord, optionalGps, optionalString, requireNumber, requireString, stringList } from '../validation';

export function computeCropIdHash(
  farmerDid: string,
  cropType: string,
  registeredAt: Date,
  encoding: HashEncoding
): Digest {
  return solidityHash(encodeFields([farmerDid, cropType, formatAnchorTimestamp(registeredAt)], encoding));
}

export const farmerRegistrationStage: StageDefinition<
  FarmerRegistrationRequest,
  { farmerDid: string },
  { cropIdHash: Digest },
  NoHashes,
  FarmerRegistrationReceipt
> = {
  stage: 'farmer_registration',

  validate(input) {
    const body = asRecord(input, 'body');
    return {
      farmer_name: requireString(body, 'farmer_name'),
      crop_type: requireString(body, 'crop_type'),
      land_area_hectares: requireNumber(body, 'land_area_hectares', { min: 0 }),
      location: requireString(body, 'location'),
      gps_coordinates: optionalGps(body, 'gps_coordinates'),
      kyc_document_url: optionalString(body, 'kyc_document_url'),
      land_ownership_docs: stringList(body, 'land_ownership_docs'),
      satellite_imagery_url: optionalString(body, 'satellite_imagery_url'),
      soil_test_report: optionalString(body, 'soil_test_report'),
      phone_number: optionalString(body, 'phone_number'),
      email: optionalString(body, 'email'),
    };
  },

  identify(_request, context) {
    return { farmerDid: context.generateDid('farmer') };
  },

  preHash(request, { farmerDid }, { createdAt, encoding }) {
    return { cropIdHash: computeCropIdHash(farmerDid, request.crop_type, createdAt, encoding) };
  },

  postHash: noHashes,

  toReceipt({ identifiers, hashes, contentAddress, createdAt }) {
    return {
      farmerDid: identifiers.farmerDid,
      cropIdHash: hashes.cropIdHash,
      ipfsCid: contentAddress,
      registeredAt: createdAt,
    };
  },
};
