import { MILESTONE_TYPES, type LogisticsMilestoneReceipt, type LogisticsMilestoneRequest, type ShockEvent } from '../../types';
import { encodeFields, formatDecimal, type HashEncoding } from '../encoding';
import { solidityHash, type Digest } from '../hasher';
import { noHashes, type NoHashes, type StageDefinition } from '../stage';
import {
  asRecord,
  optionalBoolean,
  optionalGps,
  optionalString,
  optionalTimestamp,
  requireEnum,
  requireGps,
  requireNumber,
  requireString,
  requireTimestamp,
  type RawRecord,
} from '../validation';
import { ValidationError } from '../../utils/errors';

export function computeLocationHash(request: LogisticsMilestoneRequest, encoding: HashEncoding): Digest {
  return solidityHash(
    encodeFields(
      [
        request.shipment_id,
        request.current_location,
        formatDecimal(request.gps_coordinates.latitude),
        formatDecimal(request.gps_coordinates.longitude),
      ],
      encoding
    )
  );
}

function validateShockEvents(body: RawRecord): ShockEvent[] {
  const raw = body.shock_events;
  if (raw === undefined || raw === null) {
    return [];
  }

  if (!Array.isArray(raw)) {
    throw new ValidationError('shock_events must be an array', { field: 'shock_events' });
  }

  return raw.map((entry, index) => {
    const path = `shock_events[${index}]`;
    const event = asRecord(entry, path);
    return {
      timestamp: requireTimestamp(event, 'timestamp', path),
      g_force: requireNumber(event, 'g_force', { min: 0 }, path),
      location: optionalGps(event, 'location', path),
    };
  });
}

export const logisticsMilestoneStage: StageDefinition<
  LogisticsMilestoneRequest,
  { shipmentId: string },
  { locationHash: Digest },
  NoHashes,
  LogisticsMilestoneReceipt
> = {
  stage: 'logistics_milestone',

  validate(input) {
    const body = asRecord(input, 'body');
    return {
      shipment_id: requireString(body, 'shipment_id'),
      current_location: requireString(body, 'current_location'),
      gps_coordinates: requireGps(body, 'gps_coordinates'),
      milestone_type: requireEnum(body, 'milestone_type', MILESTONE_TYPES),
      gps_history_url: optionalString(body, 'gps_history_url'),
      carrier_name: requireString(body, 'carrier_name'),
      vehicle_id: requireString(body, 'vehicle_id'),
      driver_name: optionalString(body, 'driver_name'),
      temperature_log: optionalString(body, 'temperature_log'),
      shock_events: validateShockEvents(body),
      estimated_arrival: optionalTimestamp(body, 'estimated_arrival'),
      is_delivered: optionalBoolean(body, 'is_delivered', false),
    };
  },

  identify(request) {
    return { shipmentId: request.shipment_id };
  },

  preHash(request, _identifiers, { encoding }) {
    return { locationHash: computeLocationHash(request, encoding) };
  },

  postHash: noHashes,

  toReceipt({ identifiers, hashes, contentAddress, createdAt }) {
    return {
      shipmentId: identifiers.shipmentId,
      locationHash: hashes.locationHash,
      ipfsCid: contentAddress,
      recordedAt: createdAt,
    };
  },
};
