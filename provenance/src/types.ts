import type { Digest } from './core/hasher';

export const STAGE_TYPES = [
  'farmer_registration',
  'fpo_purchase',
  'warehouse_update',
  'logistics_milestone',
  'process_batch',
  'create_sku',
  'ai_score',
] as const;
export type StageType = (typeof STAGE_TYPES)[number];

export function isStageType(value: string): value is StageType {
  return STAGE_TYPES.some((stage) => stage === value);
}

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export interface GpsCoordinates {
  latitude: number;
  longitude: number;
  altitude?: number;
}

// ---- farmer registration ----

export interface FarmerRegistrationRequest {
  farmer_name: string;
  crop_type: string;
  land_area_hectares: number;
  location: string;
  gps_coordinates?: GpsCoordinates;
  kyc_document_url?: string;
  land_ownership_docs: string[];
  satellite_imagery_url?: string;
  soil_test_report?: string;
  phone_number?: string;
  email?: string;
}

export interface FarmerRegistrationReceipt {
  farmerDid: string;
  cropIdHash: Digest;
  ipfsCid: string;
  registeredAt: string;
}

// ---- FPO purchase ----

export interface FpoPurchaseRequest {
  farmer_did: string;
  fpo_name: string;
  batch_id: string;
  quantity_kg: number;
  price_per_kg: number;
  quality_grade: string;
  quality_report_url?: string;
  weight_slip_url?: string;
  photos: string[];
  moisture_content?: number;
  impurity_percentage?: number;
  payment_reference?: string;
}

export interface FpoPurchaseReceipt {
  batchId: string;
  batchHash: Digest;
  ipfsCid: string;
  purchasedAt: string;
}

// ---- warehouse ----

export interface PestInspection {
  inspected_at: string;
  pest_found: boolean;
  pest_type?: string;
  treatment_applied?: string;
}

export interface WarehouseUpdateRequest {
  warehouse_id: string;
  batch_id: string;
  storage_location: string;
  temperature_celsius?: number;
  humidity_percentage?: number;
  co2_level_ppm?: number;
  iot_logs_url?: string;
  inspection_reports: string[];
  pest_inspection?: PestInspection;
  quality_degradation?: number;
}

export interface WarehouseUpdateReceipt {
  warehouseId: string;
  stateHash: Digest;
  ipfsCid: string;
  updatedAt: string;
}

// ---- logistics ----

export const MILESTONE_TYPES = ['picked_up', 'in_transit', 'at_checkpoint', 'delivered', 'delayed', 'incident'] as const;
export type MilestoneType = (typeof MILESTONE_TYPES)[number];

export interface ShockEvent {
  timestamp: string;
  g_force: number;
  location?: GpsCoordinates;
}

export interface LogisticsMilestoneRequest {
  shipment_id: string;
  current_location: string;
  gps_coordinates: GpsCoordinates;
  milestone_type: MilestoneType;
  gps_history_url?: string;
  carrier_name: string;
  vehicle_id: string;
  driver_name?: string;
  temperature_log?: string;
  shock_events: ShockEvent[];
  estimated_arrival?: string;
  is_delivered: boolean;
}

export interface LogisticsMilestoneReceipt {
  shipmentId: string;
  locationHash: Digest;
  ipfsCid: string;
  recordedAt: string;
}

// ---- processing ----

export const PROCESSING_TYPES = ['cleaning', 'drying', 'milling', 'extraction', 'refining', 'blending'] as const;
export type ProcessingType = (typeof PROCESSING_TYPES)[number];

export interface ProcessingParameters {
  temperature_celsius?: number;
  pressure_bar?: number;
  duration_minutes?: number;
  method: string;
}

export interface ProcessBatchRequest {
  input_batch_id: string;
  processor_name: string;
  processing_type: ProcessingType;
  input_quantity_kg: number;
  output_quantity_kg: number;
  yield_percentage: number;
  waste_percentage: number;
  lab_results_url: string[];
  certifications: string[];
  output_batch_ids: string[];
  processing_parameters?: ProcessingParameters;
}

export interface ProcessBatchReceipt {
  inputBatchHash: Digest;
  transformHash: Digest;
  outputBatchHashes: Digest[];
  ipfsCid: string;
  processedAt: string;
}

// ---- packaging ----

export interface CreateSkuRequest {
  sku_id: string;
  parent_batch_id: string;
  product_name: string;
  brand: string;
  unit_weight_grams: number;
  units_packaged: number;
  package_type: string;
  barcode?: string;
  qr_code?: string;
  nutritional_info_url?: string;
  regulatory_certifications: string[];
  label_images: string[];
  expiry_date?: string;
  best_before_date?: string;
  merkle_proof?: string[];
}

export interface CreateSkuReceipt {
  skuId: string;
  parentBatchHash: Digest;
  merkleRoot: string;
  ipfsCid: string;
  packagedAt: string;
}

// ---- AI scoring ----

export interface AiScoreRequest {
  batch_id: string;
  quality_score: number;
  sustainability_score: number;
  traceability_score: number;
  model_name: string;
  model_version: string;
  features: JsonValue;
  predictions: JsonValue;
  confidence: number;
  model_artifacts_url?: string;
  training_data_hash?: string;
}

export interface AiScoreReceipt {
  batchHash: Digest;
  commitHash: Digest;
  revealHash: Digest;
  nonce: string;
  ipfsCid: string;
  scoredAt: string;
}

export interface CommitmentVerification {
  contentAddress: string;
  valid: boolean;
  revealHash: string;
  commitHash: string;
}

// ---- raw storage passthrough ----

export interface IpfsUploadRequest {
  data: JsonValue;
  pin?: boolean;
}

export interface IpfsUploadResponse {
  cid: string;
  size: number;
  pinned: boolean;
}

export interface IpfsGetResponse {
  cid: string;
  data: JsonValue;
}

export interface IpfsPinResponse {
  cid: string;
  pinned: boolean;
}

// ---- HTTP envelopes ----

export interface SuccessResponse<T> {
  success: true;
  data: T;
  timestamp: string;
}

export interface ErrorResponse {
  success: false;
  error: string;
  message: string;
  contentAddress?: string;
  timestamp: string;
}
