// API Response Types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  errors?: ValidationError[];
}

export interface ValidationError {
  field: string;
  message: string;
}

// ============================================
// Load dataset
// ============================================

// One freight shipment row from the dataset
export interface Load {
  load_id: number;
  origin: string;
  destination: string;
  equipment_type: string;
  rate: number;
  commodity: string;
  pickup_date?: string;
  delivery_date?: string;
  weight?: number;
  notes?: string;
}

export const REQUIRED_LOAD_COLUMNS = [
  'load_id',
  'origin',
  'destination',
  'equipment_type',
  'rate',
  'commodity',
] as const;

export const OPTIONAL_LOAD_COLUMNS = [
  'pickup_date',
  'delivery_date',
  'weight',
  'notes',
] as const;

// ============================================
// Carrier validation
// ============================================

export interface CarrierSummary {
  legal_name: string | null;
  dba_name: string | null;
  dot_number: string | null;
  safety_rating: string | null;
  safety_rating_date: string | null;
  status_code: string | null;
  state: string | null;
}

export interface CarrierValidationResult {
  mc_number: string;
  is_valid: boolean;
  detail: string;
  carrier?: CarrierSummary;
}

// FMCSA carrier record as returned by QCMobile (fields we read)
export interface FMCSACarrierRaw {
  dotNumber?: string | null;
  legalName?: string | null;
  dbaName?: string | null;
  allowedToOperate?: string | null;
  safetyRating?: string | null;
  safetyRatingDate?: string | null;
  statusCode?: string | null;
  phyState?: string | null;
}

export type RegistryFailureReason =
  | 'timeout'
  | 'network'
  | 'http_status'
  | 'malformed'
  | 'not_configured';

// Outcome of one registry call; failures are data, not exceptions
export type RegistryOutcome =
  | { kind: 'authorized'; carrier: FMCSACarrierRaw }
  | { kind: 'unauthorized'; carrier: FMCSACarrierRaw }
  | { kind: 'not_found' }
  | { kind: 'failed'; reason: RegistryFailureReason; message: string };
