export const JOB_KINDS = ['profile-netcdf', 'profile-raster', 'profile-vector', 'normalize'] as const;
export type JobKind = typeof JOB_KINDS[number];

export type JobStatus = 'pending' | 'running' | 'success' | 'failed';
export type ResponseMode = 'prompt' | 'deferred';

// Allowed forward moves; terminal states have none.
export const JOB_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running', 'failed'],
  running: ['success', 'failed'],
  success: [],
  failed: [],
};

export function isTerminal(status: JobStatus): boolean {
  return JOB_TRANSITIONS[status].length === 0;
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return JOB_TRANSITIONS[from].includes(to);
}

export interface ProfileParams {
  basemap_provider: string;
  basemap_name: string;
  aspect_ratio?: number;
  width?: number;
  height?: number;
  crs?: string;
}

export interface NetcdfProfileParams extends ProfileParams {
  lat?: string;
  lon?: string;
  time?: string;
}

export type RasterProfileParams = ProfileParams;

export interface VectorProfileParams extends ProfileParams {
  lat?: string;
  lon?: string;
  geometry?: string;
  encoding?: string;
}

export interface NormalizeParams {
  resource_type: 'csv' | 'shp';
  csv_delimiter?: string;
  crs?: string;
  date_normalization: string[];
  phone_normalization: string[];
  special_character_normalization: string[];
  alphabetical_normalization: string[];
  case_normalization: string[];
  transliteration: string[];
  transliteration_langs: string[];
  transliteration_lang?: string;
  value_cleaning: string[];
  wkt_normalization: boolean;
  column_name_normalization: boolean;
}

export type JobRequest =
  | { kind: 'profile-netcdf'; params: NetcdfProfileParams }
  | { kind: 'profile-raster'; params: RasterProfileParams }
  | { kind: 'profile-vector'; params: VectorProfileParams }
  | { kind: 'normalize'; params: NormalizeParams };

export type ProcessingFailureReason = 'bad_input' | 'unsupported_format' | 'engine_error';
export type InternalFaultReason = 'unexpected' | 'timeout' | 'interrupted' | 'worker_lost' | 'no_engine';

export type JobError =
  | { category: 'processing_failed'; reason: ProcessingFailureReason; message: string }
  | { category: 'internal_fault'; reason: InternalFaultReason; message: string };

export interface JobRecord {
  ticket: string; // ULID
  mode: ResponseMode;
  owner: string | null;
  status: JobStatus;
  inputRef: string;
  inputName: string;
  inputSize: number;
  outputRef: string | null;
  error: JobError | null;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  lastHeartbeatAt: Date | null;
  updatedAt: Date;
}

export type Job = JobRecord & JobRequest;

export interface CreateJobData {
  ticket: string;
  request: JobRequest;
  mode: ResponseMode;
  owner: string | null;
  inputRef: string;
  inputName: string;
  inputSize: number;
}

export interface JobQuery {
  owner?: string | null;
  kind?: JobKind;
  status?: JobStatus;
  cursor?: string;
  limit?: number;
}

// Fields a status transition may write. kind, params and inputRef are fixed at creation.
export interface JobUpdate {
  status: JobStatus;
  outputRef?: string | null;
  error?: JobError | null;
  startedAt?: Date | null;
  completedAt?: Date | null;
  lastHeartbeatAt?: Date | null;
}

export interface OwnerBudget {
  [ownerKey: string]: number; // remaining concurrency slots, '*' for owners not yet running
}

export const ANONYMOUS_OWNER_KEY = '~anonymous';

export function ownerKey(owner: string | null): string {
  return owner ?? ANONYMOUS_OWNER_KEY;
}
