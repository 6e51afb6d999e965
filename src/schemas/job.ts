import { z } from 'zod';
import { JOB_KINDS } from '../types/job.js';
import type {
  JobKind,
  JobRequest,
  NetcdfProfileParams,
  NormalizeParams,
  RasterProfileParams,
  VectorProfileParams,
} from '../types/job.js';

export const BASEMAP_PROVIDERS = [
  'OpenStreetMap',
  'OpenTopoMap',
  'CartoDB',
  'Esri',
  'Stamen',
  'Stadia',
  'CyclOSM',
  'OpenSeaMap',
  'NASAGIBS',
  'USGS',
] as const;

// Letters, digits and underscores, with inner spaces, dots and dashes.
const COLUMN_NAME = /^[\p{L}\p{N}_](?:[\p{L}\p{N}_ .-]*[\p{L}\p{N}_])?$/u;
const CRS = /^[A-Za-z][A-Za-z0-9_.-]*:\d+$/;
const LANGUAGE = /^[a-z]{2,3}(?:-[A-Za-z0-9]{2,8})?$/;

const blankToUndefined = (val: unknown) =>
  typeof val === 'string' && val.trim() === '' ? undefined : val;

function toList(val: unknown): unknown {
  if (val === undefined || val === null) return [];
  if (typeof val === 'string') {
    return val.split(',').map(item => item.trim()).filter(item => item.length > 0);
  }
  return val;
}

function toFlag(defaultValue: boolean) {
  return (val: unknown): unknown => {
    if (val === undefined || val === null || val === '') return defaultValue;
    if (typeof val === 'string') {
      const normalized = val.trim().toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
      if (['false', '0', 'no', 'off'].includes(normalized)) return false;
    }
    return val;
  };
}

export const ColumnNameSchema = z.string().trim().max(128).regex(COLUMN_NAME, 'Malformed column name');

const optionalColumn = z.preprocess(blankToUndefined, ColumnNameSchema.optional());
const columnList = z.preprocess(toList, z.array(ColumnNameSchema).max(256));
const flag = (defaultValue: boolean) => z.preprocess(toFlag(defaultValue), z.boolean());
const optionalCrs = z.preprocess(blankToUndefined, z.string().trim().regex(CRS, 'Expected AUTHORITY:CODE, e.g. EPSG:4326').optional());

const ProfileBaseSchema = z.object({
  basemap_provider: z.preprocess(blankToUndefined, z.enum(BASEMAP_PROVIDERS).default('OpenStreetMap')),
  basemap_name: z.preprocess(
    blankToUndefined,
    z.string().trim().max(64).regex(/^[A-Za-z0-9_.-]+$/, 'Malformed basemap name').default('Mapnik')
  ),
  aspect_ratio: z.preprocess(blankToUndefined, z.coerce.number().positive().max(100).optional()),
  width: z.preprocess(blankToUndefined, z.coerce.number().int().positive().max(20000).optional()),
  height: z.preprocess(blankToUndefined, z.coerce.number().int().positive().max(20000).optional()),
  crs: optionalCrs,
});

export const NetcdfProfileParamsSchema = ProfileBaseSchema.extend({
  lat: optionalColumn,
  lon: optionalColumn,
  time: optionalColumn,
});

export const RasterProfileParamsSchema = ProfileBaseSchema;

export const VectorProfileParamsSchema = ProfileBaseSchema.extend({
  lat: optionalColumn,
  lon: optionalColumn,
  geometry: optionalColumn,
  encoding: z.preprocess(blankToUndefined, z.string().trim().regex(/^[A-Za-z0-9_.:-]{1,32}$/, 'Malformed encoding').optional()),
});

export const NormalizeParamsSchema = z.object({
  resource_type: z.enum(['csv', 'shp']),
  csv_delimiter: z.preprocess(
    (val) => (val === '' ? undefined : val),
    z.string().length(1, 'Delimiter must be a single character').optional()
  ),
  crs: optionalCrs,
  date_normalization: columnList,
  phone_normalization: columnList,
  special_character_normalization: columnList,
  alphabetical_normalization: columnList,
  case_normalization: columnList,
  transliteration: columnList,
  transliteration_langs: z.preprocess(toList, z.array(z.string().regex(LANGUAGE, 'Malformed language code')).max(16)),
  transliteration_lang: z.preprocess(blankToUndefined, z.string().trim().regex(LANGUAGE, 'Malformed language code').optional()),
  value_cleaning: columnList,
  wkt_normalization: flag(false),
  column_name_normalization: flag(false),
}).superRefine((params, ctx) => {
  if (params.transliteration.length > 0 && params.transliteration_langs.length === 0 && !params.transliteration_lang) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['transliteration_langs'],
      message: 'Transliteration requires transliteration_langs or transliteration_lang',
    });
  }
});

export const JobRequestSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('profile-netcdf'), params: NetcdfProfileParamsSchema }),
  z.object({ kind: z.literal('profile-raster'), params: RasterProfileParamsSchema }),
  z.object({ kind: z.literal('profile-vector'), params: VectorProfileParamsSchema }),
  z.object({ kind: z.literal('normalize'), params: NormalizeParamsSchema }),
]);

// Params were validated when the job was submitted; only their shape is checked on the way back.
function storedParams<T>() {
  return z.custom<T>(
    (value) => typeof value === 'object' && value !== null && !Array.isArray(value),
    'Stored params must be an object'
  );
}

export const StoredJobRequestSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('profile-netcdf'), params: storedParams<NetcdfProfileParams>() }),
  z.object({ kind: z.literal('profile-raster'), params: storedParams<RasterProfileParams>() }),
  z.object({ kind: z.literal('profile-vector'), params: storedParams<VectorProfileParams>() }),
  z.object({ kind: z.literal('normalize'), params: storedParams<NormalizeParams>() }),
]);

export const JobKindSchema = z.enum(JOB_KINDS);

export const SubmissionOptionsSchema = z.object({
  response: z.preprocess(blankToUndefined, z.enum(['prompt', 'deferred']).default('prompt')),
  inline: flag(true),
});

export const ResourcePathSchema = z.string().trim().min(1).max(4096).refine(
  (value) => !value.includes('\0'),
  'Path contains a NUL character'
);

export const JobStatusSchema = z.enum(['pending', 'running', 'success', 'failed']);
export const ResponseModeSchema = z.enum(['prompt', 'deferred']);

export const JobErrorSchema = z.discriminatedUnion('category', [
  z.object({
    category: z.literal('processing_failed'),
    reason: z.enum(['bad_input', 'unsupported_format', 'engine_error']),
    message: z.string(),
  }),
  z.object({
    category: z.literal('internal_fault'),
    reason: z.enum(['unexpected', 'timeout', 'interrupted', 'worker_lost', 'no_engine']),
    message: z.string(),
  }),
]);

export const JobListQuerySchema = z.object({
  status: JobStatusSchema.optional(),
  kind: JobKindSchema.optional(),
  cursor: z.string().optional(),
  limit: z.preprocess(
    (val) => val === undefined ? 50 : Number(val),
    z.number().int().min(1).max(100)
  ),
});

export const TicketParamsSchema = z.object({
  ticket: z.string().min(1),
});

/**
 * Validates raw submission fields for a job kind. Unknown fields are dropped;
 * the result is what gets persisted.
 */
export function parseJobRequest(kind: JobKind, params: unknown): JobRequest {
  return JobRequestSchema.parse({ kind, params });
}

export type SubmissionOptions = z.infer<typeof SubmissionOptionsSchema>;
export type JobListQuery = z.infer<typeof JobListQuerySchema>;
