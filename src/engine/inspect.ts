import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { open, readdir, stat, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { createInterface } from 'node:readline';
import type { JobKind, JobRequest } from '../types/job.js';
import type { EngineOutput, EngineTask, ProcessingEngine } from './base.js';
import { EngineFailure } from './base.js';

type ProfileKind = Exclude<JobKind, 'normalize'>;

const FORMATS: Record<ProfileKind, Record<string, string>> = {
  'profile-netcdf': { '.nc': 'netcdf', '.nc4': 'netcdf', '.cdf': 'netcdf', '.netcdf': 'netcdf', '.zarr': 'zarr' },
  'profile-raster': {
    '.tif': 'geotiff', '.tiff': 'geotiff', '.geotiff': 'geotiff', '.img': 'erdas-imagine', '.vrt': 'vrt',
    '.jp2': 'jpeg2000', '.asc': 'ascii-grid', '.png': 'png', '.jpg': 'jpeg', '.jpeg': 'jpeg',
  },
  'profile-vector': {
    '.csv': 'csv', '.shp': 'shapefile', '.geojson': 'geojson', '.json': 'geojson', '.gpkg': 'geopackage',
    '.kml': 'kml', '.gml': 'gml',
  },
};

// Leading bytes each binary format must start with.
const SIGNATURES: Record<string, Buffer[]> = {
  netcdf: [Buffer.from('CDF\x01', 'latin1'), Buffer.from('CDF\x02', 'latin1'), Buffer.from('\x89HDF\r\n\x1a\n', 'latin1')],
  geotiff: [Buffer.from('II*\x00', 'latin1'), Buffer.from('MM\x00*', 'latin1'), Buffer.from('II+\x00', 'latin1')],
  png: [Buffer.from('\x89PNG', 'latin1')],
  shapefile: [Buffer.from([0x00, 0x00, 0x27, 0x0a])],
};

const DELIMITERS = [',', ';', '\t', '|'];

export interface InspectionReport {
  kind: ProfileKind;
  file: {
    name: string;
    format: string;
    size: number;
    sha256?: string;
    entries?: number;
  };
  table?: {
    delimiter: string;
    columns: string[];
    rows: number;
  };
  params: JobRequest['params'];
  generatedAt: string;
}

function isProfileKind(kind: JobKind): kind is ProfileKind {
  return kind !== 'normalize';
}

export function detectDelimiter(header: string): string {
  let best = ',';
  let bestCount = 0;
  for (const candidate of DELIMITERS) {
    const count = header.split(candidate).length - 1;
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

export function splitHeader(header: string, delimiter: string): string[] {
  return header
    .replace(/^\uFEFF/, '')
    .split(delimiter)
    .map(cell => cell.trim().replace(/^"(.*)"$/, '$1').trim());
}

/**
 * File-level profiler that needs no analysis libraries: identifies the format,
 * checks it against the requested kind, fingerprints the content and, for
 * delimited text, verifies the columns named in the request exist.
 */
export class InspectEngine implements ProcessingEngine {
  readonly name = 'inspect';

  async process(task: EngineTask): Promise<EngineOutput> {
    const { request, inputPath, workDir, signal } = task;
    const kind = request.kind;
    if (!isProfileKind(kind)) {
      throw new EngineFailure('unsupported_format', `The inspect engine cannot run ${kind} jobs`);
    }

    const name = basename(inputPath);
    const extension = extname(name).toLowerCase();
    const format = FORMATS[kind][extension];
    if (!format) {
      throw new EngineFailure('unsupported_format', `Files with extension '${extension || name}' cannot be profiled as ${kind}`);
    }

    const info = await stat(inputPath);
    const report: InspectionReport = {
      kind,
      file: { name, format, size: info.size },
      params: request.params,
      generatedAt: new Date().toISOString(),
    };

    if (info.isDirectory()) {
      const entries = await readdir(inputPath, { recursive: true });
      report.file.entries = entries.length;
    } else {
      await this.checkSignature(inputPath, format);
      signal.throwIfAborted();
      report.file.sha256 = await fingerprint(inputPath, signal);
      await task.heartbeat();

      if (format === 'csv') {
        report.table = await this.inspectTable(inputPath, request, signal);
      }
    }

    signal.throwIfAborted();
    const artifactPath = join(workDir, 'result.json');
    await writeFile(artifactPath, JSON.stringify(report, null, 2));
    return { artifactPath };
  }

  private async checkSignature(path: string, format: string): Promise<void> {
    const expected = SIGNATURES[format];
    if (!expected) return;

    const handle = await open(path, 'r');
    try {
      const head = Buffer.alloc(8);
      const { bytesRead } = await handle.read(head, 0, head.length, 0);
      const actual = head.subarray(0, bytesRead);
      if (!expected.some(signature => actual.subarray(0, signature.length).equals(signature))) {
        throw new EngineFailure('bad_input', `File content is not valid ${format}`);
      }
    } finally {
      await handle.close();
    }
  }

  private async inspectTable(path: string, request: JobRequest, signal: AbortSignal): Promise<NonNullable<InspectionReport['table']>> {
    const lines = createInterface({ input: createReadStream(path, { encoding: 'utf8', signal }), crlfDelay: Infinity });

    let header: string | undefined;
    let rows = 0;
    for await (const line of lines) {
      if (header === undefined) {
        header = line;
      } else if (line.trim().length > 0) {
        rows++;
      }
    }

    if (header === undefined || header.trim().length === 0) {
      throw new EngineFailure('bad_input', 'Delimited file has no header row');
    }

    const delimiter = detectDelimiter(header);
    const columns = splitHeader(header, delimiter);

    const missing = requestedColumns(request).filter(column => !columns.includes(column));
    if (missing.length > 0) {
      throw new EngineFailure('bad_input', `Columns not found in file: ${missing.join(', ')}`);
    }

    return { delimiter, columns, rows };
  }
}

function requestedColumns(request: JobRequest): string[] {
  if (request.kind !== 'profile-vector') return [];
  const { lat, lon, geometry } = request.params;
  return [lat, lon, geometry].filter((column): column is string => column !== undefined);
}

async function fingerprint(path: string, signal: AbortSignal): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(path, { signal })) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}
