import { randomBytes } from 'node:crypto';
import { constants } from 'node:fs';
import { access, copyFile, lstat, mkdir, open, readdir, realpath, rename, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import extractZip from 'extract-zip';
import { extract as extractTar } from 'tar';
import { decodeTime } from 'ulid';
import { InvalidRequestError } from '../errors.js';
import { msg } from '../lib/error-messages.js';

export interface ArtifactStoreOptions {
  inputDir: string;
  outputDir: string;
  tempDir: string;
}

export interface MaterializedInput {
  path: string;
  name: string;
  size: number;
}

export interface StoredArtifact {
  path: string;
  fileName: string;
  size: number;
  mediaType: string;
}

const MEDIA_TYPES: Record<string, string> = {
  '.json': 'application/json',
  '.geojson': 'application/geo+json',
  '.csv': 'text/csv',
  '.txt': 'text/plain',
  '.html': 'text/html',
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
  '.zip': 'application/zip',
};

// Companion files a shapefile needs next to its .shp.
const SHAPEFILE_EXTENSIONS = new Set(['.shp', '.shx', '.dbf', '.prj', '.cpg', '.sbn', '.sbx', '.qix', '.xml']);

// Zip containers that engines read directly.
const ZIP_DOCUMENT_EXTENSIONS = new Set(['.xlsx', '.ods', '.docx', '.kmz']);

type ArchiveFormat = 'zip' | 'tar';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

function isInside(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

function outsideRoot(requested: string): InvalidRequestError {
  return new InvalidRequestError(msg('RESOURCE_OUTSIDE_ROOT'), { fields: { resource: requested } });
}

function escapesDir(entryPath: string): boolean {
  return isAbsolute(entryPath) || entryPath.split(/[\\/]+/).includes('..');
}

/** Recognises zip and tar archives (plain or gzipped) by their leading bytes. */
export function detectArchive(name: string, header: Buffer): ArchiveFormat | null {
  const lower = name.toLowerCase();
  if (header.length >= 4 && header[0] === 0x50 && header[1] === 0x4b
    && ((header[2] === 0x03 && header[3] === 0x04) || (header[2] === 0x05 && header[3] === 0x06))) {
    return ZIP_DOCUMENT_EXTENSIONS.has(extname(lower)) ? null : 'zip';
  }
  if (header.length >= 262 && header.toString('latin1', 257, 262) === 'ustar') return 'tar';
  if (header.length >= 2 && header[0] === 0x1f && header[1] === 0x8b && /\.(tar\.gz|tgz)$/.test(lower)) return 'tar';
  return null;
}

export function mediaTypeFor(fileName: string): string {
  return MEDIA_TYPES[extname(fileName).toLowerCase()] ?? 'application/octet-stream';
}

/** Reduces an uploaded file name to a safe single path segment. */
export function sanitizeFileName(name: string): string {
  const base = basename(name.replace(/\\/g, '/'));
  const cleaned = base.replace(/[^\p{L}\p{N}._-]+/gu, '_').replace(/^\.+/, '');
  return cleaned.length > 0 ? cleaned.slice(0, 255) : 'upload';
}

/** UTC `yyMMdd` of the moment a ticket was issued. */
export function ticketDatePrefix(ticket: string): string {
  const issued = new Date(decodeTime(ticket));
  const yy = String(issued.getUTCFullYear() % 100).padStart(2, '0');
  const mm = String(issued.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(issued.getUTCDate()).padStart(2, '0');
  return `${yy}${mm}${dd}`;
}

/**
 * Filesystem area addressed by ticket. Artifacts live under
 * `<outputDir>/<yyMMdd>/<ticket>/`, scratch space under `<tempDir>/<ticket>/`.
 */
export class ArtifactStore {
  readonly inputDir: string;
  readonly outputDir: string;
  readonly tempDir: string;

  constructor(options: ArtifactStoreOptions) {
    this.inputDir = resolve(options.inputDir);
    this.outputDir = resolve(options.outputDir);
    this.tempDir = resolve(options.tempDir);
  }

  ticketDir(ticket: string): string {
    return join(this.outputDir, ticketDatePrefix(ticket), ticket);
  }

  scratchDir(ticket: string): string {
    return join(this.tempDir, ticket);
  }

  workDir(ticket: string): string {
    return join(this.scratchDir(ticket), 'work');
  }

  private async prepareScratch(ticket: string): Promise<string> {
    const inputDir = join(this.scratchDir(ticket), 'input');
    await mkdir(inputDir, { recursive: true });
    await mkdir(this.workDir(ticket), { recursive: true });
    return inputDir;
  }

  async materializeUpload(ticket: string, fileName: string, content: Buffer): Promise<MaterializedInput> {
    const name = sanitizeFileName(fileName);
    const target = join(await this.prepareScratch(ticket), name);
    await writeFile(target, content);
    return { path: await this.unpackIfArchive(ticket, target), name, size: content.length };
  }

  /**
   * Resolves a client-supplied path against the input root. Relative paths are
   * joined to the root; absolute ones must already point inside it. Symlinks
   * may not lead out of the root.
   */
  async resolveInputPath(requested: string): Promise<string> {
    const candidate = isAbsolute(requested) ? resolve(requested) : resolve(this.inputDir, requested);
    if (!isInside(this.inputDir, candidate)) throw outsideRoot(requested);

    let real: string;
    try {
      real = await realpath(candidate);
    } catch (error) {
      if (isNotFound(error)) {
        throw new InvalidRequestError(msg('RESOURCE_NOT_FOUND'), { fields: { resource: requested } });
      }
      throw error;
    }

    if (!isInside(await realpath(this.inputDir), real)) throw outsideRoot(requested);
    return real;
  }

  /**
   * Copies an input-root file (with shapefile companions) or directory into the
   * ticket's scratch area. Every copied entry, including links met along the
   * way, must resolve inside the input root.
   */
  async materializePath(ticket: string, requested: string): Promise<MaterializedInput> {
    const source = await this.resolveInputPath(requested);
    const realRoot = await realpath(this.inputDir);
    const name = basename(source);
    const target = join(await this.prepareScratch(ticket), name);

    let size = await copyContained(source, target, realRoot, requested, new Set());
    if ((await stat(source)).isDirectory()) {
      return { path: target, name, size };
    }

    if (extname(name).toLowerCase() === '.shp') {
      const stem = basename(name, extname(name)).toLowerCase();
      for (const sibling of await readdir(dirname(source))) {
        const siblingExt = extname(sibling).toLowerCase();
        if (sibling === name || !SHAPEFILE_EXTENSIONS.has(siblingExt)) continue;
        if (basename(sibling, extname(sibling)).toLowerCase() !== stem) continue;

        size += await copyContained(join(dirname(source), sibling), join(dirname(target), sibling), realRoot, requested, new Set());
      }
    }

    return { path: await this.unpackIfArchive(ticket, target), name, size };
  }

  /**
   * Extracts a staged zip or tar archive into the ticket's input directory and
   * returns the path engines should read. Anything else is returned unchanged.
   */
  private async unpackIfArchive(ticket: string, staged: string): Promise<string> {
    const format = detectArchive(basename(staged), await readHeader(staged));
    if (format === null) return staged;

    const inputDir = join(this.scratchDir(ticket), 'input');
    // The prefix keeps it clear of input/ and work/.
    const archive = join(this.scratchDir(ticket), `.archive-${basename(staged)}`);
    await rename(staged, archive);

    try {
      if (format === 'zip') {
        await extractZip(archive, { dir: inputDir });
      } else {
        await untar(archive, inputDir);
      }
    } catch (error) {
      throw toArchiveError(error);
    } finally {
      await rm(archive, { force: true });
    }

    await assertNoLinks(inputDir, await realpath(inputDir));
    return locateExtracted(inputDir);
  }

  /**
   * Moves an engine's output into the ticket directory. The file appears under
   * its final name only once complete. Returns the reference to record on the
   * job, relative to the output root.
   */
  async store(ticket: string, producedPath: string): Promise<string> {
    const dir = this.ticketDir(ticket);
    await mkdir(dir, { recursive: true });

    const fileName = sanitizeFileName(basename(producedPath));
    const finalPath = join(dir, fileName);
    const tmp = `${finalPath}.tmp.${randomBytes(4).toString('hex')}`;

    try {
      await copyFile(producedPath, tmp);
      await rename(tmp, finalPath);
    } catch (error) {
      await rm(tmp, { force: true });
      throw error;
    }

    return relative(this.outputDir, finalPath).split(sep).join('/');
  }

  /** Looks up a stored artifact; null once retention has removed it. */
  async open(outputRef: string): Promise<StoredArtifact | null> {
    const path = resolve(this.outputDir, outputRef);
    if (!isInside(this.outputDir, path)) return null;

    try {
      const info = await stat(path);
      if (!info.isFile()) return null;

      const fileName = basename(path);
      return { path, fileName, size: info.size, mediaType: mediaTypeFor(fileName) };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async releaseScratch(ticket: string): Promise<void> {
    await rm(this.scratchDir(ticket), { recursive: true, force: true });
  }

  async removeTicket(ticket: string): Promise<void> {
    await rm(this.ticketDir(ticket), { recursive: true, force: true });
  }

  /** Creates the temp and output roots and proves both are writable. */
  async checkWritable(): Promise<{ tempDir: boolean; outputDir: boolean }> {
    const [tempDir, outputDir] = await Promise.all([canWrite(this.tempDir), canWrite(this.outputDir)]);
    return { tempDir, outputDir };
  }
}

async function canWrite(dir: string): Promise<boolean> {
  try {
    await mkdir(dir, { recursive: true });
    await access(dir, constants.W_OK);
    const file = join(dir, `.write-check-${randomBytes(4).toString('hex')}`);
    await writeFile(file, '');
    await rm(file, { force: true });
    return true;
  } catch {
    return false;
  }
}

// Follows links, so each entry is checked at its real location. Directories
// already visited through another link are skipped.
async function copyContained(
  source: string,
  target: string,
  realRoot: string,
  requested: string,
  visited: Set<string>
): Promise<number> {
  const real = await realpath(source);
  if (!isInside(realRoot, real)) throw outsideRoot(requested);

  const info = await stat(real);
  if (info.isFile()) {
    await copyFile(real, target);
    return info.size;
  }
  if (!info.isDirectory() || visited.has(real)) return 0;

  visited.add(real);
  await mkdir(target, { recursive: true });
  let total = 0;
  for (const entry of await readdir(real)) {
    total += await copyContained(join(source, entry), join(target, entry), realRoot, requested, visited);
  }
  return total;
}

async function readHeader(path: string): Promise<Buffer> {
  const handle = await open(path, 'r');
  try {
    const buffer = Buffer.alloc(512);
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

async function untar(archive: string, dir: string): Promise<void> {
  let rejected: InvalidRequestError | undefined;
  await extractTar({
    file: archive,
    cwd: dir,
    strict: true,
    filter: (entryPath, entry) => {
      if (escapesDir(entryPath)) {
        rejected ??= new InvalidRequestError(msg('ARCHIVE_ENTRY_OUTSIDE'), { fields: { entry: entryPath } });
        return false;
      }
      if ('type' in entry && (entry.type === 'SymbolicLink' || entry.type === 'Link')) {
        rejected ??= new InvalidRequestError(msg('ARCHIVE_LINK'), { fields: { entry: entryPath } });
        return false;
      }
      return true;
    },
  });
  if (rejected) throw rejected;
}

// Library errors describe the archive; errors raised by a system call do not.
function toArchiveError(error: unknown): unknown {
  if (error instanceof InvalidRequestError) return error;
  if (!(error instanceof Error) || 'syscall' in error) return error;
  if (/^(Out of bound path|invalid relative path|absolute path)/.test(error.message)) {
    return new InvalidRequestError(msg('ARCHIVE_ENTRY_OUTSIDE'));
  }
  return new InvalidRequestError(msg('ARCHIVE_UNREADABLE'), { fields: { reason: error.message } });
}

async function assertNoLinks(dir: string, realRoot: string): Promise<void> {
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if ((await lstat(path)).isSymbolicLink()) {
      throw new InvalidRequestError(msg('ARCHIVE_LINK'), { fields: { entry: relative(realRoot, path) } });
    }
    if (entry.isDirectory()) await assertNoLinks(path, realRoot);
  }
}

function isListed(name: string): boolean {
  return !name.startsWith('.') && name !== '__MACOSX';
}

// Archives usually wrap their content in a single top-level folder.
async function locateExtracted(dir: string): Promise<string> {
  const entries = (await readdir(dir, { withFileTypes: true })).filter(entry => isListed(entry.name));
  if (entries.length === 0) throw new InvalidRequestError(msg('ARCHIVE_EMPTY'));

  const [only] = entries;
  if (entries.length === 1 && only) {
    const path = join(dir, only.name);
    return only.isDirectory() ? locateExtracted(path) : path;
  }
  return dir;
}
