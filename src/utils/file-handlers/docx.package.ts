import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import JSZip from 'jszip';
import { unzipSync } from 'fflate';
import { logger } from '../logger';
import { MalformedPackageError, PackagingError, errorMessage } from '../pipelineError';

export const PRIMARY_PART = 'word/document.xml';
const HEADER_FOOTER_PART = /^word\/(header|footer)\d*\.xml$/;

/** ZIP compression methods JSZip can write */
export type EntryCompression = 'STORE' | 'DEFLATE';

export type PackageEntry = {
  path: string;
  dir: boolean;
  compression: EntryCompression;
};

export type DocumentPackage = {
  /** The archive as read; reassembly starts again from these bytes */
  source: Uint8Array;
  /** Archive members in their original order */
  entries: PackageEntry[];
  /** Primary body part first, then headers and footers in archive order */
  targetPartPaths: string[];
  parts: Map<string, Uint8Array>;
};

const STORED = 0;
const DEFLATED = 8;

/** Compression method of every member, read from the central directory without inflating anything. */
const readCompressionMethods = (source: Uint8Array): Map<string, number> => {
  const methods = new Map<string, number>();
  unzipSync(source, {
    filter: (file) => {
      methods.set(file.name, file.compression);
      return false;
    },
  });
  return methods;
};

const toEntryCompression = (method: number | undefined, name: string): EntryCompression => {
  if (method === STORED) return 'STORE';
  if (method === DEFLATED || method === undefined) return 'DEFLATE';
  throw new MalformedPackageError(`Unsupported compression method ${method} for ${name}`);
};

export const isTargetPart = (partPath: string): boolean =>
  partPath === PRIMARY_PART || HEADER_FOOTER_PART.test(partPath);

/**
 * Open a word-processing package and pick the markup parts to translate:
 * `word/document.xml` plus every `word/headerN.xml` and `word/footerN.xml` present.
 */
export const extractPackage = async (source: Uint8Array): Promise<DocumentPackage> => {
  let zip: JSZip;
  let methods: Map<string, number>;
  try {
    zip = await JSZip.loadAsync(source);
    methods = readCompressionMethods(source);
  } catch (error) {
    throw new MalformedPackageError(`Cannot open document package: ${errorMessage(error)}`, error);
  }

  if (!zip.file(PRIMARY_PART)) {
    throw new MalformedPackageError(`Invalid DOCX: missing ${PRIMARY_PART}`);
  }

  const entries: PackageEntry[] = Object.values(zip.files).map((file) => ({
    path: file.name,
    dir: file.dir,
    compression: toEntryCompression(methods.get(file.name), file.name),
  }));

  const targetPartPaths = [
    PRIMARY_PART,
    ...entries.filter((entry) => !entry.dir && entry.path !== PRIMARY_PART && isTargetPart(entry.path)).map((entry) => entry.path),
  ];

  const parts = new Map<string, Uint8Array>();
  for (const partPath of targetPartPaths) {
    const file = zip.file(partPath);
    if (file) {
      parts.set(partPath, await file.async('uint8array'));
    }
  }

  logger.debug({ entries: entries.length, targetPartPaths }, 'Extracted document package');
  return { source, entries, targetPartPaths, parts };
};

export const readPackage = async (packagePath: string): Promise<DocumentPackage> => {
  let source: Buffer;
  try {
    source = await fs.readFile(packagePath);
  } catch (error) {
    throw new MalformedPackageError(`Cannot read ${packagePath}: ${errorMessage(error)}`, error);
  }
  return extractPackage(source);
};

/**
 * Rebuild the archive with `mutatedParts` replaced. Unchanged members keep their order,
 * compression method and compressed bytes.
 */
export const reassemblePackage = async (
  pkg: DocumentPackage,
  mutatedParts: Map<string, string | Uint8Array>,
): Promise<Buffer> => {
  try {
    const zip = await JSZip.loadAsync(pkg.source);
    for (const entry of pkg.entries) {
      const file = zip.files[entry.path];
      if (file && !entry.dir) {
        file.options.compression = entry.compression;
      }
    }

    for (const [partPath, content] of mutatedParts) {
      const entry = pkg.entries.find((candidate) => candidate.path === partPath);
      if (!entry) {
        throw new Error(`Part ${partPath} is not a member of the package`);
      }
      const original = zip.files[partPath];
      zip.file(partPath, content, {
        compression: entry.compression,
        createFolders: false,
        date: original?.date,
        unixPermissions: original?.unixPermissions,
        dosPermissions: original?.dosPermissions,
      });
    }

    return await zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: 6 },
    });
  } catch (error) {
    throw new PackagingError(`Failed to assemble document package: ${errorMessage(error)}`, error);
  }
};

/**
 * Write `bytes` to `outputPath` through a temporary file in `workDir` (same directory
 * as the output when omitted) and rename it into place. Nothing is left behind on failure.
 */
export const writePackageAtomic = async (bytes: Uint8Array, outputPath: string, workDir?: string): Promise<void> => {
  const directory = workDir ?? path.dirname(outputPath);
  const tempPath = path.join(directory, `.${path.basename(outputPath)}.${randomUUID()}.tmp`);
  try {
    await fs.writeFile(tempPath, bytes);
    await fs.rename(tempPath, outputPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new PackagingError(`Failed to write ${outputPath}: ${errorMessage(error)}`, error);
  }
};
