/**
 * Staleness detection: pick the units whose rendered artifact is missing or older
 * than the source. The worklist is computed once per build and never revisited.
 */

import type { Stats } from "node:fs";
import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";

import { IoError } from "./errors.js";
import type { Job, StaleReason } from "./jobs.js";
import { errnoCode, ignoreNestedRoot, toPosixRelative } from "./utils.js";

export type ScanOptions = {
  unitExtension: string;
  artifactExtension: string;
  onStaleUnit?: (job: Job) => void;
};

// =============================================================================
// SCAN
// =============================================================================

export async function findStaleUnits(
  sourceRoot: string,
  outputRoot: string,
  options: ScanOptions,
): Promise<Job[]> {
  const unitPaths = await listUnitPaths(sourceRoot, outputRoot, options.unitExtension);
  const candidates = await Promise.all(
    unitPaths.map((sourcePath) => evaluateUnit(sourceRoot, outputRoot, sourcePath, options)),
  );

  const worklist: Job[] = [];
  for (const job of candidates) {
    if (!job) continue;
    worklist.push(job);
    options.onStaleUnit?.(job);
  }
  return worklist;
}

export function swapExtension(
  fileName: string,
  unitExtension: string,
  artifactExtension: string,
): string {
  if (!fileName.endsWith(unitExtension)) {
    return `${fileName}${artifactExtension}`;
  }
  return `${fileName.slice(0, fileName.length - unitExtension.length)}${artifactExtension}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

// Entries are filtered by stat in evaluateUnit, so symlinked unit files are kept.
async function listUnitPaths(
  sourceRoot: string,
  outputRoot: string,
  unitExtension: string,
): Promise<string[]> {
  let found: string[];
  try {
    found = await fg(`**/*${fg.escapePath(unitExtension)}`, {
      cwd: sourceRoot,
      ignore: ignoreNestedRoot(sourceRoot, outputRoot),
      onlyFiles: false,
      dot: true,
      followSymbolicLinks: false,
      absolute: true,
    });
  } catch (err) {
    throw new IoError(`Failed to walk source directory ${sourceRoot}`, sourceRoot, err);
  }

  return found
    .map((p) => path.resolve(p))
    .sort((a, b) => {
      const relA = toPosixRelative(sourceRoot, a);
      const relB = toPosixRelative(sourceRoot, b);
      return relA < relB ? -1 : relA > relB ? 1 : 0;
    });
}

async function evaluateUnit(
  sourceRoot: string,
  outputRoot: string,
  sourcePath: string,
  options: ScanOptions,
): Promise<Job | null> {
  const dirPath = path.dirname(sourcePath);
  const fileName = path.basename(sourcePath);
  const relativeDir = toPosixRelative(sourceRoot, dirPath);
  const outputDir = path.resolve(outputRoot, relativeDir);
  const artifactPath = path.join(
    outputDir,
    swapExtension(fileName, options.unitExtension, options.artifactExtension),
  );

  const sourceStats = await statIfExists(sourcePath);
  if (!sourceStats || !sourceStats.isFile()) return null;

  const artifactStats = await statIfExists(artifactPath);

  const reason: StaleReason | null = !artifactStats
    ? "missing"
    : sourceStats.mtimeMs > artifactStats.mtimeMs
      ? "outdated"
      : null;

  if (!reason) return null;

  return Object.freeze({
    sourcePath,
    relativeDir,
    baseName: path.basename(fileName, options.unitExtension),
    outputDir,
    artifactPath,
    reason,
  });
}

async function statIfExists(filePath: string): Promise<Stats | null> {
  try {
    return await fse.stat(filePath);
  } catch (err) {
    if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") return null;
    throw new IoError(`Cannot read modification time of ${filePath}`, filePath, err);
  }
}
