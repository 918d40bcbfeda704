/**
 * Directory mirroring: reproduce the source tree's folder layout under the output root
 * so every unit has a directory for the renderer to write into.
 */

import type { Stats } from "node:fs";
import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";

import { ConfigurationError, IoError } from "./errors.js";
import { errnoCode, ignoreNestedRoot, toPosixRelative } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type MirroredDirectory = {
  /** Relative to both roots, "/"-separated; the root itself is ".". */
  relativePath: string;
  outputPath: string;
  created: boolean;
};

export type MirrorSummary = {
  created: number;
  existing: number;
  directories: MirroredDirectory[];
};

export type MirrorOptions = {
  onDirectory?: (directory: MirroredDirectory) => void;
};

// =============================================================================
// MIRROR
// =============================================================================

export async function mirrorDirectoryStructure(
  sourceRoot: string,
  outputRoot: string,
  options: MirrorOptions = {},
): Promise<MirrorSummary> {
  await assertSourceRootUsable(sourceRoot);

  const relativeDirs = await listSourceDirectories(sourceRoot, outputRoot);
  const directories: MirroredDirectory[] = [];

  for (const relativePath of relativeDirs) {
    const outputPath = path.resolve(outputRoot, relativePath);
    const created = await ensureDirectory(outputPath);
    const entry: MirroredDirectory = { relativePath, outputPath, created };
    directories.push(entry);
    options.onDirectory?.(entry);
  }

  const created = directories.filter((d) => d.created).length;
  return { created, existing: directories.length - created, directories };
}

export async function assertSourceRootUsable(sourceRoot: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fse.stat(sourceRoot);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new ConfigurationError(`Source directory does not exist: ${sourceRoot}`, err);
    }
    throw new IoError(`Cannot access source directory ${sourceRoot}`, sourceRoot, err);
  }

  if (!stats.isDirectory()) {
    throw new ConfigurationError(`Source path is not a directory: ${sourceRoot}`);
  }

  let entries: string[];
  try {
    entries = await fse.readdir(sourceRoot);
  } catch (err) {
    throw new IoError(`Cannot list source directory ${sourceRoot}`, sourceRoot, err);
  }

  if (entries.length === 0) {
    throw new ConfigurationError(`Source directory is empty: ${sourceRoot}`);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function listSourceDirectories(sourceRoot: string, outputRoot: string): Promise<string[]> {
  let found: string[];
  try {
    found = await fg("**", {
      cwd: sourceRoot,
      ignore: ignoreNestedRoot(sourceRoot, outputRoot),
      onlyDirectories: true,
      dot: true,
      followSymbolicLinks: false,
      absolute: true,
    });
  } catch (err) {
    throw new IoError(`Failed to walk source directory ${sourceRoot}`, sourceRoot, err);
  }

  const relative = found.map((dir) => toPosixRelative(sourceRoot, dir));
  return [".", ...relative.sort(compareShallowFirst)];
}

function compareShallowFirst(a: string, b: string): number {
  const depthA = a.split("/").length;
  const depthB = b.split("/").length;
  if (depthA !== depthB) return depthA - depthB;
  return a < b ? -1 : a > b ? 1 : 0;
}

async function ensureDirectory(outputPath: string): Promise<boolean> {
  try {
    const existed = await fse.pathExists(outputPath);
    // ensureDir creates missing ancestors, so order never matters for correctness.
    await fse.ensureDir(outputPath);
    return !existed;
  } catch (err) {
    throw new IoError(`Failed to create output directory ${outputPath}`, outputPath, err);
  }
}
