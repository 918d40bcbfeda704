import path from "node:path";

import fg from "fast-glob";

export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultRunId(): string {
  // YYYYMMDD-HHMMSS
  const d = new Date();
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(d.getUTCDate()).padStart(2, "0");
  const hh = String(d.getUTCHours()).padStart(2, "0");
  const mi = String(d.getUTCMinutes()).padStart(2, "0");
  const ss = String(d.getUTCSeconds()).padStart(2, "0");
  return `${yyyy}${mm}${dd}-${hh}${mi}${ss}`;
}

export function toPosixRelative(from: string, to: string): string {
  const rel = path.relative(from, to);
  return rel.length === 0 ? "." : rel.split(path.sep).join("/");
}

/**
 * fast-glob ignore patterns that keep a walk of `root` out of `nested` when `nested`
 * lies strictly inside it. Empty otherwise.
 */
export function ignoreNestedRoot(root: string, nested: string): string[] {
  const rel = path.relative(root, nested);
  if (rel.length === 0 || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    return [];
  }
  const pattern = fg.escapePath(rel.split(path.sep).join("/"));
  return [pattern, `${pattern}/**`];
}

export function errnoCode(error: unknown): string | undefined {
  if (!error || typeof error !== "object" || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

export function truncateTail(text: string, maxLines: number): string {
  const lines = text.trimEnd().split("\n");
  if (lines.length <= maxLines) return lines.join("\n");
  return lines.slice(lines.length - maxLines).join("\n");
}
