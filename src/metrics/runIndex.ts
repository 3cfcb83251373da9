import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm } from "node:fs/promises";
import path from "node:path";

import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import { hasErrnoCode } from "../nodePrimitives.js";
import { toPortableRelative } from "./layout.js";

/** Heading after which new runs are inserted, newest first. */
export const RUNS_MARKER = "## Runs\n\n";

/** Content written when the index does not exist yet. */
export const RUN_INDEX_PREAMBLE =
  "# Metrics Runs\n\n" +
  "Each run is stored under `test_outputs/metrics/<runID>/`.\n\n" +
  "Run with: `npm run summarize -- --run-id <runID> --out-dir test_outputs/metrics/<runID>`\n\n" +
  RUNS_MARKER;

/** How {@link updateRunIndex} changed the index. */
export type RunIndexStatus = "unchanged" | "inserted" | "appended";

export interface RunIndexUpdate {
  readonly status: RunIndexStatus;
  /** Entry line, without its trailing newline. */
  readonly line: string;
  /** True when this call created the index file. */
  readonly created: boolean;
}

/** Builds the `- \`<runID>\`: \`<dir>/summary.md\`` entry for a run. */
export function buildRunIndexLine(runId: string, indexDir: string, outDir: string): string {
  return `- \`${runId}\`: \`${toPortableRelative(indexDir, outDir)}/summary.md\``;
}

/**
 * Computes the next index content. The entry goes right after the first
 * `## Runs` marker; without a marker it is appended at the end of the file.
 */
export function insertRunIndexLine(
  existing: string,
  line: string,
): { status: RunIndexStatus; content: string } {
  if (existing.split("\n").includes(line)) {
    return { status: "unchanged", content: existing };
  }

  const markerIndex = existing.indexOf(RUNS_MARKER);
  if (markerIndex !== -1) {
    const splitAt = markerIndex + RUNS_MARKER.length;
    return {
      status: "inserted",
      content: `${existing.slice(0, splitAt)}${line}\n${existing.slice(splitAt)}`,
    };
  }

  return { status: "appended", content: `${existing}\n${line}\n` };
}

/**
 * Adds a run to the cumulative index. Repeating the call for the same run and
 * output directory leaves the file untouched.
 */
export async function updateRunIndex(options: {
  readonly indexPath: string;
  readonly runId: string;
  readonly outDir: string;
  readonly fileSystem?: FileSystemGateway;
}): Promise<RunIndexUpdate> {
  const indexDir = path.dirname(options.indexPath);
  await mkdir(indexDir, { recursive: true });

  let existing: string;
  let created = false;
  try {
    existing = await readFile(options.indexPath, "utf8");
  } catch (error) {
    if (!hasErrnoCode(error, "ENOENT")) {
      throw error;
    }
    existing = RUN_INDEX_PREAMBLE;
    created = true;
  }

  const line = buildRunIndexLine(options.runId, indexDir, options.outDir);
  const next = insertRunIndexLine(existing, line);
  if (next.status !== "unchanged" || created) {
    await writeFileAtomic(options.indexPath, next.content, options.fileSystem ?? defaultFileSystemGateway);
  }
  return { status: next.status, line, created };
}

/**
 * Writes through a sibling temporary file renamed into place, so readers see
 * either the previous content or the new one.
 */
async function writeFileAtomic(filePath: string, content: string, fileSystem: FileSystemGateway): Promise<void> {
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  try {
    await fileSystem.writeFileUtf8(tmpPath, content);
    await rename(tmpPath, filePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}
