import { promises as fs } from "fs";
import * as path from "path";
import { randomBytes } from "crypto";
import { z } from "zod";
import { DedupStateDocument } from "../types";

export type DedupEntries = Record<string, string>;

// Backing store for "signature -> last emission" entries. Alternative stores only need these four calls.
export interface DedupStateStore {
  readonly location: string;
  exists(): Promise<boolean>;
  // Missing or unreadable state is an empty mapping, never an error
  load(): Promise<DedupEntries>;
  // Readers must observe either the previous or the new document, never a partial one
  save(entries: DedupEntries): Promise<void>;
  // Copy the current document aside; returns where it went, or null when there was nothing to copy
  backup(label: string): Promise<string | null>;
}

const DedupStateDocumentSchema = z.object({
  last_sent: z.record(z.unknown()).catch({}),
});

export class FileDedupStateStore implements DedupStateStore {
  constructor(readonly location: string) {}

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.location);
      return true;
    } catch {
      return false;
    }
  }

  async load(): Promise<DedupEntries> {
    let text: string;
    try {
      text = await fs.readFile(this.location, "utf8");
    } catch (error) {
      if (!isNotFound(error)) {
        console.warn("Failed to read alert dedup state, treating as empty", {
          statePath: this.location,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return {};
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      console.warn("Alert dedup state is not valid JSON, treating as empty", {
        statePath: this.location,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }

    const parsed = DedupStateDocumentSchema.safeParse(payload);
    if (!parsed.success) return {};

    const entries: DedupEntries = {};
    for (const [signature, timestamp] of Object.entries(parsed.data.last_sent)) {
      if (typeof timestamp === "string") {
        entries[signature] = timestamp;
      }
    }
    return entries;
  }

  // Write to a temp file in the same directory, fsync, then rename over the target
  async save(entries: DedupEntries): Promise<void> {
    const directory = path.dirname(this.location);
    await fs.mkdir(directory, { recursive: true });

    const tempPath = path.join(
      directory,
      `.${path.basename(this.location)}.${process.pid}.${randomBytes(6).toString("hex")}.tmp`,
    );
    const document: DedupStateDocument = { last_sent: { ...entries } };
    const body = `${JSON.stringify(document, null, 2)}\n`;

    try {
      const handle = await fs.open(tempPath, "w");
      try {
        await handle.writeFile(body, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, this.location);
    } finally {
      await fs.rm(tempPath, { force: true });
    }
  }

  async backup(label: string): Promise<string | null> {
    if (!(await this.exists())) return null;

    const extension = path.extname(this.location);
    const stem = path.basename(this.location, extension);
    const backupPath = path.join(path.dirname(this.location), `${stem}-${label}.bak${extension}`);
    await fs.copyFile(this.location, backupPath);
    return backupPath;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
