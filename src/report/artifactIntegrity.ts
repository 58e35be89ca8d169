import { promises as fs } from "fs";
import * as path from "path";
import { z } from "zod";
import { ArtifactIntegrity, ArtifactStatus } from "../types";

export const ARTIFACT_VERIFY_FILE_NAME = "weekly-artifact-verify.json";

const countField = z.coerce.number().finite().transform(Math.trunc).optional().catch(undefined);

const VerificationDocumentSchema = z.object({
  checks: z
    .array(
      z
        .object({
          path: z.unknown(),
          status: z.unknown(),
        })
        .nullable()
        .catch(null),
    )
    .catch([]),
  summary: z
    .object({
      ok: countField,
      missing: countField,
      total: countField,
    })
    .catch({}),
});

function toText(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value).trim();
}

// Anything other than an explicit OK counts as missing
function toStatus(value: unknown): ArtifactStatus {
  return toText(value).toUpperCase() === "OK" ? "OK" : "MISSING";
}

export function emptyArtifactIntegrity(source: string): ArtifactIntegrity {
  return { source, ok_count: 0, missing_count: 0, total_count: 0, files: [] };
}

export function decodeArtifactIntegrity(payload: unknown, source: string): ArtifactIntegrity {
  const parsed = VerificationDocumentSchema.safeParse(payload);
  if (!parsed.success) return emptyArtifactIntegrity(source);

  const files: ArtifactIntegrity["files"] = [];
  for (const check of parsed.data.checks) {
    if (!check) continue;
    const filePath = toText(check.path);
    if (!filePath) continue;
    files.push({ path: filePath, status: toStatus(check.status) });
  }

  // Explicit summary counts win over counts derived from the rows
  const { summary } = parsed.data;
  const okCount = summary.ok ?? files.filter((file) => file.status === "OK").length;
  const missingCount = summary.missing ?? files.filter((file) => file.status === "MISSING").length;
  const totalCount = summary.total ?? files.length;

  return {
    source,
    ok_count: Math.max(0, okCount),
    missing_count: Math.max(0, missingCount),
    total_count: Math.max(0, totalCount),
    files,
  };
}

// Absent or unparsable verification output is a zero-entry result, not an error
export async function loadArtifactIntegrity(logsDir: string, fileName = ARTIFACT_VERIFY_FILE_NAME): Promise<ArtifactIntegrity> {
  const source = path.join(logsDir, fileName);
  let payload: unknown;
  try {
    payload = JSON.parse(await fs.readFile(source, "utf8"));
  } catch {
    return emptyArtifactIntegrity(source);
  }
  return decodeArtifactIntegrity(payload, source);
}
