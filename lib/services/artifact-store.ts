import { randomUUID } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { env } from "@/lib/env";
import { ArtifactNotFoundError } from "@/lib/errors";

export const PPTX_MIME_TYPE = "application/vnd.openxmlformats-officedocument.presentationml.presentation";

const ARTIFACT_NAME_REGEX = /^slide_[0-9a-f]{8}\.pptx$/;
const MAX_NAME_ATTEMPTS = 5;

export interface SavedArtifact {
  filename: string;
  filePath: string;
}

interface StoreOptions {
  dir?: string;
}

export function resolveExportDir(): string {
  return path.resolve(process.cwd(), env.EXPORT_DIR);
}

export function createArtifactName(): string {
  return `slide_${randomUUID().replaceAll("-", "").slice(0, 8)}.pptx`;
}

export function isArtifactName(filename: string): boolean {
  return ARTIFACT_NAME_REGEX.test(filename);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Writes `data` under a fresh name. The exclusive-create flag makes a clash
 * with an existing file fail instead of overwrite; a clash draws a new name.
 */
export async function saveArtifact(
  data: Buffer,
  options: StoreOptions & { createName?: () => string } = {}
): Promise<SavedArtifact> {
  const dir = options.dir ?? resolveExportDir();
  const createName = options.createName ?? createArtifactName;
  await fs.mkdir(dir, { recursive: true });

  for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
    const filename = createName();
    const filePath = path.join(dir, filename);
    try {
      await fs.writeFile(filePath, data, { flag: "wx" });
      return { filename, filePath };
    } catch (error) {
      if (isErrnoException(error) && error.code === "EEXIST") {
        continue;
      }
      throw error;
    }
  }

  throw new Error(`Could not allocate a unique artifact name after ${MAX_NAME_ATTEMPTS} attempts.`);
}

export async function resolveArtifactPath(filename: string, options: StoreOptions = {}): Promise<string> {
  // Only generated names resolve, so a path parameter can never leave the export directory.
  if (!isArtifactName(filename)) {
    throw new ArtifactNotFoundError(filename);
  }

  const filePath = path.join(options.dir ?? resolveExportDir(), filename);
  const stat = await fs.stat(filePath).catch((error: unknown) => {
    if (isErrnoException(error) && error.code === "ENOENT") return null;
    throw error;
  });

  if (!stat?.isFile()) {
    throw new ArtifactNotFoundError(filename);
  }

  return filePath;
}

export async function readArtifact(filename: string, options: StoreOptions = {}): Promise<Buffer> {
  const filePath = await resolveArtifactPath(filename, options);
  return fs.readFile(filePath);
}
