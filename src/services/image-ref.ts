import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { InvalidQueryError, errorMessage } from "../shared/errors.js";

export interface LoadedImage {
  base64: string;
  /** SHA-256 of the decoded bytes */
  digest: string;
}

const DATA_URI = /^data:image\/[\w.+-]+;base64,/i;
const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

function fromBytes(bytes: Buffer): LoadedImage {
  return {
    base64: bytes.toString("base64"),
    digest: createHash("sha256").update(bytes).digest("hex"),
  };
}

function isNotFound(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "ENOTDIR" || error.code === "ENAMETOOLONG";
}

/**
 * Resolve an image reference to base64 payload and content digest.
 * Accepts a data URI, a file path, or raw base64.
 */
export async function loadImage(ref: string): Promise<LoadedImage> {
  const trimmed = ref.trim();
  if (trimmed.length === 0) {
    throw new InvalidQueryError("Image reference is empty");
  }

  if (DATA_URI.test(trimmed)) {
    const payload = trimmed.replace(DATA_URI, "").replace(/\s+/g, "");
    if (!BASE64.test(payload)) {
      throw new InvalidQueryError("Image data URI is not valid base64");
    }
    return fromBytes(Buffer.from(payload, "base64"));
  }

  try {
    return fromBytes(await readFile(trimmed));
  } catch (error) {
    if (!isNotFound(error)) {
      throw new InvalidQueryError(`Cannot read image ${trimmed}: ${errorMessage(error)}`);
    }
  }

  const compact = trimmed.replace(/\s+/g, "");
  if (BASE64.test(compact)) {
    return fromBytes(Buffer.from(compact, "base64"));
  }
  throw new InvalidQueryError(`Image not found: ${trimmed}`);
}
