import fs from "node:fs/promises";
import path from "node:path";
import type { AttachmentKind, PendingAttachment } from "../chat-types.js";
import { ToolError, describeFsError, isErrnoException } from "../tools/errors.js";

export const MAX_IMAGE_FILE_BYTES = 8 * 1024 * 1024;
export const MAX_DOCUMENT_FILE_BYTES = 32 * 1024 * 1024;

const IMAGE_MIME_BY_EXT: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
};

const DOCUMENT_MIME_BY_EXT: Record<string, string> = {
  ".pdf": "application/pdf",
};

export function classifyMediaPath(filePath: string): AttachmentKind | null {
  const extension = path.extname(filePath).toLowerCase();
  if (extension in IMAGE_MIME_BY_EXT) {
    return "image";
  }
  if (extension in DOCUMENT_MIME_BY_EXT) {
    return "document";
  }
  return null;
}

export function mimeTypeForPath(filePath: string): string | null {
  const extension = path.extname(filePath).toLowerCase();
  return IMAGE_MIME_BY_EXT[extension] ?? DOCUMENT_MIME_BY_EXT[extension] ?? null;
}

/**
 * Queue of media files loaded by tools during one session.
 *
 * Tools stage files here and hand the model a short acknowledgment; the agent
 * loop drains the queue into a user message after the tool results of a step.
 */
export class AttachmentStager {
  private images: PendingAttachment[] = [];
  private documents: PendingAttachment[] = [];

  constructor(private readonly cwd: string = process.cwd()) {}

  async stage(filePath: string, kind: AttachmentKind): Promise<string> {
    const detected = classifyMediaPath(filePath);
    const mimeType = mimeTypeForPath(filePath);
    if (detected !== kind || !mimeType) {
      const extension = path.extname(filePath).toLowerCase() || "(no extension)";
      throw new ToolError("unsupported_media_kind", `unsupported ${kind} type: ${extension}`);
    }

    const resolvedPath = path.resolve(this.cwd, filePath);
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(resolvedPath);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        throw new ToolError("file_not_found", `file not found: ${filePath}`);
      }
      throw new ToolError("io_error", `failed to read ${filePath}: ${describeFsError(error)}`);
    }

    const limit = kind === "image" ? MAX_IMAGE_FILE_BYTES : MAX_DOCUMENT_FILE_BYTES;
    if (bytes.length > limit) {
      throw new ToolError(
        "file_too_large",
        `${kind} too large (${formatByteSize(bytes.length)}). max is ${formatByteSize(limit)}`,
      );
    }

    const attachment: PendingAttachment = {
      kind,
      path: resolvedPath,
      mimeType,
      dataUrl: `data:${mimeType};base64,${bytes.toString("base64")}`,
      byteSize: bytes.length,
    };

    if (kind === "image") {
      this.images.push(attachment);
      return `Image loaded: ${filePath}`;
    }
    this.documents.push(attachment);
    return `Document loaded: ${filePath}`;
  }

  drain(): { images: PendingAttachment[]; documents: PendingAttachment[] } {
    const drained = { images: this.images, documents: this.documents };
    this.images = [];
    this.documents = [];
    return drained;
  }

  isEmpty(): boolean {
    return this.images.length === 0 && this.documents.length === 0;
  }
}

export function parseDataUrl(dataUrl: string): { mimeType: string; base64: string } | null {
  const match = dataUrl.match(/^data:([^;,]+);base64,(.*)$/i);
  if (!match?.[1]) {
    return null;
  }
  return {
    mimeType: match[1].toLowerCase(),
    base64: match[2] ?? "",
  };
}

function formatByteSize(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 0) {
    return "0 b";
  }
  if (bytes < 1024) {
    return `${Math.floor(bytes)} b`;
  }
  const kb = bytes / 1024;
  if (kb < 1024) {
    return `${kb.toFixed(kb >= 100 ? 0 : kb >= 10 ? 1 : 2)} kb`;
  }
  const mb = kb / 1024;
  return `${mb.toFixed(mb >= 100 ? 0 : mb >= 10 ? 1 : 2)} mb`;
}
