import { basename, extname } from "node:path";
import { fileTypeFromBuffer } from "file-type";
import { CourseMateError } from "../errors.js";

export type SupportedFileType = "md" | "txt";

export interface UploadedFileLike {
  originalname: string;
  mimetype: string;
  size: number;
  buffer: Buffer;
}

export interface FileValidationOptions {
  maxSizeBytes?: number;
}

export interface ValidatedFile {
  fileType: SupportedFileType;
  sanitizedFilename: string;
  mimeType: string;
  size: number;
}

export class FileValidationError extends CourseMateError {
  constructor(message: string) {
    super(message);
    this.name = "FileValidationError";
  }
}

const extensionToType: Record<string, SupportedFileType> = {
  ".md": "md",
  ".txt": "txt"
};

const allowedMimeTypes: Record<SupportedFileType, string[]> = {
  md: ["text/markdown", "text/x-markdown", "text/plain"],
  txt: ["text/plain"]
};

const extensionFallbackMime: Record<SupportedFileType, string> = {
  md: "text/markdown",
  txt: "text/plain"
};

export function isSupportedCourseFile(filename: string): boolean {
  return extensionToType[extname(filename).toLowerCase()] !== undefined;
}

export async function validateUploadedFile(
  file: UploadedFileLike,
  options: FileValidationOptions = {}
): Promise<ValidatedFile> {
  const extension = extname(file.originalname).toLowerCase();
  const fileType = extensionToType[extension];
  if (!fileType) {
    throw new FileValidationError("Unsupported file extension. Only .md and .txt are allowed.");
  }

  if (options.maxSizeBytes !== undefined && file.size > options.maxSizeBytes) {
    throw new FileValidationError(`File is too large. Maximum size is ${options.maxSizeBytes} bytes.`);
  }

  const allowed = allowedMimeTypes[fileType];
  const declaredMime = (file.mimetype || "").toLowerCase();
  const detected = await fileTypeFromBuffer(file.buffer);
  const detectedMime = detected?.mime.toLowerCase();

  // Browsers often send application/octet-stream for text files.
  const effectiveDeclaredMime =
    declaredMime === "application/octet-stream" ? "" : declaredMime;

  if (effectiveDeclaredMime && !allowed.includes(effectiveDeclaredMime)) {
    throw new FileValidationError(`MIME type mismatch for ${extension}. Received ${declaredMime}.`);
  }

  // file-type only recognizes binary signatures; any hit means this is not text
  if (detectedMime && !allowed.includes(detectedMime)) {
    throw new FileValidationError(`Binary signature mismatch for ${extension}. Detected ${detectedMime}.`);
  }

  return {
    fileType,
    sanitizedFilename: sanitizeFilename(file.originalname),
    mimeType: detectedMime ?? (effectiveDeclaredMime || extensionFallbackMime[fileType]),
    size: file.size
  };
}

export function sanitizeFilename(filename: string): string {
  const cleanBase = basename(filename).replace(/[^\w.-]/g, "_");
  return cleanBase.length > 0 ? cleanBase : "file";
}
