import { readFileSync, statSync, type Stats } from "fs";
import { basename, extname } from "path";
import { Readable } from "stream";
import { FileError } from "../errors/index.js";
import type { FilePart } from "../types/http.js";
import {
  DEFAULT_UPLOAD_NAME,
  EXTENSION_TO_CONTENT_TYPE,
  MAX_FILE_SIZE,
  SUPPORTED_EXTENSIONS,
  UPLOAD_FIELD_NAME,
} from "./constants.js";

/**
 * A document to upload: a path on disk, raw bytes, or a readable stream
 */
export type FileInput = string | Uint8Array | Readable;

export interface FileUploadOptions {
  /** Form field name. Default: "image" */
  field?: string;
  /** File name sent with the part. Default: the path's base name, else "document" */
  fileName?: string;
  /**
   * Content type sent with the part. When set, the file name's extension is
   * not checked against the supported document types.
   */
  contentType?: string;
  /** Largest accepted upload in bytes. Default: 100MB */
  maxSize?: number;
}

/**
 * JSON body fields for a document the API fetches itself
 */
export interface UrlUpload {
  image_url: string;
  image_content_type?: string;
}

/**
 * JSON body fields for an inline base64 document
 */
export interface Base64Upload {
  image_base64: string;
  image_content_type?: string;
}

/**
 * Get content type from file name
 */
export function detectContentType(fileName: string): string {
  const ext = extname(fileName).toLowerCase();
  return EXTENSION_TO_CONTENT_TYPE[ext] ?? "application/octet-stream";
}

/**
 * Pick the part's content type. Names without an extension are sent as PDF,
 * which is what the API assumes for unnamed documents.
 */
function resolveContentType(fileName: string, contentType?: string): string {
  if (contentType) {
    return contentType;
  }
  const ext = extname(fileName).toLowerCase();
  if (ext === "") {
    return "application/pdf";
  }
  const detected = EXTENSION_TO_CONTENT_TYPE[ext];
  if (detected === undefined) {
    throw new FileError(
      `Unsupported document type '${ext}' for ${fileName}; expected one of ${SUPPORTED_EXTENSIONS.join(", ")} or an explicit contentType`,
      { path: fileName },
    );
  }
  return detected;
}

function checkSize(size: number, maxSize: number, path: string): void {
  if (size > maxSize) {
    throw new FileError(`${path} is ${size} bytes; uploads are limited to ${maxSize} bytes`, {
      path,
      size,
    });
  }
}

function statPath(path: string): Stats {
  try {
    return statSync(path);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    if (cause && "code" in cause && cause.code === "ENOENT") {
      throw new FileError(`File not found: ${path}`, { path, cause });
    }
    throw new FileError(`Cannot access ${path}`, { path, cause });
  }
}

async function readStream(stream: Readable): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

/**
 * Read a file input into memory, checking its size before the bytes are held
 * where that is possible
 *
 * @throws {FileError} If a path is missing or not a regular file, or the input is too large
 */
async function readInput(input: FileInput, fileName: string, maxSize: number): Promise<Uint8Array> {
  if (typeof input === "string") {
    const stats = statPath(input);
    if (!stats.isFile()) {
      throw new FileError(`Not a regular file: ${input}`, { path: input });
    }
    checkSize(stats.size, maxSize, input);
    try {
      return readFileSync(input);
    } catch (error) {
      throw new FileError(`Failed to read file: ${input}`, {
        path: input,
        size: stats.size,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  const content = input instanceof Readable ? await readStream(input) : input;
  checkSize(content.length, maxSize, fileName);
  return content;
}

/**
 * Prepare a file for a multipart request body.
 *
 * Streams are drained into memory so that the same bytes can be sent again
 * if the request is retried.
 *
 * @example
 * ```typescript
 * const part = await prepareFileUpload("./invoice.pdf");
 * const descriptor: RequestDescriptor = {
 *   method: "POST",
 *   path: "/api/convert",
 *   body: { type: "multipart", fields: { document_type_code: "invoice" }, files: [part] },
 * };
 * ```
 */
export async function prepareFileUpload(
  input: FileInput,
  options: FileUploadOptions = {},
): Promise<FilePart> {
  const fileName =
    options.fileName ??
    (typeof input === "string" ? basename(input) : DEFAULT_UPLOAD_NAME);
  const contentType = resolveContentType(fileName, options.contentType);
  const content = await readInput(input, fileName, options.maxSize ?? MAX_FILE_SIZE);

  return {
    field: options.field ?? UPLOAD_FIELD_NAME,
    fileName,
    contentType,
    content,
  };
}

/**
 * Body fields for a document the API downloads from `url`. Without a
 * content type the server detects it.
 */
export function prepareUrlUpload(url: string, options: { contentType?: string } = {}): UrlUpload {
  return options.contentType
    ? { image_url: url, image_content_type: options.contentType }
    : { image_url: url };
}

/**
 * Body fields for base64 document data. A `data:` URI already names its
 * content type, so `contentType` is only sent for bare base64.
 */
export function prepareBase64Upload(
  data: string,
  options: { contentType?: string } = {},
): Base64Upload {
  if (data.startsWith("data:") || !options.contentType) {
    return { image_base64: data };
  }
  return { image_base64: data, image_content_type: options.contentType };
}

/**
 * Encode a file input to a base64 string for JSON bodies
 */
export async function encodeFileToBase64(
  input: FileInput,
  options: FileUploadOptions = {},
): Promise<string> {
  const part = await prepareFileUpload(input, options);
  return Buffer.from(part.content).toString("base64");
}
