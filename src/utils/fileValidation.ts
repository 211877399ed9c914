import { z } from "zod";
import { err, ok } from "../errors";
import type { Result, ValidationError } from "../errors";

export const IMAGE_FIELD_NAMES = ["images", "image"] as const;
export const ALLOWED_EXTENSIONS = ["jpg", "jpeg", "png", "gif"] as const;
export const ALLOWED_CONTENT_TYPES = ["image/jpeg", "image/png", "image/gif"] as const;
export const DEFAULT_ORGAN = "auto";
export const DEFAULT_MAX_IMAGES = 5;

export interface UploadEntry {
  data: Uint8Array<ArrayBuffer>;
  filename: string;
  contentType: string;
  organ: string;
}

/** Ordered, validated images; position i pairs payload i with organ tag i. */
export type UploadSet = readonly UploadEntry[];

export const organFieldName = (index: number) => `organ_${index + 1}`;

const ExtensionSchema = z.enum(ALLOWED_EXTENSIONS);
const ContentTypeSchema = z.enum(ALLOWED_CONTENT_TYPES);

export function fileExtension(filename: string): string | undefined {
  const dot = filename.lastIndexOf(".");
  if (dot < 0 || dot === filename.length - 1) {
    return undefined;
  }
  return filename.slice(dot + 1).toLowerCase();
}

export function normalizeContentType(contentType: string): string {
  return contentType.split(";")[0].trim().toLowerCase();
}

/**
 * Strips directory components and anything outside `[A-Za-z0-9._-]` from a client filename.
 */
export function sanitizeFilename(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? "";
  const cleaned = base
    .normalize("NFKD")
    .replace(/[^\w.\-]+/g, "_")
    .replace(/^[._]+/, "")
    .slice(0, 128);
  return cleaned || "image";
}

export function validateFile(file: File, position: number): ValidationError | null {
  const extension = fileExtension(file.name);
  if (!ExtensionSchema.safeParse(extension).success) {
    return {
      kind: "validation.unsupported_extension",
      message: `Image ${position}: unsupported file extension${extension ? ` ".${extension}"` : ""}; allowed: ${ALLOWED_EXTENSIONS.join(", ")}`,
      position,
    };
  }

  const contentType = normalizeContentType(file.type);
  if (!ContentTypeSchema.safeParse(contentType).success) {
    return {
      kind: "validation.unsupported_content_type",
      message: `Image ${position}: unsupported content type "${file.type || "unknown"}"; allowed: ${ALLOWED_CONTENT_TYPES.join(", ")}`,
      position,
    };
  }

  return null;
}

export function collectImageFiles(form: FormData): File[] {
  const files: File[] = [];
  for (const [key, value] of form.entries()) {
    if ((IMAGE_FIELD_NAMES as readonly string[]).includes(key) && value instanceof File) {
      files.push(value);
    }
  }
  return files;
}

export function readOrganTag(form: FormData, index: number): string {
  const value = form.get(organFieldName(index));
  if (typeof value !== "string" || value.trim() === "") {
    return DEFAULT_ORGAN;
  }
  return value;
}

export async function validateUploadSet(
  form: FormData,
  maxImages: number = DEFAULT_MAX_IMAGES,
): Promise<Result<UploadSet, ValidationError>> {
  const files = collectImageFiles(form);

  if (files.length === 0) {
    return err({ kind: "validation.no_files", message: "No image file found" });
  }

  if (files.length > maxImages) {
    return err({
      kind: "validation.too_many_files",
      message: `You can upload up to ${maxImages} images only`,
    });
  }

  for (const [index, file] of files.entries()) {
    const failure = validateFile(file, index + 1);
    if (failure) {
      return err(failure);
    }
  }

  const entries = await Promise.all(
    files.map(async (file, index): Promise<UploadEntry> => ({
      data: new Uint8Array(await file.arrayBuffer()),
      filename: sanitizeFilename(file.name),
      contentType: normalizeContentType(file.type),
      organ: readOrganTag(form, index),
    })),
  );

  return ok(entries);
}
