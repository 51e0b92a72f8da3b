/**
 * Upload Handler
 *
 * POST /upload with form fields `url`, `file` and `code`.
 * Exactly one of url/file must be given. A custom code is stored as
 * given and overwrites any entry already under it; otherwise a fresh
 * code is generated.
 *
 * An uploaded file is only kept once an entry points at it: a failed
 * store write deletes it again, and a replace deletes the file of the
 * entry it overwrote.
 */

import type { Context } from "hono";
import { z } from "zod";
import { generateUniqueCode, type UpsertResult } from "@ttlink/shared";
import * as metrics from "./metrics.js";
import type { AppDeps, AppEnv, ErrorResponse, UploadResponse } from "./types.js";

// =============================================================================
// Validation
// =============================================================================

export const UPLOAD_ERRORS = {
  BOTH: "Provide EITHER a URL OR a file, not both.",
  NEITHER: "Please provide a file or a URL.",
} as const;

/**
 * First path segments served by routes of their own
 */
export const RESERVED_CODES = new Set(["admin", "api", "health", "metrics", "upload", "uploads"]);

/**
 * The parts of a multipart file part this handler reads
 */
export interface UploadedFile {
  name: string;
  size: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}

function isUploadedFile(value: unknown): value is UploadedFile {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "arrayBuffer" in value &&
    typeof value.arrayBuffer === "function"
  );
}

/** Form text field; absent and blank both become undefined */
const textField = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

export const UploadFormSchema = z.object({
  url: textField,
  code: textField,
  // A browser sends an empty part with no name when no file is chosen
  file: z
    .unknown()
    .transform((value) => (isUploadedFile(value) && value.name !== "" ? value : undefined)),
});

export const TargetUrlSchema = z
  .string()
  .url("Invalid URL")
  .refine((value) => /^https?:\/\//i.test(value), "URL must use http or https");

export const CustomCodeSchema = z
  .string()
  .max(64, "Custom code must be at most 64 characters")
  .regex(/^[A-Za-z0-9._~-]+$/, "Custom code may only contain letters, digits and . _ ~ -")
  .refine((code) => !/^\.+$/.test(code), "Custom code cannot be only dots")
  .refine((code) => !RESERVED_CODES.has(code.toLowerCase()), "Custom code is reserved");

// =============================================================================
// Handler
// =============================================================================

function reject(c: Context<AppEnv>, message: string): Response {
  metrics.increment("upload_rejected");
  const body: ErrorResponse = { error: message };
  return c.json(body, 400);
}

async function releaseArtifact({ artifacts, logger }: AppDeps, target: string): Promise<void> {
  try {
    await artifacts.remove(target);
  } catch (err) {
    logger.warn({ err, target }, "ArtifactRemovalFailed");
  }
}

export async function handleUpload(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get("deps");
  const { store, artifacts, logger, ttlSeconds, codeLength, baseUrl } = deps;

  const form = UploadFormSchema.safeParse(await c.req.parseBody());
  if (!form.success) {
    return reject(c, form.error.issues[0]?.message ?? "Invalid form");
  }
  const { url, file, code: customCode } = form.data;

  if (url && file) return reject(c, UPLOAD_ERRORS.BOTH);
  if (!url && !file) return reject(c, UPLOAD_ERRORS.NEITHER);

  let targetUrl: string | undefined;
  if (url) {
    const parsed = TargetUrlSchema.safeParse(url);
    if (!parsed.success) {
      return reject(c, parsed.error.issues[0]?.message ?? "Invalid URL");
    }
    targetUrl = parsed.data;
  }

  let code: string;
  if (customCode) {
    const parsed = CustomCodeSchema.safeParse(customCode);
    if (!parsed.success) {
      return reject(c, parsed.error.issues[0]?.message ?? "Invalid custom code");
    }
    code = parsed.data;
  } else {
    code = await generateUniqueCode(async (candidate) => (await store.get(candidate)) !== null, codeLength);
  }

  let target: string;
  let savedFile = false;
  if (targetUrl) {
    target = targetUrl;
  } else if (file) {
    const saved = await artifacts.save(file.name, new Uint8Array(await file.arrayBuffer()));
    target = saved.target;
    savedFile = true;
  } else {
    return reject(c, UPLOAD_ERRORS.NEITHER);
  }

  let upsert: UpsertResult;
  try {
    upsert = await store.createOrReplace(code, target);
  } catch (err) {
    if (savedFile) await releaseArtifact(deps, target);
    throw err;
  }

  metrics.increment(savedFile ? "upload_file" : "upload_url");

  if (upsert.outcome === "replaced") {
    metrics.increment("upload_replaced");
    const previous = upsert.replacedTarget;
    if (previous !== null && previous !== target && artifacts.isArtifact(previous)) {
      await releaseArtifact(deps, previous);
    }
  }

  logger.info({ code, target, outcome: upsert.outcome }, "Entry created");

  const body: UploadResponse = {
    code,
    shortUrl: `${baseUrl}/${code}`,
    target,
    expiresIn: ttlSeconds,
  };
  return c.json(body, 201);
}
