/**
 * Common types for GCS operations.
 */

import { z } from "zod";

/**
 * GCS storage class enumeration.
 */
export enum StorageClass {
  Standard = "STANDARD",
  Nearline = "NEARLINE",
  Coldline = "COLDLINE",
  Archive = "ARCHIVE",
  MultiRegional = "MULTI_REGIONAL",
  Regional = "REGIONAL",
  DurableReducedAvailability = "DURABLE_REDUCED_AVAILABILITY",
}

/**
 * Predefined ACL options.
 */
export enum PredefinedAcl {
  AuthenticatedRead = "authenticatedRead",
  BucketOwnerFullControl = "bucketOwnerFullControl",
  BucketOwnerRead = "bucketOwnerRead",
  Private = "private",
  ProjectPrivate = "projectPrivate",
  PublicRead = "publicRead",
}

/**
 * Object metadata from GCS. Only the fields the streams rely on are modeled.
 */
export interface ObjectMetadata {
  /** Object name (path). */
  name: string;
  /** Bucket name. */
  bucket: string;
  /** Generation (version). */
  generation: string;
  /** Metageneration (metadata version). */
  metageneration: string;
  /** Content type (MIME). */
  contentType: string;
  /** Size in bytes. */
  size: number;
  /** MD5 hash (base64). */
  md5Hash?: string;
  /** CRC32c checksum (base64). */
  crc32c?: string;
  /** ETag. */
  etag: string;
  /** Creation time. */
  timeCreated?: Date;
  /** Last update time. */
  updated?: Date;
  /** Storage class. */
  storageClass: StorageClass;
  /** Custom metadata (x-goog-meta-*). */
  metadata: Record<string, string>;
  /** Media link (download URL). */
  mediaLink?: string;
}

/**
 * Parse storage class from string.
 */
export function parseStorageClass(value: string): StorageClass {
  const normalized = value.toUpperCase().replace(/-/g, "_");
  for (const storageClass of Object.values(StorageClass)) {
    if (storageClass === normalized) {
      return storageClass;
    }
  }
  return StorageClass.Standard;
}

/**
 * Parse date from ISO string.
 */
export function parseDate(value: string | undefined): Date | undefined {
  return value ? new Date(value) : undefined;
}

// GCS encodes 64-bit integers as JSON strings.
const int64 = z.union([z.string(), z.number()]).transform((value) => String(value));

const objectMetadataSchema = z
  .object({
    name: z.string(),
    bucket: z.string(),
    generation: int64.optional(),
    metageneration: int64.optional(),
    contentType: z.string().optional(),
    size: int64.optional(),
    md5Hash: z.string().optional(),
    crc32c: z.string().optional(),
    etag: z.string().optional(),
    timeCreated: z.string().optional(),
    updated: z.string().optional(),
    storageClass: z.string().optional(),
    metadata: z.record(z.string()).optional(),
    mediaLink: z.string().optional(),
  })
  .passthrough();

/**
 * Check whether a JSON payload looks like an object resource.
 */
export function isObjectMetadataJson(json: unknown): boolean {
  return objectMetadataSchema.safeParse(json).success;
}

/**
 * Parse object metadata from GCS JSON response.
 *
 * @throws {z.ZodError} when required fields are missing.
 */
export function parseObjectMetadata(json: unknown): ObjectMetadata {
  const parsed = objectMetadataSchema.parse(json);
  return {
    name: parsed.name,
    bucket: parsed.bucket,
    generation: parsed.generation ?? "",
    metageneration: parsed.metageneration ?? "",
    contentType: parsed.contentType ?? "application/octet-stream",
    size: parsed.size ? parseInt(parsed.size, 10) : 0,
    md5Hash: parsed.md5Hash,
    crc32c: parsed.crc32c,
    etag: parsed.etag ?? "",
    timeCreated: parseDate(parsed.timeCreated),
    updated: parseDate(parsed.updated),
    storageClass: parseStorageClass(parsed.storageClass ?? "STANDARD"),
    metadata: parsed.metadata ?? {},
    mediaLink: parsed.mediaLink,
  };
}
