/**
 * Tests for error mapping
 */

import { describe, it, expect } from "vitest";
import {
  AuthenticationError,
  BucketError,
  DownloadError,
  GcsError,
  HashMismatchError,
  NetworkError,
  ObjectError,
  ServerError,
  UploadError,
  isDataIntegrityError,
  parseGcsError,
  toGcsError,
} from "../index.js";

function body(message: string, reason?: string): string {
  return JSON.stringify({
    error: { code: 0, message, errors: reason ? [{ reason, message }] : undefined },
  });
}

describe("Errors", () => {
  describe("parseGcsError", () => {
    it("should use the JSON error message and keep the request details", () => {
      const error = parseGcsError(404, body("No such object: b/o", "notFound"), "req-1");

      expect(error).toBeInstanceOf(ObjectError);
      expect(error.message).toBe("No such object: b/o");
      expect(error.code).toBe("Object.NotFound");
      expect(error.requestId).toBe("req-1");
      expect(error.statusCode).toBe(404);
      expect(error.payload).toBe(body("No such object: b/o", "notFound"));
    });

    it("should tell bucket errors from object errors", () => {
      expect(parseGcsError(404, body("gone", "bucketNotFound"))).toBeInstanceOf(BucketError);
      expect(parseGcsError(403, body("denied"))).toBeInstanceOf(BucketError);
      expect(parseGcsError(403, body("denied", "forbidden")).code).toBe("Authentication.PermissionDenied");
    });

    it("should map protocol statuses", () => {
      expect(parseGcsError(400, "").code).toBe("InvalidArgument");
      expect(parseGcsError(401, "")).toBeInstanceOf(AuthenticationError);
      expect(parseGcsError(408, "")).toBeInstanceOf(NetworkError);
      expect(parseGcsError(412, "").code).toBe("Object.PreconditionFailed");
      expect(parseGcsError(413, "").code).toBe("Object.TooLarge");
      expect(parseGcsError(416, "")).toBeInstanceOf(DownloadError);
      expect(parseGcsError(429, "").code).toBe("Server.RateLimited");
      expect(parseGcsError(502, "").code).toBe("Server.InternalError");
      expect(parseGcsError(503, "").code).toBe("Server.ServiceUnavailable");
    });

    it("should mark expired sessions as not retryable", () => {
      const error = parseGcsError(410, "");
      expect(error).toBeInstanceOf(UploadError);
      expect(error.code).toBe("Upload.SessionExpired");
      expect(error.retryable).toBe(false);
    });

    it("should fall back to the status code and payload", () => {
      const error = parseGcsError(418, "teapot");
      expect(error.code).toBe("HTTP_418");
      expect(error.message).toBe("HTTP 418: teapot");
      expect(parseGcsError(418, "").message).toBe("HTTP 418");
    });

    it("should mark server errors retryable", () => {
      expect(parseGcsError(500, "").retryable).toBe(true);
      expect(parseGcsError(500, "")).toBeInstanceOf(ServerError);
    });
  });

  describe("error shape", () => {
    it("should carry only the request details", () => {
      const server = parseGcsError(429, "", "req-2");
      expect(server).not.toHaveProperty("retryAfter");
      expect(server.requestId).toBe("req-2");
      expect(server.statusCode).toBe(429);
      expect(server.retryable).toBe(true);

      const object = parseGcsError(404, body("No such object", "notFound"));
      expect(object).not.toHaveProperty("bucket");
      expect(object).not.toHaveProperty("object");
    });
  });

  describe("HashMismatchError", () => {
    it("should carry both digests", () => {
      const error = new HashMismatchError("Mismatched hashes in download", {
        computed: "yZRlqg==",
        received: "AAAAAA==",
      });

      expect(error.message).toBe("Mismatched hashes in download, computed=yZRlqg==, received=AAAAAA==");
      expect(error.code).toBe("DataIntegrity.HashMismatch");
      expect(error.retryable).toBe(false);
      expect(error.mismatches).toEqual([]);
      expect(error).toBeInstanceOf(GcsError);
      expect(isDataIntegrityError(error)).toBe(true);
      expect(isDataIntegrityError(new ServerError("boom", "InternalError"))).toBe(false);
    });
  });

  describe("toGcsError", () => {
    it("should keep GCS errors and wrap anything else", () => {
      const original = new NetworkError("reset", "ConnectionFailed");
      expect(toGcsError(original)).toBe(original);

      const wrapped = toGcsError(new Error("plain"));
      expect(wrapped.code).toBe("Unknown");
      expect(wrapped.message).toBe("plain");
      expect(toGcsError("text").message).toBe("text");
    });
  });
});
