/**
 * Tests for configuration
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_CONFIG,
  configBuilder,
  encodeObjectName,
  resolveEndpoint,
  validateBucketName,
  validateObjectName,
} from "../index.js";
import { ConfigurationError } from "../../error/index.js";

describe("Configuration", () => {
  describe("GcsConfigBuilder", () => {
    it("should apply defaults", () => {
      const config = configBuilder().build();

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(config.uploadBufferSize).toBe(8 * 1024 * 1024);
      expect(config.downloadBufferSize).toBe(64 * 1024);
      expect(config.logLevel).toBe("off");
    });

    it("should round the upload buffer size up to the quantum", () => {
      expect(configBuilder().uploadBufferSize(1000).build().uploadBufferSize).toBe(262144);
      expect(configBuilder().uploadBufferSize(300000).build().uploadBufferSize).toBe(524288);
    });

    it("should merge checksum switches", () => {
      const config = configBuilder().checksums({ md5: false }).build();
      expect(config.checksums).toEqual({ crc32c: true, md5: false });
    });

    it("should reject invalid values", () => {
      expect(() => configBuilder().timeout(0).build()).toThrow(ConfigurationError);
      expect(() => configBuilder().downloadBufferSize(0).build()).toThrow(ConfigurationError);
      expect(() => configBuilder().apiEndpoint("not a url").build()).toThrow(ConfigurationError);
    });
  });

  describe("fromEnv", () => {
    it("should point at an emulator with anonymous credentials", () => {
      const config = configBuilder().fromEnv({ STORAGE_EMULATOR_HOST: "localhost:4443" }).build();

      expect(config.apiEndpoint).toBe("http://localhost:4443");
      expect(config.credentials).toEqual({ type: "anonymous" });
    });

    it("should read token, buffer size, and log level", () => {
      const config = configBuilder()
        .fromEnv({
          GOOGLE_OAUTH_ACCESS_TOKEN: "test-token",
          GCS_UPLOAD_BUFFER_SIZE: "300000",
          GCS_LOG_LEVEL: "debug",
        })
        .build();

      expect(config.credentials).toEqual({ type: "access_token", token: "test-token" });
      expect(config.uploadBufferSize).toBe(524288);
      expect(config.logLevel).toBe("debug");
    });

    it("should keep an explicit token against an emulator", () => {
      const config = configBuilder()
        .fromEnv({ GOOGLE_OAUTH_ACCESS_TOKEN: "test-token", STORAGE_EMULATOR_HOST: "https://emulator.test" })
        .build();

      expect(config.apiEndpoint).toBe("https://emulator.test");
      expect(config.credentials).toEqual({ type: "access_token", token: "test-token" });
    });

    it("should reject malformed variables", () => {
      expect(() => configBuilder().fromEnv({ GCS_UPLOAD_BUFFER_SIZE: "abc" })).toThrow(ConfigurationError);
      expect(() => configBuilder().fromEnv({ GCS_LOG_LEVEL: "loud" })).toThrow(ConfigurationError);
    });
  });

  describe("resolveEndpoint", () => {
    it("should default to the public endpoint", () => {
      expect(resolveEndpoint({})).toBe("https://storage.googleapis.com");
    });

    it("should strip trailing slashes", () => {
      expect(resolveEndpoint({ apiEndpoint: "http://localhost:4443/" })).toBe("http://localhost:4443");
    });
  });

  describe("name validation", () => {
    it("should accept valid bucket names", () => {
      expect(() => validateBucketName("test-bucket")).not.toThrow();
      expect(() => validateBucketName("my.bucket_01")).not.toThrow();
    });

    it("should reject invalid bucket names", () => {
      expect(() => validateBucketName("ab")).toThrow(ConfigurationError);
      expect(() => validateBucketName("My_Bucket")).toThrow(ConfigurationError);
      expect(() => validateBucketName("-bucket")).toThrow(ConfigurationError);
      expect(() => validateBucketName("a..b")).toThrow(ConfigurationError);
      expect(() => validateBucketName("192.168.1.1")).toThrow(ConfigurationError);
    });

    it("should reject invalid object names", () => {
      expect(() => validateObjectName("")).toThrow(ConfigurationError);
      expect(() => validateObjectName("a\nb")).toThrow(ConfigurationError);
      expect(() => validateObjectName("x".repeat(1025))).toThrow(ConfigurationError);
      expect(() => validateObjectName("dir/file.txt")).not.toThrow();
    });

    it("should encode object names as a single path segment", () => {
      expect(encodeObjectName("dir/my file.txt")).toBe("dir%2Fmy%20file.txt");
    });
  });
});
