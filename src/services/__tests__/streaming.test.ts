/**
 * Tests for the streaming service against the simulated storage server
 */

import { describe, it, expect, beforeEach } from "vitest";
import { StreamingService } from "../streaming.js";
import { configBuilder } from "../../config/index.js";
import { StaticTokenAuthProvider } from "../../credentials/index.js";
import {
  ConfigurationError,
  DownloadError,
  GcsError,
  HashMismatchError,
  ObjectError,
  ServerError,
  UsageError,
} from "../../error/index.js";
import { computeCrc32c, computeMd5 } from "../../hashing/index.js";
import { SIMULATED_ENDPOINT, SimulatedStorageTransport } from "../../simulation/index.js";
import { UPLOAD_CHUNK_QUANTUM } from "../../types/requests.js";

const Q = UPLOAD_CHUNK_QUANTUM;
const BUCKET = "test-bucket";

function pattern(size: number): Buffer {
  const data = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    data[i] = (i * 7 + 13) & 0xff;
  }
  return data;
}

async function* slices(data: Buffer, size: number): AsyncGenerator<Buffer> {
  for (let offset = 0; offset < data.length; offset += size) {
    yield data.subarray(offset, offset + size);
  }
}

describe("StreamingService", () => {
  let transport: SimulatedStorageTransport;
  let service: StreamingService;

  beforeEach(() => {
    transport = new SimulatedStorageTransport({ downloadChunkSize: 50000 });
    const config = configBuilder()
      .accessToken("test-token")
      .apiEndpoint(SIMULATED_ENDPOINT)
      .uploadBufferSize(Q)
      .build();
    service = new StreamingService(config, transport, new StaticTokenAuthProvider("test-token"));
  });

  describe("createResumableSession", () => {
    it("should POST the object resource and use the Location header", async () => {
      const session = await service.createResumableSession({
        bucket: BUCKET,
        name: "dir/file.bin",
        contentType: "application/x-test",
        metadata: { owner: "tests" },
        totalSize: 10,
      });

      expect(session.sessionId()).toBe(
        `${SIMULATED_ENDPOINT}/upload/storage/v1/b/test-bucket/o?uploadType=resumable&upload_id=session-1`
      );
      expect(session.nextExpectedByte()).toBe(0);

      const request = transport.requests[0];
      expect(request.method).toBe("POST");
      expect(request.url).toBe(
        `${SIMULATED_ENDPOINT}/upload/storage/v1/b/test-bucket/o?uploadType=resumable&name=dir%2Ffile.bin`
      );
      expect(request.headers).toEqual({
        Authorization: "Bearer test-token",
        "Content-Type": "application/json; charset=UTF-8",
        "X-Upload-Content-Type": "application/x-test",
        "X-Upload-Content-Length": "10",
      });
      expect(request.body).toBe(
        JSON.stringify({ name: "dir/file.bin", contentType: "application/x-test", metadata: { owner: "tests" } })
      );
    });

    it("should map a failed precondition", async () => {
      transport.putObject(BUCKET, "existing", "data");

      await expect(
        service.createResumableSession({ bucket: BUCKET, name: "existing", ifGenerationMatch: "0" })
      ).rejects.toMatchObject({ code: "Object.PreconditionFailed" });
    });
  });

  describe("upload and download", () => {
    it("should round-trip an object with matching digests", async () => {
      const data = pattern(2 * Q + 1000);

      const metadata = await service.uploadStream({ bucket: BUCKET, name: "round-trip.bin" }, slices(data, 70000));

      expect(metadata.size).toBe(data.length);
      expect(metadata.crc32c).toBe(computeCrc32c(data));
      expect(metadata.md5Hash).toBe(computeMd5(data));
      expect(transport.getObject(BUCKET, "round-trip.bin")?.equals(data)).toBe(true);

      const stream = await service.readObject({ bucket: BUCKET, object: "round-trip.bin" });
      const downloaded = await stream.readAll();
      expect(downloaded.equals(data)).toBe(true);
      expect(stream.hashResult?.isMismatch).toBe(false);
      expect(stream.hashResult?.received).toBe(`crc32c=${metadata.crc32c},md5=${metadata.md5Hash}`);
    });

    it("should send quantum-aligned chunks and a final chunk with the total", async () => {
      await service.uploadStream({ bucket: BUCKET, name: "chunks.bin" }, slices(pattern(Q + 5), 100000));

      const ranges = transport.requests
        .filter((request) => request.method === "PUT")
        .map((request) => request.headers["Content-Range"]);
      expect(ranges).toEqual(["bytes 0-262143/*", "bytes 262144-262148/262149"]);
    });

    it("should upload an empty object", async () => {
      const metadata = await service.uploadStream({ bucket: BUCKET, name: "empty.bin" }, slices(Buffer.alloc(0), 1));

      expect(metadata.size).toBe(0);
      expect(transport.requests[1].headers["Content-Range"]).toBe("bytes */0");
      expect((await service.downloadToBuffer({ bucket: BUCKET, object: "empty.bin" })).length).toBe(0);
    });

    it("should reject a download whose bytes do not match the stored digests", async () => {
      transport.putObject(BUCKET, "corrupt.txt", "hello world").corruptObject(BUCKET, "corrupt.txt");

      await expect(service.downloadToBuffer({ bucket: BUCKET, object: "corrupt.txt" })).rejects.toBeInstanceOf(
        HashMismatchError
      );
    });

    it("should skip validation when checksums are disabled", async () => {
      transport.putObject(BUCKET, "corrupt.txt", "hello world").corruptObject(BUCKET, "corrupt.txt");

      const data = await service.downloadToBuffer({
        bucket: BUCKET,
        object: "corrupt.txt",
        disableCrc32cChecksum: true,
        disableMd5Hash: true,
      });
      expect(data.length).toBe(11);
    });

    it("should stream a download", async () => {
      transport.putObject(BUCKET, "big.bin", pattern(120000));

      const sizes: number[] = [];
      for await (const chunk of service.downloadStream({ bucket: BUCKET, object: "big.bin" })) {
        sizes.push(chunk.length);
      }

      expect(sizes).toEqual([50000, 50000, 20000]);
    });

    it("should reject an upload when a supplied checksum does not match", async () => {
      const stream = await service.writeObject({
        bucket: BUCKET,
        name: "checked.txt",
        crc32cChecksumValue: "AAAAAA==",
      });
      await stream.write("hello world");

      const error = await stream.close().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(GcsError);
      expect(error).toMatchObject({ code: "InvalidArgument", statusCode: 400 });
      expect(transport.getObject(BUCKET, "checked.txt")).toBeUndefined();
    });
  });

  describe("ranged reads", () => {
    beforeEach(() => {
      transport.putObject(BUCKET, "hello.txt", "hello world");
    });

    it("should read a byte range", async () => {
      const data = await service.downloadToBuffer({
        bucket: BUCKET,
        object: "hello.txt",
        readRange: { begin: 2, end: 7 },
      });

      expect(data.toString()).toBe("llo w");
      const request = transport.requests[transport.requests.length - 1];
      expect(request.headers.Range).toBe("bytes=2-6");
    });

    it("should read from an offset", async () => {
      const data = await service.downloadToBuffer({ bucket: BUCKET, object: "hello.txt", readFromOffset: 6 });
      expect(data.toString()).toBe("world");
    });

    it("should turn an unsatisfiable range into an empty stream", async () => {
      const stream = await service.readObject({
        bucket: BUCKET,
        object: "hello.txt",
        readFromOffset: 100,
      });

      expect((await stream.readAll()).length).toBe(0);
      expect(stream.state).toBe("eof");
      expect(stream.status).toBeInstanceOf(DownloadError);
      expect(stream.status?.code).toBe("Download.RangeNotSatisfiable");
    });

    it("should reject an empty range without sending a request", async () => {
      const requestCount = transport.requests.length;

      await expect(
        service.readObject({ bucket: BUCKET, object: "hello.txt", readRange: { begin: 3, end: 3 } })
      ).rejects.toBeInstanceOf(ConfigurationError);
      expect(transport.requests).toHaveLength(requestCount);
    });

    it("should fail before a stream exists when the object is missing", async () => {
      await expect(service.readObject({ bucket: BUCKET, object: "missing.txt" })).rejects.toBeInstanceOf(
        ObjectError
      );
    });
  });

  describe("resumable sessions", () => {
    it("should resume a suspended upload from the committed offset", async () => {
      const data = pattern(2 * Q + 1000);

      const first = await service.writeObject({ bucket: BUCKET, name: "resumed.bin" });
      await first.write(data.subarray(0, 2 * Q + 10));
      const state = first.suspend();
      expect(state.nextExpectedByte).toBe(2 * Q);

      const second = await service.writeObject({
        bucket: BUCKET,
        name: "resumed.bin",
        resumableSessionUrl: state.sessionId,
      });
      expect(second.nextExpectedByte).toBe(2 * Q);
      expect(transport.requests[transport.requests.length - 1].headers["Content-Range"]).toBe("bytes */*");

      await second.write(data.subarray(second.nextExpectedByte));
      const response = await second.close();

      expect(response.metadata?.size).toBe(data.length);
      expect(transport.getObject(BUCKET, "resumed.bin")?.equals(data)).toBe(true);
      // The restored writer only saw the tail of the object.
      expect(second.hashResult?.computed).toBe("");
    });

    it("should follow a reissued session URL", async () => {
      const stream = await service.writeObject({ bucket: BUCKET, name: "moved.bin" });
      transport.reissueSessionUrlNext();

      await stream.write(pattern(Q));

      expect(stream.sessionId).toBe(
        `${SIMULATED_ENDPOINT}/upload/storage/v1/b/test-bucket/o?uploadType=resumable&upload_id=session-1-r`
      );
      await stream.close();
      expect(transport.getObject(BUCKET, "moved.bin")?.length).toBe(Q);
    });

    it("should keep every byte when the server commits part of a chunk", async () => {
      const data = pattern(Q + 10);
      const stream = await service.writeObject({
        bucket: BUCKET,
        name: "short.bin",
        disableCrc32cChecksum: true,
        disableMd5Hash: true,
      });
      transport.commitShortNext(1000);

      await stream.write(data);
      expect(transport.committedBytes(stream.sessionId)).toBe(Q - 1000);
      const response = await stream.close();

      expect(response.metadata?.size).toBe(Q + 10);
      expect(transport.getObject(BUCKET, "short.bin")?.equals(data)).toBe(true);
      const ranges = transport.requests
        .filter((request) => request.method === "PUT")
        .map((request) => request.headers["Content-Range"]);
      expect(ranges).toEqual(["bytes 0-262143/*", "bytes 261144-262153/262154"]);
    });

    it("should open a closed stream on a session that was already finalized", async () => {
      const first = await service.writeObject({ bucket: BUCKET, name: "done.txt" });
      await first.write("hello world");
      await first.close();

      const restored = await service.writeObject({
        bucket: BUCKET,
        name: "done.txt",
        resumableSessionUrl: first.sessionId,
      });
      const requestCount = transport.requests.length;

      expect(restored.state).toBe("closed");
      const response = await restored.close();
      expect(response.done).toBe(true);
      expect(response.metadata?.name).toBe("done.txt");
      expect(response.metadata?.size).toBe(11);
      expect(restored.hashResult?.isMismatch).toBe(false);
      expect(transport.requests).toHaveLength(requestCount);
      await expect(restored.write("more")).rejects.toBeInstanceOf(UsageError);
    });

    it("should leave the session resumable after a failed chunk", async () => {
      const data = pattern(Q + 3);
      const stream = await service.writeObject({ bucket: BUCKET, name: "retry.bin" });
      transport.failNext(1, 503);

      await expect(stream.write(data)).rejects.toBeInstanceOf(ServerError);
      expect(stream.state).toBe("failed");
      expect(transport.committedBytes(stream.sessionId)).toBe(0);

      const resumed = await service.writeObject({
        bucket: BUCKET,
        name: "retry.bin",
        resumableSessionUrl: stream.sessionId,
      });
      expect(resumed.nextExpectedByte).toBe(0);
      await resumed.write(data);
      await resumed.close();

      expect(transport.getObject(BUCKET, "retry.bin")?.equals(data)).toBe(true);
      expect(resumed.hashResult?.isMismatch).toBe(false);
    });
  });
});
