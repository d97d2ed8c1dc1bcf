/**
 * Tests for the HTTP resumable upload session
 */

import { describe, it, expect, vi } from "vitest";
import { HttpResumableUploadSession } from "../http-resumable-upload-session.js";
import { StaticTokenAuthProvider } from "../../credentials/index.js";
import { ServerError, UsageError } from "../../error/index.js";
import type { HttpRequest, HttpResponse, HttpTransport } from "../../transport/index.js";
import { UPLOAD_CHUNK_QUANTUM } from "../../types/requests.js";

const SESSION = "https://storage.test/upload/storage/v1/b/test-bucket/o?uploadType=resumable&upload_id=session-1";

function scriptedTransport(...responses: HttpResponse[]) {
  const send = vi.fn(async (_request: HttpRequest): Promise<HttpResponse> => {
    const next = responses.shift();
    if (!next) {
      throw new Error("unexpected request");
    }
    return next;
  });
  const transport: HttpTransport = {
    send,
    sendStreaming: vi.fn(),
  };
  return { transport, send };
}

function incomplete(lastByte?: number, location?: string): HttpResponse {
  const headers: Record<string, string> = {};
  if (lastByte !== undefined) {
    headers.range = `bytes=0-${lastByte}`;
  }
  if (location) {
    headers.location = location;
  }
  return { status: 308, headers, body: Buffer.alloc(0) };
}

function createSession(transport: HttpTransport, nextExpectedByte?: number) {
  return new HttpResumableUploadSession({
    transport,
    authProvider: new StaticTokenAuthProvider("test-token"),
    sessionUrl: SESSION,
    nextExpectedByte,
  });
}

describe("HttpResumableUploadSession", () => {
  it("should PUT a chunk with an open-ended Content-Range", async () => {
    const { transport, send } = scriptedTransport(incomplete(UPLOAD_CHUNK_QUANTUM - 1));
    const session = createSession(transport);

    const response = await session.uploadChunk(Buffer.alloc(UPLOAD_CHUNK_QUANTUM, 1));

    expect(response.lastCommittedByte).toBe(262143);
    expect(session.nextExpectedByte()).toBe(262144);
    const request = send.mock.calls[0][0];
    expect(request.method).toBe("PUT");
    expect(request.url).toBe(SESSION);
    expect(request.headers).toEqual({
      Authorization: "Bearer test-token",
      "Content-Length": "262144",
      "Content-Range": "bytes 0-262143/*",
    });
  });

  it("should continue from the committed offset", async () => {
    const { transport, send } = scriptedTransport(incomplete(2 * UPLOAD_CHUNK_QUANTUM - 1));
    const session = createSession(transport, UPLOAD_CHUNK_QUANTUM);

    await session.uploadChunk(Buffer.alloc(UPLOAD_CHUNK_QUANTUM));

    expect(send.mock.calls[0][0].headers["Content-Range"]).toBe("bytes 262144-524287/*");
    expect(session.nextExpectedByte()).toBe(524288);
  });

  it("should reject unaligned chunks without sending them", async () => {
    const { transport, send } = scriptedTransport();
    const session = createSession(transport);

    await expect(session.uploadChunk(Buffer.alloc(100))).rejects.toBeInstanceOf(UsageError);
    await expect(session.uploadChunk(Buffer.alloc(0))).rejects.toBeInstanceOf(UsageError);
    expect(send).not.toHaveBeenCalled();
  });

  it("should finalize with the total size", async () => {
    const payload = JSON.stringify({ name: "obj", bucket: "test-bucket", size: "262154" });
    const { transport, send } = scriptedTransport({ status: 200, headers: {}, body: Buffer.from(payload) });
    const session = createSession(transport, UPLOAD_CHUNK_QUANTUM);

    const response = await session.uploadFinalChunk(Buffer.alloc(10), 262154);

    expect(send.mock.calls[0][0].headers["Content-Range"]).toBe("bytes 262144-262153/262154");
    expect(response.done).toBe(true);
    expect(response.metadata?.size).toBe(262154);
    expect(session.isDone()).toBe(true);
    await expect(session.uploadFinalChunk(Buffer.alloc(0), 0)).rejects.toBeInstanceOf(UsageError);
  });

  it("should send an empty final chunk", async () => {
    const { transport, send } = scriptedTransport({ status: 201, headers: {}, body: Buffer.alloc(0) });
    const session = createSession(transport, UPLOAD_CHUNK_QUANTUM);

    await session.uploadFinalChunk(Buffer.alloc(0), UPLOAD_CHUNK_QUANTUM);

    expect(send.mock.calls[0][0].headers["Content-Range"]).toBe("bytes */262144");
    expect(send.mock.calls[0][0].headers["Content-Length"]).toBe("0");
  });

  it("should query the commit point on reset", async () => {
    const { transport, send } = scriptedTransport(incomplete(UPLOAD_CHUNK_QUANTUM - 1, `${SESSION}-r`));
    const session = createSession(transport);

    await session.resetSession();

    expect(send.mock.calls[0][0].headers["Content-Range"]).toBe("bytes */*");
    expect(session.nextExpectedByte()).toBe(262144);
    expect(session.sessionId()).toBe(`${SESSION}-r`);
  });

  it("should read a missing Range header as nothing committed", async () => {
    const { transport } = scriptedTransport(incomplete());
    const session = createSession(transport, UPLOAD_CHUNK_QUANTUM);

    await session.resetSession();

    expect(session.nextExpectedByte()).toBe(0);
  });

  it("should leave its state unchanged on failure", async () => {
    const { transport } = scriptedTransport({ status: 503, headers: {}, body: Buffer.alloc(0) });
    const session = createSession(transport, UPLOAD_CHUNK_QUANTUM);

    await expect(session.uploadChunk(Buffer.alloc(UPLOAD_CHUNK_QUANTUM))).rejects.toBeInstanceOf(ServerError);
    expect(session.nextExpectedByte()).toBe(262144);
    expect(session.sessionId()).toBe(SESSION);
    expect(session.isDone()).toBe(false);
  });

  it("should advance monotonically across successful chunks", async () => {
    const { transport } = scriptedTransport(
      incomplete(UPLOAD_CHUNK_QUANTUM - 1),
      incomplete(2 * UPLOAD_CHUNK_QUANTUM - 1),
      incomplete(3 * UPLOAD_CHUNK_QUANTUM - 1)
    );
    const session = createSession(transport);

    const offsets: number[] = [];
    for (let i = 0; i < 3; i++) {
      await session.uploadChunk(Buffer.alloc(UPLOAD_CHUNK_QUANTUM));
      offsets.push(session.nextExpectedByte());
    }

    expect(offsets).toEqual([262144, 524288, 786432]);
  });
});
