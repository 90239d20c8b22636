import { describe, it, expect, vi } from "vitest";
import { RetrievalError } from "./errors";
import { HttpRetriever } from "./retriever";

const URL = "https://example.org/img/p0001.jpg";

describe("HttpRetriever", () => {
  it("buffers the response body", async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(
      new Response(new Uint8Array([1, 2, 3]), {
        status: 200,
        headers: { "content-type": "image/jpeg" },
      }),
    );
    const retriever = new HttpRetriever({ fetchFn, userAgent: "test-agent" });

    const payload = await retriever.retrieve(URL);

    expect(payload).toEqual({
      url: URL,
      status: 200,
      ok: true,
      contentType: "image/jpeg",
      bytes: Buffer.from([1, 2, 3]),
    });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn).toHaveBeenCalledWith(
      URL,
      expect.objectContaining({ headers: { "user-agent": "test-agent" } }),
    );
  });

  it("keeps non-2xx bodies under the keep policy", async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response("not found", { status: 404 }));
    const retriever = new HttpRetriever({ fetchFn });

    const payload = await retriever.retrieve(URL);

    expect(payload.ok).toBe(false);
    expect(payload.status).toBe(404);
    expect(payload.bytes.toString("utf-8")).toBe("not found");
  });

  it("rejects non-2xx responses under the fail policy", async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response("gone", { status: 410, statusText: "Gone" }));
    const retriever = new HttpRetriever({ fetchFn, statusPolicy: "fail" });

    const error = await retriever.retrieve(URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error).toMatchObject({
      url: URL,
      reason: "http-status",
      status: 410,
      message: "HTTP 410: Gone",
    });
  });

  it("releases the unread body of a rejected response", async () => {
    const response = new Response("gone", { status: 410, statusText: "Gone" });
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(response);
    const retriever = new HttpRetriever({ fetchFn, statusPolicy: "fail" });

    await expect(retriever.retrieve(URL)).rejects.toBeInstanceOf(RetrievalError);
    expect(response.bodyUsed).toBe(true);
  });

  it("wraps network failures with the failing URL", async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockRejectedValue(new TypeError("fetch failed"));
    const retriever = new HttpRetriever({ fetchFn });

    const error = await retriever.retrieve(URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error).toMatchObject({
      url: URL,
      reason: "network",
      message: "fetch failed",
    });
  });

  it("aborts slow requests after the timeout", async () => {
    const fetchFn = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () =>
            reject(new Error("This operation was aborted")),
          );
        }),
    );
    const retriever = new HttpRetriever({ fetchFn, timeout: 10 });

    const error = await retriever.retrieve(URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error).toMatchObject({
      url: URL,
      reason: "timeout",
      message: "Timed out after 10ms",
    });
  });
});
