/**
 * Retriever
 * Single buffered HTTP GET per resource, no retries
 */

import type { StatusPolicy } from "../types";
import { RetrievalError } from "./errors";

export interface RetrievedPayload {
  url: string;
  status: number;
  ok: boolean;
  contentType?: string;
  bytes: Buffer;
}

export interface Retriever {
  retrieve(url: string): Promise<RetrievedPayload>;
}

export interface RetrieverOptions {
  timeout?: number;
  userAgent?: string;
  statusPolicy?: StatusPolicy;
  fetchFn?: typeof fetch;
}

const DEFAULT_TIMEOUT = 30000;

export class HttpRetriever implements Retriever {
  private readonly timeout: number;
  private readonly userAgent?: string;
  private readonly statusPolicy: StatusPolicy;
  private readonly fetchFn: typeof fetch;

  constructor(options: RetrieverOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.userAgent = options.userAgent;
    this.statusPolicy = options.statusPolicy ?? "keep";
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async retrieve(url: string): Promise<RetrievedPayload> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const headers: Record<string, string> = {};
      if (this.userAgent) {
        headers["user-agent"] = this.userAgent;
      }

      const response = await this.fetchFn(url, {
        signal: controller.signal,
        headers,
      });

      if (!response.ok && this.statusPolicy === "fail") {
        await response.body?.cancel();
        throw new RetrievalError(
          `HTTP ${response.status}: ${response.statusText}`,
          url,
          "http-status",
          response.status,
        );
      }

      const bytes = Buffer.from(await response.arrayBuffer());
      return {
        url,
        status: response.status,
        ok: response.ok,
        contentType: response.headers.get("content-type") ?? undefined,
        bytes,
      };
    } catch (error) {
      if (error instanceof RetrievalError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new RetrievalError(
          `Timed out after ${this.timeout}ms`,
          url,
          "timeout",
          undefined,
          { cause: error },
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new RetrievalError(message, url, "network", undefined, {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
