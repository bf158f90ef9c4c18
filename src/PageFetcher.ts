import axios, { isAxiosError } from "axios";
import type { IPageFetcher, PageFetchResult } from "./IPageFetcher.js";
import { COMMON_HEADERS, DEFAULT_HTTP_TIMEOUT, MAX_REDIRECTS } from "./constants.js";
import { TransportError, toError } from "./errors.js";

/**
 * Raised for a response whose status is outside the 2xx range.
 */
export class HttpStatusError extends TransportError {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message, "ERR_HTTP_ERROR", undefined, statusCode);
    this.name = "HttpStatusError";
  }
}

/**
 * Configuration options for the PageFetcher.
 */
export interface PageFetcherOptions {
  /** Request timeout in milliseconds. Default: 30000 */
  timeout?: number;
  /** Headers merged over the browser-like defaults. */
  headers?: Record<string, string>;
  /** Maximum number of redirects to follow. Default: 5 */
  maxRedirects?: number;
}

/**
 * PageFetcher - Fetches a page with a single HTTP GET.
 *
 * Sends a realistic browser header set so simple bot filters let the request
 * through. There is no retry: a timeout or transport error is terminal.
 */
export class PageFetcher implements IPageFetcher {
  private readonly options: Required<PageFetcherOptions>;

  private static readonly DEFAULT_OPTIONS: Required<PageFetcherOptions> = {
    timeout: DEFAULT_HTTP_TIMEOUT,
    headers: {},
    maxRedirects: MAX_REDIRECTS,
  };

  constructor(options: PageFetcherOptions = {}) {
    this.options = { ...PageFetcher.DEFAULT_OPTIONS, ...options };
  }

  /**
   * @throws {HttpStatusError} If the response status is not 2xx.
   * @throws {TransportError} On timeout (`ERR_TIMEOUT`) or any other network failure.
   */
  async fetchPage(url: string): Promise<PageFetchResult> {
    try {
      const response = await axios.get<string>(url, {
        headers: { ...COMMON_HEADERS, ...this.options.headers },
        maxRedirects: this.options.maxRedirects,
        timeout: this.options.timeout,
        responseType: "text",
        decompress: true,
      });

      const contentType = response.headers["content-type"];
      const finalUrl: unknown = response.request?.res?.responseUrl;

      return {
        content: String(response.data ?? ""),
        url: typeof finalUrl === "string" && finalUrl ? finalUrl : url,
        statusCode: response.status,
        contentType: typeof contentType === "string" ? contentType : null,
      };
    } catch (error: unknown) {
      throw toTransportError(error, url, this.options.timeout);
    }
  }
}

function toTransportError(error: unknown, url: string, timeout: number): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  if (isAxiosError(error)) {
    if (error.response) {
      return new HttpStatusError(`HTTP error! status: ${error.response.status}`, error.response.status);
    }
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return new TransportError(`Request to ${url} timed out after ${timeout}ms`, "ERR_TIMEOUT", error);
    }
  }

  const cause = toError(error);
  return new TransportError(`Fetch failed: ${cause.message}`, "ERR_FETCH_FAILED", cause);
}
