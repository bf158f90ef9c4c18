/**
 * Result of fetching a documentation page.
 */
export interface PageFetchResult {
  /** Decoded markup of the page. */
  content: string;
  /** The final URL after any redirects. */
  url: string;
  /** The HTTP status code of the final response. */
  statusCode: number;
  /** The MIME type as returned by the server, if any. */
  contentType: string | null;
}

/**
 * Anything that can turn a URL into page markup in a single attempt.
 */
export interface IPageFetcher {
  /**
   * Fetches the page at `url`.
   * @throws {TransportError} On network failure, timeout or a non-success status.
   */
  fetchPage(url: string): Promise<PageFetchResult>;
}
