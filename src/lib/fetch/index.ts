export type FetchErrorKind = "timeout" | "network" | "too_large" | "aborted";

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;

  constructor(kind: FetchErrorKind, url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FetchError";
    this.kind = kind;
    this.url = url;
  }
}

export interface FetchResponse {
  /** Final URL after redirects */
  url: string;
  status: number;
  ok: boolean;
  /** Header names lowercased */
  headers: Record<string, string>;
  body: Uint8Array;
}

export interface GetOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface FetchClient {
  get(url: string, options?: GetOptions): Promise<FetchResponse>;
}

export interface FetchClientOptions {
  userAgent: string;
  timeoutMs: number;
  maxBodyBytes?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Creates a GET-only HTTP client with a fixed user-agent and a per-request
 * timeout. Non-2xx responses are returned as-is; only timeouts, connection
 * failures and oversized bodies throw.
 */
export function createFetchClient(options: FetchClientOptions): FetchClient {
  const fetchImpl = options.fetchImpl ?? fetch;
  const maxBodyBytes = options.maxBodyBytes ?? Number.POSITIVE_INFINITY;

  async function get(url: string, getOptions: GetOptions = {}): Promise<FetchResponse> {
    if (getOptions.signal?.aborted) {
      throw new FetchError("aborted", url, `Request to ${url} was cancelled`);
    }
    const timeoutMs = getOptions.timeoutMs ?? options.timeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    const onAbort = () => controller.abort();
    getOptions.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetchImpl(url, {
        method: "GET",
        redirect: "follow",
        signal: controller.signal,
        headers: {
          "user-agent": options.userAgent,
          accept: "text/html,application/xhtml+xml,application/pdf;q=0.9,*/*;q=0.8",
        },
      });

      const declaredLength = Number(response.headers.get("content-length") ?? "0");
      if (declaredLength > maxBodyBytes) {
        throw new FetchError("too_large", url, `Response from ${url} exceeds ${maxBodyBytes} bytes`);
      }

      const body = new Uint8Array(await response.arrayBuffer());
      if (body.byteLength > maxBodyBytes) {
        throw new FetchError("too_large", url, `Response from ${url} exceeds ${maxBodyBytes} bytes`);
      }

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        url: response.url || url,
        status: response.status,
        ok: response.ok,
        headers,
        body,
      };
    } catch (err) {
      if (err instanceof FetchError) throw err;
      if (timedOut) {
        throw new FetchError("timeout", url, `Request to ${url} timed out after ${timeoutMs}ms`, {
          cause: err,
        });
      }
      if (getOptions.signal?.aborted) {
        throw new FetchError("aborted", url, `Request to ${url} was cancelled`, { cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new FetchError("network", url, `Request to ${url} failed: ${message}`, { cause: err });
    } finally {
      clearTimeout(timer);
      getOptions.signal?.removeEventListener("abort", onAbort);
    }
  }

  return { get };
}

/**
 * Decodes a response body as UTF-8 text.
 */
export function bodyText(response: FetchResponse): string {
  return new TextDecoder("utf-8").decode(response.body);
}
