import type { FetchClient, FetchResponse } from "./index";

export type StubRoute =
  | Error
  | {
      status?: number;
      body: string | Uint8Array;
      contentType?: string;
      /** Final URL when the stub should pretend to redirect */
      redirectTo?: string;
    };

/**
 * In-process fetch client answering from a fixed route table. Unknown URLs
 * get an empty 404; an Error route is thrown. Every requested URL is recorded.
 */
export function createStubFetchClient(
  routes: Record<string, StubRoute>
): FetchClient & { requests: string[] } {
  const requests: string[] = [];

  return {
    requests,
    async get(url): Promise<FetchResponse> {
      requests.push(url);
      const route = routes[url];
      if (route instanceof Error) {
        throw route;
      }
      if (!route) {
        return { url, status: 404, ok: false, headers: {}, body: new Uint8Array() };
      }

      const status = route.status ?? 200;
      const body = typeof route.body === "string" ? new TextEncoder().encode(route.body) : route.body;
      return {
        url: route.redirectTo ?? url,
        status,
        ok: status >= 200 && status < 300,
        headers: { "content-type": route.contentType ?? "text/html; charset=utf-8" },
        body,
      };
    },
  };
}
