export interface RecordedRequest {
  url: string;
  authorization: string | null;
}

/**
 * Stand-in for the global fetch that answers from a handler and records each request
 */
export function fakeFetch(handler: (url: string) => Response) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = String(input);
    requests.push({ url, authorization: new Headers(init?.headers).get("authorization") });
    return handler(url);
  };
  return { fetchImpl, requests };
}

export function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export const noDelayPolicy = {
  retries: 2,
  baseDelayMs: 10,
  timeoutMs: 1000,
  sleep: async () => {},
};
