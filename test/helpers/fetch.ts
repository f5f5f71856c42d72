export type StubResponder = (url: URL, init: RequestInit | undefined) => Response | Promise<Response>;

export interface StubCall {
  url: URL;
  init: RequestInit | undefined;
}

export const jsonResponse = (body: unknown, init: { status?: number; headers?: Record<string, string> } = {}) =>
  new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { 'content-type': 'application/json', ...init.headers },
  });

export const createStubFetch = (responder: StubResponder) => {
  const calls: StubCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    calls.push({ url, init });
    return responder(url, init);
  };
  return { fetchImpl, calls };
};
