/** Minimal HTTP seam so sources can be exercised with an in-process stand-in. */
export type HttpResponse = {
  status: number;
  json(): Promise<unknown>;
};

export type HttpGet = (url: string, signal?: AbortSignal) => Promise<HttpResponse>;

export class RequestTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly timeoutMs: number,
  ) {
    super(`No response from ${url} within ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

export const fetchGet: HttpGet = async (url, signal) => {
  const res = await fetch(url, { headers: { accept: "application/json" }, signal });
  return { status: res.status, json: () => res.json() };
};

/**
 * Bound every request made through `get`. The signal is handed to the
 * transport, and the returned promise rejects on expiry even when the
 * transport ignores it.
 */
export function withRequestTimeout(get: HttpGet, timeoutMs: number): HttpGet {
  return (url) => {
    const signal = AbortSignal.timeout(timeoutMs);
    return new Promise<HttpResponse>((resolve, reject) => {
      const onAbort = () => reject(new RequestTimeoutError(url, timeoutMs));
      signal.addEventListener("abort", onAbort, { once: true });
      get(url, signal).then(
        (res) => {
          signal.removeEventListener("abort", onAbort);
          resolve(res);
        },
        (err: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(err);
        },
      );
    });
  };
}

/** Fill `{name}` placeholders; every placeholder must have a value. */
export function expandUrl(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (_match, key: string) => {
    const value = values[key];
    if (value === undefined) {
      throw new Error(`URL template '${template}' has no value for {${key}}`);
    }
    // Branch names such as "integration/autoland" keep their path separator.
    return encodeURIComponent(value).replace(/%2F/gi, "/");
  });
}
