import type { Logger } from "./logger";

export type FakeFetch = {
  fetch: typeof fetch;
  calls: URL[];
};

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json; charset=utf-8", ...headers },
  });
}

export const notFound = () => jsonResponse({ message: "Not Found" }, 404);

export const encodeBase64 = (text: string) => Buffer.from(text, "utf8").toString("base64");

/**
 * In-process stand-in for api.github.com. Unhandled URLs answer 404.
 */
export function createFakeFetch(handler: (url: URL) => Response | undefined): FakeFetch {
  const calls: URL[] = [];
  const fakeFetch = async (input: string | URL | Request): Promise<Response> => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    calls.push(url);
    return handler(url) ?? notFound();
  };
  return { fetch: fakeFetch, calls };
}

export type RecordingLogger = Logger & { lines: string[] };

/**
 * Logger that keeps `level: message` lines in memory
 */
export function createRecordingLogger(name = "test", lines: string[] = []): RecordingLogger {
  return {
    name,
    lines,
    debug: (message) => lines.push(`debug: ${message}`),
    info: (message) => lines.push(`info: ${message}`),
    warn: (message) => lines.push(`warning: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
    child: (childName) => createRecordingLogger(childName, lines),
    close: () => Promise.resolve(),
  };
}

export const noSleep = () => Promise.resolve();
