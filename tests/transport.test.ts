import { afterEach, describe, expect, it, vi } from "vitest";
import {
  addQueryParams,
  buildCollectionUrl,
  buildDocumentsUrl,
  buildDocumentUrl,
  buildRunQueryUrl,
  FetchTransport,
  getHeader,
  isSuccess,
  mapFetchError,
  withAuthorization,
} from "../src/transport/index.js";
import type { EndpointConfig } from "../src/transport/index.js";
import { CancelledError, NetworkError } from "../src/error/index.js";
import { DOCUMENTS_URL } from "./helpers.js";

const endpoint: EndpointConfig = { projectId: "test-project", databaseId: "(default)" };

function systemError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

function hangingFetch() {
  return vi.fn(
    (_input: string | URL | Request, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
        });
      })
  );
}

describe("URL builders", () => {
  it("builds the production documents root", () => {
    expect(buildDocumentsUrl(endpoint)).toBe(DOCUMENTS_URL);
  });

  it("builds the emulator documents root over plain HTTP", () => {
    expect(buildDocumentsUrl({ ...endpoint, emulatorHost: "localhost:8080" })).toBe(
      "http://localhost:8080/v1/projects/test-project/databases/(default)/documents"
    );
  });

  it("encodes collection segments and document IDs", () => {
    expect(buildCollectionUrl(endpoint, "families/f 1/members")).toBe(
      `${DOCUMENTS_URL}/families/f%201/members`
    );
    expect(buildDocumentUrl(endpoint, "users", "a b")).toBe(`${DOCUMENTS_URL}/users/a%20b`);
  });

  it("queries top-level collections from the documents root", () => {
    expect(buildRunQueryUrl(endpoint, "users")).toBe(`${DOCUMENTS_URL}:runQuery`);
  });

  it("queries subcollections from their parent document", () => {
    expect(buildRunQueryUrl(endpoint, "families/f1/members")).toBe(`${DOCUMENTS_URL}/families/f1:runQuery`);
  });

  it("adds query parameters, skipping undefined ones", () => {
    expect(addQueryParams(`${DOCUMENTS_URL}/users`, { documentId: "u1", mask: undefined })).toBe(
      `${DOCUMENTS_URL}/users?documentId=u1`
    );
  });
});

describe("helpers", () => {
  it("classifies 2xx statuses as success", () => {
    expect(isSuccess(200)).toBe(true);
    expect(isSuccess(204)).toBe(true);
    expect(isSuccess(299)).toBe(true);
    expect(isSuccess(199)).toBe(false);
    expect(isSuccess(300)).toBe(false);
  });

  it("reads headers case-insensitively", () => {
    const response = { status: 200, headers: { "content-type": "application/json" }, body: "" };
    expect(getHeader(response, "Content-Type")).toBe("application/json");
    expect(getHeader(response, "ETag")).toBeUndefined();
  });

  it("adds a bearer authorization header", () => {
    const request = withAuthorization({ method: "GET", url: "https://x.test", headers: { Accept: "*/*" } }, "test-token");
    expect(request.headers).toEqual({ Accept: "*/*", Authorization: "Bearer test-token" });
  });
});

describe("mapFetchError", () => {
  it("detects DNS failures through the cause chain", () => {
    const error = mapFetchError(
      new TypeError("fetch failed", { cause: systemError("getaddrinfo ENOTFOUND db.invalid", "ENOTFOUND") })
    );
    expect(error.kind).toBe("DnsResolutionFailed");
  });

  it("detects refused connections", () => {
    const error = mapFetchError(
      new TypeError("fetch failed", { cause: systemError("connect ECONNREFUSED 127.0.0.1:8080", "ECONNREFUSED") })
    );
    expect(error.kind).toBe("ConnectionFailed");
    expect(error.message).toBe(
      "Connection failed: fetch failed: connect ECONNREFUSED 127.0.0.1:8080: ECONNREFUSED"
    );
  });

  it("detects TLS failures", () => {
    const error = mapFetchError(
      new TypeError("fetch failed", { cause: systemError("certificate has expired", "CERT_HAS_EXPIRED") })
    );
    expect(error.kind).toBe("TlsError");
  });

  it("falls back to a connection failure", () => {
    const error = mapFetchError(new TypeError("fetch failed"));
    expect(error.kind).toBe("ConnectionFailed");
    expect(error.message).toBe("fetch failed");
  });
});

describe("FetchTransport", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends the request and collects the response", async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response('{"ok":true}', { status: 200, headers: { "Content-Type": "application/json" } })
    );
    vi.stubGlobal("fetch", fetchMock);

    const response = await new FetchTransport().send({
      method: "POST",
      url: `${DOCUMENTS_URL}/users`,
      headers: { "Content-Type": "application/json" },
      body: '{"fields":{}}',
    });

    expect(response.status).toBe(200);
    expect(response.body).toBe('{"ok":true}');
    expect(response.headers["content-type"]).toBe("application/json");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe(`${DOCUMENTS_URL}/users`);
    expect(call?.[1]?.method).toBe("POST");
    expect(call?.[1]?.body).toBe('{"fields":{}}');
  });

  it("returns non-2xx responses without throwing", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("missing", { status: 404 }))
    );

    const response = await new FetchTransport().send({ method: "GET", url: DOCUMENTS_URL, headers: {} });
    expect(response.status).toBe(404);
    expect(response.body).toBe("missing");
  });

  it("times out with a NetworkError", async () => {
    vi.stubGlobal("fetch", hangingFetch());

    const promise = new FetchTransport(10).send({ method: "GET", url: DOCUMENTS_URL, headers: {} });
    await expect(promise).rejects.toThrow(new NetworkError("Request timeout after 10ms", "Timeout"));
  });

  it("prefers the per-request timeout", async () => {
    vi.stubGlobal("fetch", hangingFetch());

    const promise = new FetchTransport(60000).send({ method: "GET", url: DOCUMENTS_URL, headers: {}, timeout: 5 });
    await expect(promise).rejects.toThrow("Request timeout after 5ms");
  });

  it("cancels when the caller aborts", async () => {
    vi.stubGlobal("fetch", hangingFetch());
    const controller = new AbortController();

    const promise = new FetchTransport().send({
      method: "GET",
      url: DOCUMENTS_URL,
      headers: {},
      signal: controller.signal,
    });
    controller.abort();

    await expect(promise).rejects.toBeInstanceOf(CancelledError);
  });

  it("does not send when the signal is already aborted", async () => {
    const fetchMock = vi.fn(async () => new Response("{}"));
    vi.stubGlobal("fetch", fetchMock);
    const controller = new AbortController();
    controller.abort();

    await expect(
      new FetchTransport().send({ method: "GET", url: DOCUMENTS_URL, headers: {}, signal: controller.signal })
    ).rejects.toThrow(new CancelledError("Request cancelled before it was sent"));
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("maps fetch failures to NetworkError", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed", { cause: systemError("getaddrinfo EAI_AGAIN db.invalid", "EAI_AGAIN") });
      })
    );

    const promise = new FetchTransport().send({ method: "GET", url: DOCUMENTS_URL, headers: {} });
    await expect(promise).rejects.toBeInstanceOf(NetworkError);
    await expect(promise).rejects.toMatchObject({ kind: "DnsResolutionFailed" });
  });
});
