import { afterEach, describe, expect, it, vi } from "vitest";
import {
  AuthenticationFailedError,
  ContentFilteredError,
  InputTooLongError,
  OperationCancelledError,
  RateLimitedError,
  RequestTimeoutError,
  ServiceUnavailableError,
  UpstreamRequestError,
} from "../src/domain/errors.js";
import { mapHttpError, parseRetryAfter } from "../src/infra/ai/http.js";
import { OpenAiClient } from "../src/infra/ai/openAiClient.js";

type FetchStub = (input: string, init?: RequestInit) => Promise<Response>;

function createClient(overrides: { timeoutMs?: number; embeddingDimensions?: number | null } = {}) {
  return new OpenAiClient({
    apiKey: "test-key",
    baseUrl: "https://llm.test/v1",
    embeddingModel: "text-embedding-3-small",
    embeddingDimensions: overrides.embeddingDimensions ?? null,
    chatModel: "gpt-4o-mini",
    timeoutMs: overrides.timeoutMs ?? 1000,
  });
}

function stubFetch(impl: FetchStub) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}

const PROMPT = { system: "system text", user: "user text" };

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("OpenAiClient", () => {
  it("names the model with its dimensions", () => {
    expect(createClient().modelId).toBe("openai:text-embedding-3-small");
    expect(createClient({ embeddingDimensions: 256 }).modelId).toBe("openai:text-embedding-3-small@256");
  });

  it("returns embeddings in input order", async () => {
    const fetchMock = stubFetch(async () =>
      jsonResponse({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      }),
    );

    const vectors = await createClient({ embeddingDimensions: 2 }).embedTexts(["first", "second"]);

    expect(vectors).toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://llm.test/v1/embeddings");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "text-embedding-3-small",
      input: ["first", "second"],
      dimensions: 2,
    });
  });

  it("skips the request for an empty batch", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ data: [] }));

    expect(await createClient().embedTexts([])).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects a response with the wrong number of embeddings", async () => {
    stubFetch(async () => jsonResponse({ data: [{ index: 0, embedding: [1] }] }));

    await expect(createClient().embedTexts(["a", "b"])).rejects.toBeInstanceOf(ServiceUnavailableError);
  });

  it("maps rejected credentials to an authentication failure", async () => {
    stubFetch(async () => new Response("invalid key", { status: 401 }));

    await expect(createClient().embedTexts(["a"])).rejects.toBeInstanceOf(AuthenticationFailedError);
  });

  it("reads Retry-After from rate limit responses", async () => {
    stubFetch(async () => new Response("slow down", { status: 429, headers: { "Retry-After": "2" } }));

    const error = await createClient()
      .embedTexts(["a"])
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RateLimitedError);
    if (error instanceof RateLimitedError) {
      expect(error.retryAfterMs).toBe(2000);
      expect(error.transient).toBe(true);
    }
  });

  it("treats server errors as transient", async () => {
    stubFetch(async () => new Response("upstream down", { status: 503 }));

    await expect(createClient().embedTexts(["a"])).rejects.toThrow(
      "OpenAI embeddings is unavailable: HTTP 503 upstream down",
    );
  });

  it("maps an exhausted timeout to RequestTimeoutError", async () => {
    stubFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );

    await expect(createClient({ timeoutMs: 20 }).embedTexts(["a"])).rejects.toBeInstanceOf(
      RequestTimeoutError,
    );
  });

  it("maps caller cancellation to OperationCancelledError", async () => {
    stubFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const controller = new AbortController();

    const pending = createClient().embedTexts(["a"], { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it("returns the trimmed chat answer", async () => {
    const fetchMock = stubFetch(async () =>
      jsonResponse({ choices: [{ finish_reason: "stop", message: { content: " Diesel [1]. " } }] }),
    );

    expect(await createClient().generateGroundedAnswer(PROMPT)).toBe("Diesel [1].");
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://llm.test/v1/chat/completions");
    expect(JSON.parse(String(init?.body)).messages).toEqual([
      { role: "system", content: "system text" },
      { role: "user", content: "user text" },
    ]);
  });

  it("reports content-filtered completions", async () => {
    stubFetch(async () =>
      jsonResponse({ choices: [{ finish_reason: "content_filter", message: { content: null } }] }),
    );

    await expect(createClient().generateGroundedAnswer(PROMPT)).rejects.toBeInstanceOf(ContentFilteredError);
  });
});

describe("mapHttpError", () => {
  it.each([
    [403, "forbidden", AuthenticationFailedError],
    [408, "timeout", ServiceUnavailableError],
    [413, "payload too large", InputTooLongError],
    [400, "This model's maximum context length is 8192 tokens", InputTooLongError],
    [400, '{"error":{"code":"content_filter"}}', ContentFilteredError],
    [404, "model not found", UpstreamRequestError],
  ])("maps HTTP %i (%s)", (status, body, expected) => {
    expect(mapHttpError("LLM", status, body)).toBeInstanceOf(expected);
  });
});

describe("parseRetryAfter", () => {
  it("accepts seconds and ignores garbage", () => {
    expect(parseRetryAfter("1.5")).toBe(1500);
    expect(parseRetryAfter(null)).toBeNull();
    expect(parseRetryAfter("soon")).toBeNull();
  });
});
