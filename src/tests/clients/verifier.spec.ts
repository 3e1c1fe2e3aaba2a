import axios, { AxiosError } from "axios";
import { describe, expect, it } from "vitest";
import { VerifierClient } from "../../clients/verifier";
import { OrchestrationCancelledError } from "../../utils";
import { jsonResponse, recordingAdapter } from "../fixtures";

const INPUT = { image: Buffer.from([0x89, 0x50, 0x4e, 0x47]), filename: "face.png", requestId: "req-42" };

function clientFor(respond: Parameters<typeof recordingAdapter>[0]) {
  const stub = recordingAdapter(respond);
  const client = new VerifierClient({ baseUrl: "http://verifier.test/", http: axios.create({ adapter: stub.adapter }) });
  return { client, requests: stub.requests };
}

describe("VerifierClient", () => {
  it("posts the image as a multipart file and parses the confidence", async () => {
    const { client, requests } = clientFor(async (config) =>
      jsonResponse(config, { verified: true, confidence: 0.91, person_id: "p-7" })
    );

    const result = await client.call(INPUT, { timeoutMs: 1_000 });

    expect(result.status).toBe("success");
    expect(result.status === "success" ? result.payload : null).toEqual({ score: 0.91, verified: true, personId: "p-7" });
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe("http://verifier.test/verify");
    expect(requests[0].method).toBe("post");
    expect(requests[0].headers.get("X-Request-Id")).toBe("req-42");

    const form = requests[0].data;
    expect(form).toBeInstanceOf(FormData);
    const file = form instanceof FormData ? form.get("file") : null;
    expect(typeof file === "string" || file === null ? null : { name: file.name, type: file.type }).toEqual({
      name: "face.png",
      type: "image/png"
    });
  });

  it("accepts the score alias", async () => {
    const { client } = clientFor(async (config) => jsonResponse(config, { score: 0.6 }));

    const result = await client.call(INPUT, { timeoutMs: 1_000 });

    expect(result).toMatchObject({ status: "success", payload: { score: 0.6, verified: null, personId: null } });
  });

  it("parses a JSON string body", async () => {
    const { client } = clientFor(async (config) => jsonResponse(config, '{"confidence":0.8,"verified":false}'));

    const result = await client.call(INPUT, { timeoutMs: 1_000 });

    expect(result).toMatchObject({ status: "success", payload: { score: 0.8, verified: false } });
  });

  it("flags a response without a confidence as invalid rather than as a failed transport", async () => {
    const { client } = clientFor(async (config) => jsonResponse(config, { verified: true, person_id: "p-7" }));

    const result = await client.call(INPUT, { timeoutMs: 1_000 });

    expect(result.status).toBe("invalid_response");
    expect(result.status === "invalid_response" ? result.error.message : "").toContain(
      "confidence: Expected a numeric confidence (or score) field"
    );
  });

  it("flags a percentage-scaled confidence as invalid", async () => {
    const { client } = clientFor(async (config) => jsonResponse(config, { confidence: 87 }));

    const result = await client.call(INPUT, { timeoutMs: 1_000 });

    expect(result.status).toBe("invalid_response");
  });

  it("flags a non-JSON success body as invalid", async () => {
    const { client } = clientFor(async (config) => jsonResponse(config, "<html>Bad gateway page</html>"));

    const result = await client.call(INPUT, { timeoutMs: 1_000 });

    expect(result).toMatchObject({
      status: "invalid_response",
      error: { httpStatus: 200, body: "<html>Bad gateway page</html>" }
    });
  });

  it("reports a rejected non-2xx response as a transport error", async () => {
    const { client } = clientFor(async (config) => {
      throw new AxiosError(
        "Request failed with status code 503",
        "ERR_BAD_RESPONSE",
        config,
        null,
        jsonResponse(config, { detail: "model warming up" }, 503)
      );
    });

    const result = await client.call(INPUT, { timeoutMs: 1_000 });

    expect(result).toMatchObject({
      status: "transport_error",
      error: { httpStatus: 503, body: { detail: "model warming up" } }
    });
  });

  it("reports a resolved non-2xx response as a transport error", async () => {
    const { client } = clientFor(async (config) => jsonResponse(config, { detail: "boom" }, 500));

    const result = await client.call(INPUT, { timeoutMs: 1_000 });

    expect(result).toMatchObject({ status: "transport_error", error: { httpStatus: 500 } });
  });

  it("reports a refused connection as a transport error", async () => {
    const { client } = clientFor(async (config) => {
      throw new AxiosError("connect ECONNREFUSED 127.0.0.1:5000", "ECONNREFUSED", config);
    });

    const result = await client.call(INPUT, { timeoutMs: 1_000 });

    expect(result).toMatchObject({
      status: "transport_error",
      error: { message: "verifier request failed: connect ECONNREFUSED 127.0.0.1:5000" }
    });
  });

  it("enforces its own timeout when the transport never answers", async () => {
    const { client, requests } = clientFor(() => new Promise(() => undefined));

    const result = await client.call(INPUT, { timeoutMs: 25 });

    expect(result).toMatchObject({
      status: "timeout",
      error: { message: "verifier did not respond within 25ms" }
    });
    expect(requests[0].signal?.aborted).toBe(true);
  });

  it("rejects with a cancellation when the caller aborts", async () => {
    const { client } = clientFor(
      (config) =>
        new Promise((_resolve, reject) => {
          config.signal?.addEventListener?.("abort", () => reject(new axios.CanceledError()));
        })
    );
    const controller = new AbortController();

    const pending = client.call(INPUT, { timeoutMs: 1_000, signal: controller.signal });
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toBeInstanceOf(OrchestrationCancelledError);
  });
});
