import { describe, it, expect } from "vitest";
import { ModelSession, classifyModelFailure } from "../../src/model/fallback.js";
import { ModelRequestError } from "../../src/model/types.js";
import { ConfigurationError, ModelInvocationError } from "../../src/workflows/errors.js";
import { ScriptedModel, silentLogger } from "../helpers/fakes.js";

function session(model: ScriptedModel, name = "gemini-2.5-flash", fallbacks: Record<string, string> = {}): ModelSession {
  return new ModelSession(model, name, silentLogger(), { fallbacks, rateLimitDelayMs: 0 });
}

describe("classifyModelFailure", () => {
  it("classifies by status and provider code", () => {
    expect(classifyModelFailure(new ModelRequestError("slow down", 429))).toBe("rate_limited");
    expect(classifyModelFailure(new ModelRequestError("quota", 400, "RESOURCE_EXHAUSTED"))).toBe("rate_limited");
    expect(classifyModelFailure(new ModelRequestError("missing", 404))).toBe("not_found");
    expect(classifyModelFailure(new Error("models/x is NOT_FOUND"))).toBe("not_found");
    expect(classifyModelFailure(new ModelRequestError("down", 503))).toBe("unavailable");
    expect(classifyModelFailure(new Error("bad request"))).toBe("other");
  });
});

describe("ModelSession", () => {
  it("returns trimmed text and the model that produced it", async () => {
    const model = new ScriptedModel("  hello  ");
    await expect(session(model).generate("p")).resolves.toEqual({ text: "hello", model: "gemini-2.5-flash" });
    expect(model.requests).toHaveLength(1);
  });

  it("retries once on an empty response", async () => {
    const model = new ScriptedModel("", "second try");
    const result = await session(model).generate("p");
    expect(result.text).toBe("second try");
    expect(model.requests).toHaveLength(2);
  });

  it("fails after two empty responses", async () => {
    const model = new ScriptedModel(null);
    await expect(session(model).generate("p")).rejects.toThrow("Model gemini-2.5-flash returned an empty response");
    expect(model.requests).toHaveLength(2);
  });

  it("retries a rate-limited call once on the same model", async () => {
    const model = new ScriptedModel(new ModelRequestError("busy", 429), "ok");
    const result = await session(model).generate("p");
    expect(result).toEqual({ text: "ok", model: "gemini-2.5-flash" });
    expect(model.requests.map((request) => request.model)).toEqual(["gemini-2.5-flash", "gemini-2.5-flash"]);
  });

  it("does not retry a rate limit twice", async () => {
    const model = new ScriptedModel(new ModelRequestError("busy", 429));
    await expect(session(model).generate("p")).rejects.toBeInstanceOf(ModelInvocationError);
    expect(model.requests).toHaveLength(2);
  });

  it("strips -latest on NOT_FOUND", async () => {
    const model = new ScriptedModel(new ModelRequestError("gone", 404), "ok");
    const s = session(model, "gemini-2.5-flash-latest");
    const result = await s.generate("p");
    expect(result.model).toBe("gemini-2.5-flash");
    expect(model.requests.map((request) => request.model)).toEqual(["gemini-2.5-flash-latest", "gemini-2.5-flash"]);
  });

  it("substitutes a higher tier when the lower tier is unavailable, and keeps it", async () => {
    const model = new ScriptedModel(new ModelRequestError("down", 503), "first", "second");
    const s = session(model, "gemini-2.5-flash-lite", { "gemini-2.5-flash-lite": "gemini-2.5-flash" });

    expect((await s.generate("a")).model).toBe("gemini-2.5-flash");
    expect((await s.generate("b")).model).toBe("gemini-2.5-flash");
    expect(s.model).toBe("gemini-2.5-flash");
    expect(model.requests.map((request) => request.model)).toEqual([
      "gemini-2.5-flash-lite",
      "gemini-2.5-flash",
      "gemini-2.5-flash",
    ]);
  });

  it("wraps other failures with the model name", async () => {
    const model = new ScriptedModel(new ModelRequestError("invalid argument", 400));
    const error = await session(model).generate("p").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ModelInvocationError);
    expect(error).toMatchObject({
      model: "gemini-2.5-flash",
      message: "Model invocation failed for gemini-2.5-flash: invalid argument",
      status: 500,
    });
  });

  it("lets configuration errors through unchanged", async () => {
    const model = new ScriptedModel(new ConfigurationError("model.apiKey missing"));
    await expect(session(model).generate("p")).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("passes the system prompt to the client", async () => {
    const model = new ScriptedModel("ok");
    await session(model).generate("user prompt", "be brief");
    expect(model.requests[0]).toEqual({ model: "gemini-2.5-flash", prompt: "user prompt", system: "be brief" });
  });
});
