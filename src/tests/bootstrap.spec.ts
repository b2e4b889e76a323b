import { afterEach, describe, expect, it, vi } from "vitest";
import { assertIndexCompatible } from "../bootstrap";
import { withOverrides } from "../config/engine";
import { ConfigurationError } from "../errors";
import { FakeEmbedder, InMemoryVectorIndex, testConfig } from "./fixtures";

describe("assertIndexCompatible", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("accepts a matching index and probes the embedder once", async () => {
    const embedder = new FakeEmbedder();
    await expect(assertIndexCompatible(new InMemoryVectorIndex({}), embedder, testConfig)).resolves.toBeUndefined();
    expect(embedder.calls).toBe(1);
  });

  it("refuses a metric other than the one the index was built with", async () => {
    const index = new InMemoryVectorIndex({}, { metric: "l2", dimension: 4, modelVersion: "fake-embed-1" });
    await expect(assertIndexCompatible(index, new FakeEmbedder(), testConfig)).rejects.toThrowError(
      "Similarity metric mismatch: engine uses cosine, index was built with l2"
    );
  });

  it("refuses an embedder of another dimension", async () => {
    const embedder = new FakeEmbedder(8);
    await expect(assertIndexCompatible(new InMemoryVectorIndex({}), embedder, testConfig)).rejects.toBeInstanceOf(ConfigurationError);
    expect(embedder.calls).toBe(0);
  });

  it("refuses a probe vector that disagrees with the declared dimension", async () => {
    const embedder = new FakeEmbedder(4, () => [1, 0, 0]);
    await expect(assertIndexCompatible(new InMemoryVectorIndex({}), embedder, testConfig)).rejects.toThrowError(
      "Embedding probe returned 3 dimensions, index expects 4"
    );
  });

  it("warns when the index was built by another embedding model", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const index = new InMemoryVectorIndex({}, { metric: "inner_product", dimension: 4, modelVersion: "older-embed" });
    const config = withOverrides(testConfig, { similarityMetric: "inner_product" });

    await assertIndexCompatible(index, new FakeEmbedder(), config);
    expect(warn).toHaveBeenCalledWith("[STARTUP] index was built with older-embed, engine embeds with fake-embed-1");
  });
});
