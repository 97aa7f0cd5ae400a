import { describe, expect, it } from "vitest";
import { ProxyAgent } from "undici";
import { createProxyDispatcher } from "../src/papercast/utils/proxy.js";

describe("createProxyDispatcher", () => {
  it("connects directly without a proxy URL", () => {
    expect(createProxyDispatcher(undefined)).toBeUndefined();
    expect(createProxyDispatcher("")).toBeUndefined();
  });

  it("builds a proxy agent for a proxy URL", async () => {
    const dispatcher = createProxyDispatcher("http://127.0.0.1:3128");
    expect(dispatcher).toBeInstanceOf(ProxyAgent);
    await dispatcher?.close();
  });
});
