import { describe, expect, it } from "vitest";
import { queryArxiv } from "../src/papercast/workflows/queryTool.js";
import { FakeSearch } from "./fakes.js";

describe("queryArxiv", () => {
  it("formats one record per line", async () => {
    const search = new FakeSearch(() => [
      { title: "Folding Widgets", authors: ["Ada Example", "Bo Sample"] },
      { title: "Unfolding Widgets", authors: ["Cy Placeholder"] }
    ]);

    const result = await queryArxiv(search, "widgets", { maxResults: 2, fields: ["title", "authors"] });

    expect(result.text).toBe(
      "title: Folding Widgets, authors: Ada Example; Bo Sample\ntitle: Unfolding Widgets, authors: Cy Placeholder"
    );
    expect(result.records).toHaveLength(2);
    expect(search.calls[0]?.options).toEqual({ maxResults: 2, fields: ["title", "authors"] });
  });

  it("defaults to five results and all fields", async () => {
    const search = new FakeSearch(() => []);
    const result = await queryArxiv(search, "widgets");

    expect(result.text).toBe("");
    expect(search.calls[0]?.options).toEqual({ maxResults: 5 });
  });

  it("rejects an empty query", async () => {
    await expect(queryArxiv(new FakeSearch(() => []), " ")).rejects.toMatchObject({ code: "BAD_REQUEST" });
  });
});
