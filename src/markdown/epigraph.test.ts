import { describe, expect, test } from "vitest";
import { splitAttribution } from "./epigraph.js";

describe("splitAttribution", () => {
  test("splits at the last double hyphen", () => {
    expect(splitAttribution("Well -- said -- Someone")).toEqual({ quote: "Well -- said", attribution: "Someone" });
  });

  test("falls back to en and em dashes", () => {
    expect(splitAttribution("Quote – Author")).toEqual({ quote: "Quote", attribution: "Author" });
    expect(splitAttribution("Quote —Author ")).toEqual({ quote: "Quote", attribution: "Author" });
  });

  test("needs text after the delimiter", () => {
    expect(splitAttribution("Trailing --")).toBeUndefined();
    expect(splitAttribution("No delimiter here")).toBeUndefined();
  });
});
