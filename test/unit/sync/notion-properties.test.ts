import { describe, it, expect } from "vitest";

import type { DestinationPayload } from "../../../src/core/types.js";
import {
  DEFAULT_PROPERTY_NAMES,
  KOREAN_PROPERTY_NAMES,
  RICH_TEXT_LIMIT,
  chunkText,
  encodeProperties,
  encodeProperty,
  paragraphBlock,
  toRichText,
} from "../../../src/sync/notion-properties.js";

describe("chunkText", () => {
  it("splits long text into pieces of at most the limit", () => {
    const chunks = chunkText("a".repeat(4500));
    expect(chunks.map((c) => c.length)).toEqual([2000, 2000, 500]);
  });

  it("counts code points, not UTF-16 units", () => {
    expect(chunkText("😀😀😀", 2)).toEqual(["😀😀", "😀"]);
  });

  it("returns no chunks for empty text", () => {
    expect(chunkText("")).toEqual([]);
  });
});

describe("toRichText", () => {
  it("wraps each chunk in a text object", () => {
    const parts = toRichText("x".repeat(RICH_TEXT_LIMIT + 1));
    expect(parts).toHaveLength(2);
    expect(parts[1]).toEqual({ type: "text", text: { content: "x" } });
  });
});

describe("encodeProperty", () => {
  it("encodes a date", () => {
    expect(encodeProperty({ type: "date", start: "2020-01-05" })).toEqual({
      date: { start: "2020-01-05" },
    });
  });

  it("encodes external files", () => {
    expect(
      encodeProperty({
        type: "files",
        files: [{ name: "Cover image", url: "https://image.example.com/c.jpg" }],
      }),
    ).toEqual({
      files: [
        { type: "external", name: "Cover image", external: { url: "https://image.example.com/c.jpg" } },
      ],
    });
  });
});

describe("encodeProperties", () => {
  const payload: DestinationPayload = {
    Title: { type: "title", text: "클린 코드" },
    ISBN: { type: "rich_text", text: "9788966260959" },
  };

  it("keys properties by the default column names", () => {
    expect(encodeProperties(payload, DEFAULT_PROPERTY_NAMES)).toEqual({
      Title: { title: [{ type: "text", text: { content: "클린 코드" } }] },
      ISBN: { rich_text: [{ type: "text", text: { content: "9788966260959" } }] },
    });
  });

  it("uses custom column names and leaves absent keys out", () => {
    const properties = encodeProperties(payload, KOREAN_PROPERTY_NAMES);
    expect(Object.keys(properties)).toEqual(["제목", "ISBN"]);
  });
});

describe("paragraphBlock", () => {
  it("builds a paragraph block", () => {
    expect(paragraphBlock("Note")).toEqual({
      object: "block",
      type: "paragraph",
      paragraph: { rich_text: [{ type: "text", text: { content: "Note" } }] },
    });
  });
});
