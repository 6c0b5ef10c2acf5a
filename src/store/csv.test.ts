import { describe, expect, it } from "vitest";
import { formatCsvLine, parseCsv } from "./csv";

describe("formatCsvLine", () => {
  it("should leave plain cells alone", () => {
    expect(formatCsvLine(["a1", "http://good.test/", "200"])).toBe("a1,http://good.test/,200");
  });

  it("should quote cells with separators, quotes or line breaks", () => {
    expect(formatCsvLine(["a, b", 'say "hi"', "two\nlines"])).toBe(
      '"a, b","say ""hi""","two\nlines"',
    );
  });
});

describe("parseCsv", () => {
  it("should key rows by trimmed headers and strip a byte order mark", async () => {
    const rows = await parseCsv("\uFEFFurl , id\nhttp://a.test/,a\n");

    expect(rows).toEqual([{ url: "http://a.test/", id: "a" }]);
  });

  it("should read quoted cells back", async () => {
    const rows = await parseCsv('name,note\n"a, b","say ""hi"""\n');

    expect(rows).toEqual([{ name: "a, b", note: 'say "hi"' }]);
  });

  it("should return no rows for a header-only file", async () => {
    await expect(parseCsv("url,id\n")).resolves.toEqual([]);
  });
});
