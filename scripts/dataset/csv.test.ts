import { describe, expect, it } from "vitest";

import { formatCsv, parseCsv } from "./csv";

describe("parseCsv", () => {
  it("handles quoted commas, escaped quotes, embedded newlines and CRLF", () => {
    const text = 'owner,name,language\r\nacme,"widgets, inc","say ""hi"""\r\nacme,"multi\nline",\r\n';

    expect(parseCsv(text)).toEqual({
      header: ["owner", "name", "language"],
      rows: [
        { owner: "acme", name: "widgets, inc", language: 'say "hi"' },
        { owner: "acme", name: "multi\nline", language: "" },
      ],
    });
  });

  it("skips blank lines and pads short rows", () => {
    expect(parseCsv("a,b\n\n1\n")).toEqual({ header: ["a", "b"], rows: [{ a: "1", b: "" }] });
  });

  it("strips a byte order mark", () => {
    expect(parseCsv("\uFEFFa\n1").header).toEqual(["a"]);
  });

  it("returns nothing for empty input", () => {
    expect(parseCsv("")).toEqual({ header: [], rows: [] });
  });
});

describe("formatCsv", () => {
  it("quotes only cells that need it", () => {
    const text = formatCsv(["a", "b", "c"], [{ a: "x,y", b: 'he said "no"', c: "plain" }]);
    expect(text).toBe('a,b,c\n"x,y","he said ""no""",plain\n');
  });

  it("writes missing cells as empty", () => {
    expect(formatCsv(["a", "b"], [{ a: "1" }])).toBe("a,b\n1,\n");
  });

  it("reads back what it writes", () => {
    const rows = [
      { owner: "acme", name: 'odd "name"', notes: "line one\nline two" },
      { owner: "beta", name: "plain", notes: "" },
    ];
    expect(parseCsv(formatCsv(["owner", "name", "notes"], rows)).rows).toEqual(rows);
  });
});
