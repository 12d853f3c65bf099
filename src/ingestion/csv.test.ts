import { detectDelimiter, locateHeaderRow, parseDelimited, readCsv } from "./csv";

describe("detectDelimiter", () => {
  it("picks the delimiter with the most separators outside quotes", () => {
    expect(detectDelimiter("a;b;c\n1;2;3")).toBe(";");
    expect(detectDelimiter("a\tb\n1\t2")).toBe("\t");
    expect(detectDelimiter('"x;y;z",b\n1,2')).toBe(",");
  });

  it("defaults to a comma for single-column input", () => {
    expect(detectDelimiter("only\nvalues")).toBe(",");
  });
});

describe("parseDelimited", () => {
  it("handles quoted delimiters, escaped quotes and blank lines", () => {
    expect(parseDelimited('a,"b,c","d""e"\r\n1,2,3\n\n')).toEqual([
      ["a", "b,c", 'd"e'],
      ["1", "2", "3"]
    ]);
  });

  it("keeps newlines inside quoted fields", () => {
    expect(parseDelimited('id,caption\n1,"line one\nline two"')).toEqual([
      ["id", "caption"],
      ["1", "line one\nline two"]
    ]);
  });
});

describe("locateHeaderRow", () => {
  it("skips title lines above the header", () => {
    const rows = [["Monthly report"], ["Generated 2025-01-31"], ["Post ID", "Likes"], ["ig1", "5"]];
    expect(locateHeaderRow(rows)).toBe(2);
  });

  it("keeps a narrow standard header even when a data row mentions report terms", () => {
    const rows = [
      ["post_id", "timestamp", "likes", "comments", "caption"],
      ["p1", "2025-01-15 10:00", "5", "1", "Save the date: our reach doubled"]
    ];
    expect(locateHeaderRow(rows)).toBe(0);
  });

  it("finds a Facebook video header below a summary line", () => {
    const rows = [["Page summary", "", ""], ["Title", "Publish time", "3-Second Video Views"], ["Clip", "x", "10"]];
    expect(locateHeaderRow(rows)).toBe(1);
  });

  it("falls back to the first row", () => {
    expect(locateHeaderRow([["a", "b"], ["1", "2"]])).toBe(0);
  });
});

describe("readCsv", () => {
  it("strips a byte order mark", () => {
    expect(readCsv("\uFEFFPost ID,Likes\nig1,5")).toEqual({
      columns: ["Post ID", "Likes"],
      rows: [["ig1", "5"]]
    });
  });

  it("names blank header cells by position", () => {
    expect(readCsv("post_id,,timestamp\n1,x,2025-01-01").columns).toEqual(["post_id", "column_1", "timestamp"]);
  });

  it("returns nothing for empty content", () => {
    expect(readCsv("")).toEqual({ columns: [], rows: [] });
  });
});
