import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CorpusError, loadCorpus } from "../../corpus";

describe("loadCorpus", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "dreamgroup-corpus-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content, "utf-8");
    return path;
  }

  it("should read a tab-separated export", () => {
    const path = write(
      "goals.tsv",
      [
        "post_id\tpost_title\tusername\tdate_of_birth",
        "1\tBecome a doctor\talice\t2008-05-01",
        "2\t  לטוס  \tbob\t",
      ].join("\n"),
    );

    const { records, skipped } = loadCorpus(path);

    expect(skipped).toBe(0);
    expect(records).toEqual([
      {
        id: "1",
        rawTitle: "Become a doctor",
        authorId: "alice",
        birthDate: "2008-05-01",
      },
      { id: "2", rawTitle: "לטוס", authorId: "bob" },
    ]);
  });

  it("should read a comma-separated export with quoted titles", () => {
    const path = write(
      "goals.csv",
      [
        "post_id,post_title,username,date_of_birth",
        '7,"Travel, then settle down",carol,1999-12-31',
      ].join("\n"),
    );

    const { records } = loadCorpus(path);

    expect(records).toHaveLength(1);
    expect(records[0].rawTitle).toBe("Travel, then settle down");
    expect(records[0].birthDate).toBe("1999-12-31");
  });

  it("should skip rows without an id, blank titles and repeated ids", () => {
    const path = write(
      "goals.tsv",
      [
        "post_id\tpost_title\tusername\tdate_of_birth",
        "1\tFly\ta\t",
        "\tSwim\tb\t",
        "2\t   \tc\t",
        "1\tDance\td\t",
        "3\tRun",
      ].join("\n"),
    );

    const { records, skipped } = loadCorpus(path);

    expect(records.map((r) => [r.id, r.rawTitle])).toEqual([
      ["1", "Fly"],
      ["3", "Run"],
    ]);
    expect(skipped).toBe(3);
  });

  it("should read a JSON array", () => {
    const path = write(
      "goals.json",
      JSON.stringify([
        { id: 10, title: "Learn guitar", authorId: "dan", birthDate: null },
        { id: "11", title: "Write a book" },
      ]),
    );

    const { records } = loadCorpus(path);

    expect(records).toEqual([
      { id: "10", rawTitle: "Learn guitar", authorId: "dan" },
      { id: "11", rawTitle: "Write a book", authorId: "" },
    ]);
  });

  it("should report a missing file", () => {
    const path = join(dir, "missing.tsv");

    expect(() => loadCorpus(path)).toThrow(`Corpus file not found: ${path}`);
  });

  it("should wrap parse failures", () => {
    const path = write("goals.json", "{not json");

    try {
      loadCorpus(path);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CorpusError);
      if (error instanceof CorpusError) {
        expect(error.path).toBe(path);
        expect(error.cause).toBeInstanceOf(SyntaxError);
      }
    }
  });
});
