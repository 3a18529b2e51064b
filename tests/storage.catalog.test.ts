import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CatalogLoadError, findCatalogFile, readCatalog } from "../src/storage/readCatalog.js";

describe("Catalog reader", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "grant-radar-catalog-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const filePath = join(dir, name);
    writeFileSync(filePath, content, "utf-8");
    return filePath;
  }

  it("should read a JSON array", async () => {
    const filePath = write("grants.json", JSON.stringify([{ id: "1", title: "A" }, { id: "2" }]));
    expect(await readCatalog(filePath)).toEqual([{ id: "1", title: "A" }, { id: "2" }]);
  });

  it("should read JSON Lines, skipping blank lines", async () => {
    const filePath = write("grants.jsonl", '{"id":"1"}\n\n{"id":"2"}\r\n');
    expect(await readCatalog(filePath)).toEqual([{ id: "1" }, { id: "2" }]);
  });

  it("should name the line that fails to parse", async () => {
    const filePath = write("grants.jsonl", '{"id":"1"}\n{oops\n');
    await expect(readCatalog(filePath)).rejects.toThrow(CatalogLoadError);
    await expect(readCatalog(filePath)).rejects.toThrow(`Failed to load catalog ${filePath}: line 2:`);
  });

  it("should reject a JSON file that is not an array", async () => {
    const filePath = write("grants.json", '{"id":"1"}');
    await expect(readCatalog(filePath)).rejects.toThrow(
      `Failed to load catalog ${filePath}: expected a JSON array of records`
    );
  });

  it("should reject rows that are not objects", async () => {
    const filePath = write("grants.json", '[{"id":"1"}, 7]');
    await expect(readCatalog(filePath)).rejects.toThrow(`Failed to load catalog ${filePath}: record 2 is not an object`);
  });

  it("should reject a missing file", async () => {
    await expect(readCatalog(join(dir, "absent.json"))).rejects.toThrow(CatalogLoadError);
  });

  describe("findCatalogFile", () => {
    it("should prefer the given path", async () => {
      const filePath = write("mine.json", "[]");
      expect(await findCatalogFile("mine.json", dir)).toBe(filePath);
    });

    it("should fall back to the usual locations", async () => {
      mkdirSync(join(dir, "data"));
      const filePath = write(join("data", "grants.jsonl"), "");
      expect(await findCatalogFile("missing.json", dir)).toBe(filePath);
      expect(await findCatalogFile(undefined, dir)).toBe(filePath);
    });

    it("should return null when nothing exists", async () => {
      expect(await findCatalogFile(undefined, dir)).toBeNull();
      write("grants.json", "[]");
      expect(await findCatalogFile("missing.json", dir, [])).toBeNull();
    });
  });
});
