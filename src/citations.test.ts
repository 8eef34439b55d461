import { mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { cleanCitation, parseCitations, readCitations } from "./citations.js";

describe("cleanCitation", () => {
  it("keeps a citation that already starts with a letter", () => {
    expect(cleanCitation("Abate, A. R., and D. J. Durian, 2007, Phys. Rev. E 76, 021306.")).toBe(
      "Abate, A. R., and D. J. Durian, 2007, Phys. Rev. E 76, 021306."
    );
  });

  it.each([
    ["(1) Abou, B., 2004", "Abou, B., 2004"],
    ["[12] Abou, B., 2004", "Abou, B., 2004"],
    ["3. Abou, B., 2004", "Abou, B., 2004"],
    ["  - * Abou, B., 2004  ", "Abou, B., 2004"],
  ])("strips the list marker from %j", (input, expected) => {
    expect(cleanCitation(input)).toBe(expected);
  });

  it("keeps a leading accented letter", () => {
    expect(cleanCitation("[2] Érdi, P., 2008, Complexity Explained.")).toBe(
      "Érdi, P., 2008, Complexity Explained."
    );
  });

  it("keeps a line with no letters unchanged", () => {
    expect(cleanCitation(" 2007, 76, 021306 ")).toBe("2007, 76, 021306");
    expect(cleanCitation("[1]")).toBe("[1]");
  });

  it("collapses whitespace runs", () => {
    expect(cleanCitation("Smith,\tJ.   2020, Nature")).toBe("Smith, J. 2020, Nature");
  });

  it("drops non-printable characters", () => {
    expect(cleanCitation("Smith, J.\u0007 2020\u200b, Nature")).toBe("Smith, J. 2020, Nature");
  });

  it("collapses whitespace left around a removed character", () => {
    expect(cleanCitation("Smith \u200b J")).toBe("Smith J");
  });
});

describe("parseCitations", () => {
  it("skips blank lines and handles CRLF", () => {
    const content = "1. Smith, J., 2020\r\n\r\n   \r\n2. Jones, K., 2021\r\n";
    expect(parseCitations(content)).toEqual(["Smith, J., 2020", "Jones, K., 2021"]);
  });

  it("skips lines that clean down to nothing", () => {
    expect(parseCitations("\u200b\nSmith, J., 2020")).toEqual(["Smith, J., 2020"]);
  });
});

describe("readCitations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `doi-finder-citations-test-${Date.now()}-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("reads one citation per line", async () => {
    const path = join(testDir, "citations.txt");
    await writeFile(
      path,
      "[1] Abate, A. R., and D. J. Durian, 2007, Phys. Rev. E 76, 021306.\n" +
        "[2] Abou, B., and F. Gallet, 2004, Phys. Rev. Lett. 93, 160603.\n",
      "utf-8"
    );

    expect(await readCitations(path)).toEqual([
      "Abate, A. R., and D. J. Durian, 2007, Phys. Rev. E 76, 021306.",
      "Abou, B., and F. Gallet, 2004, Phys. Rev. Lett. 93, 160603.",
    ]);
  });

  it("throws a descriptive error for a missing file", async () => {
    const path = join(testDir, "missing.txt");
    await expect(readCitations(path)).rejects.toThrow(`Citations file not found: ${path}`);
  });
});
