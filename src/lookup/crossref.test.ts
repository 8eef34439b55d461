/**
 * Tests for the Crossref works search client.
 */

import { beforeEach, describe, expect, expectTypeOf, it, vi } from "vitest";
import { type FindDoiOptions, findDoi, searchCrossref, toDoiUrl } from "./crossref.js";

// Mock fetch globally
const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

function okResponse(items: unknown[] | undefined) {
  return {
    ok: true,
    status: 200,
    statusText: "OK",
    json: () =>
      Promise.resolve({
        status: "ok",
        message: items === undefined ? {} : { "total-results": items.length, items },
      }),
  };
}

/** URL and headers of the nth fetch call */
function fetchCall(index = 0): { url: URL; headers: Record<string, string> } {
  const [url, init] = mockFetch.mock.calls[index] as [string, { headers: Record<string, string> }];
  return { url: new URL(url), headers: init.headers };
}

describe("searchCrossref", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("queries the works endpoint with the raw citation text", async () => {
    mockFetch.mockResolvedValueOnce(okResponse([{ DOI: "10.1103/physreve.76.021306" }]));
    const citation = "Abate, A. R., and D. J. Durian, 2007, Phys. Rev. E 76, 021306.";

    const items = await searchCrossref(citation);

    expect(items).toEqual([{ DOI: "10.1103/physreve.76.021306" }]);
    const { url } = fetchCall();
    expect(url.origin + url.pathname).toBe("https://api.crossref.org/works");
    expect(url.searchParams.get("query")).toBe(citation);
    expect(url.searchParams.get("rows")).toBe("1");
    expect(url.searchParams.get("select")).toBe("DOI,title");
  });

  it("passes the requested number of rows", async () => {
    mockFetch.mockResolvedValueOnce(okResponse([]));

    await searchCrossref("Smith 2020", { rows: 5 });

    expect(fetchCall().url.searchParams.get("rows")).toBe("5");
  });

  it("sends a plain User-Agent without mailto", async () => {
    mockFetch.mockResolvedValueOnce(okResponse([]));

    await searchCrossref("Smith 2020");

    expect(fetchCall().headers["User-Agent"]).toBe("citation-doi-finder/0.1.0");
  });

  it("adds the mailto address to the User-Agent", async () => {
    mockFetch.mockResolvedValueOnce(okResponse([]));

    await searchCrossref("Smith 2020", { mailto: "researcher@example.org" });

    expect(fetchCall().headers["User-Agent"]).toBe(
      "citation-doi-finder/0.1.0 (mailto:researcher@example.org)"
    );
  });

  it("returns an empty list when the response has no items", async () => {
    mockFetch.mockResolvedValueOnce(okResponse(undefined));

    expect(await searchCrossref("Smith 2020")).toEqual([]);
  });

  it("returns an empty list for a blank query without calling the API", async () => {
    expect(await searchCrossref("   ")).toEqual([]);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("throws on rate limit (429)", async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 429, statusText: "Too Many Requests" });

    await expect(searchCrossref("Smith 2020")).rejects.toThrow("Crossref rate limit exceeded");
  });

  it("throws on other HTTP errors", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 503,
      statusText: "Service Unavailable",
    });

    await expect(searchCrossref("Smith 2020")).rejects.toThrow(
      "Crossref API error: HTTP 503 Service Unavailable"
    );
  });

  it("throws on network error", async () => {
    mockFetch.mockRejectedValueOnce(new Error("Network error"));

    await expect(searchCrossref("Smith 2020")).rejects.toThrow("Network error");
  });
});

describe("findDoi", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("returns the first candidate's DOI", async () => {
    mockFetch.mockResolvedValueOnce(
      okResponse([{ DOI: "10.1103/physrevlett.93.160603" }, { DOI: "10.1000/other" }])
    );

    expect(await findDoi("Abou, B., and F. Gallet, 2004, Phys. Rev. Lett. 93, 160603.")).toBe(
      "10.1103/physrevlett.93.160603"
    );
  });

  it("always requests a single row", async () => {
    mockFetch.mockResolvedValueOnce(okResponse([]));

    await findDoi("Smith 2020", { mailto: "researcher@example.org" });

    expect(fetchCall().url.searchParams.get("rows")).toBe("1");
  });

  it("does not accept a row count", () => {
    expectTypeOf<FindDoiOptions>().not.toHaveProperty("rows");
    expectTypeOf<FindDoiOptions>().toHaveProperty("mailto");
  });

  it("returns null when there are no candidates", async () => {
    mockFetch.mockResolvedValueOnce(okResponse([]));

    expect(await findDoi("Nonexistent 1900")).toBeNull();
  });

  it("returns null when the first candidate has no DOI", async () => {
    mockFetch.mockResolvedValueOnce(okResponse([{ title: ["Untitled"] }]));

    expect(await findDoi("Smith 2020")).toBeNull();
  });
});

describe("toDoiUrl", () => {
  it("builds a doi.org link", () => {
    expect(toDoiUrl("10.1103/physreve.76.021306")).toBe(
      "https://doi.org/10.1103/physreve.76.021306"
    );
  });
});
