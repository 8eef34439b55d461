/**
 * Crossref works search client.
 * Finds candidate works for a free-text bibliographic query.
 *
 * API: https://api.crossref.org/works?query={text}&rows={n}
 * Identify with a mailto in the User-Agent to use the polite pool.
 */

const CROSSREF_WORKS_URL = "https://api.crossref.org/works";

const DOI_RESOLVER_URL = "https://doi.org";

const USER_AGENT = "citation-doi-finder/0.1.0";

export interface CrossrefOptions {
  /** Contact address for the polite pool */
  mailto?: string;
  /** Number of candidates to request (default: 1) */
  rows?: number;
}

/** Options for a single best-match lookup, which always requests one row */
export type FindDoiOptions = Omit<CrossrefOptions, "rows">;

/** A candidate work, limited to the selected fields */
export interface CrossrefWork {
  DOI?: string;
  title?: string[];
}

interface CrossrefSearchResponse {
  status?: string;
  message?: {
    "total-results"?: number;
    items?: CrossrefWork[];
  };
}

function buildUserAgent(mailto: string | undefined): string {
  return mailto ? `${USER_AGENT} (mailto:${mailto})` : USER_AGENT;
}

/** Build the DOI resolver URL for a DOI. */
export function toDoiUrl(doi: string): string {
  return `${DOI_RESOLVER_URL}/${doi}`;
}

/**
 * Search Crossref for works matching a free-text query.
 *
 * @returns Candidate works in relevance order; empty when nothing matched
 * @throws On rate limit (429), other HTTP errors, or network errors
 */
export async function searchCrossref(
  query: string,
  options?: CrossrefOptions
): Promise<CrossrefWork[]> {
  if (!query.trim()) return [];

  const params = new URLSearchParams({
    query,
    rows: String(options?.rows ?? 1),
    select: "DOI,title",
  });
  const response = await fetch(`${CROSSREF_WORKS_URL}?${params.toString()}`, {
    headers: { "User-Agent": buildUserAgent(options?.mailto) },
  });

  if (!response.ok) {
    if (response.status === 429) {
      throw new Error("Crossref rate limit exceeded");
    }
    throw new Error(`Crossref API error: HTTP ${response.status} ${response.statusText}`);
  }

  const data = (await response.json()) as CrossrefSearchResponse;
  return data.message?.items ?? [];
}

/**
 * Find the DOI of the best Crossref match for a citation.
 *
 * @returns The first candidate's DOI, or null when there is none
 * @throws On rate limit (429), other HTTP errors, or network errors
 */
export async function findDoi(
  citation: string,
  options?: FindDoiOptions
): Promise<string | null> {
  const items = await searchCrossref(citation, { ...options, rows: 1 });
  const doi = items[0 as number]?.DOI?.trim();
  return doi ? doi : null;
}
