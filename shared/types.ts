/**
 * Public result shapes returned by `searchWeb` and the HTTP surface.
 */

export interface Candidate {
  /** 1-based position in the discovery backend's ordering. */
  readonly rank: number;
  readonly title: string;
  readonly link: string;
  readonly snippet: string;
}

export interface ScoredCandidate extends Candidate {
  readonly score: number;
}

export interface FetchResult {
  readonly url: string;
  readonly ok: boolean;
  readonly status: number | null;
  readonly content: string | null;
  readonly error: string | null;
  readonly cached: boolean;
}

export interface EnrichedResult extends Candidate {
  readonly indepth: FetchResult | null;
}

export interface SearchResponse {
  readonly ok: boolean;
  readonly query: string;
  readonly results: ReadonlyArray<EnrichedResult>;
  readonly errors: ReadonlyArray<string>;
}
