/**
 * Research Suggestion
 *
 * Output of the external improvement service or a manual note. The
 * context snapshot is kept verbatim so every suggestion can be traced
 * back to what produced it.
 */

export const SUGGESTION_SOURCES = ['cursor', 'manual'] as const;

/** `cursor` names the external improvement service */
export type SuggestionSource = (typeof SUGGESTION_SOURCES)[number];

/** Open set; downstream workflows add their own */
export type SuggestionStatus = 'pending' | 'accepted' | 'rejected' | (string & {});

export interface ResearchSuggestion {
  id: string;
  source: SuggestionSource;
  /** Verbatim copy of the context sent to the service */
  contextJson: string | null;
  recommendationText: string;
  status: SuggestionStatus;
  createdAt: string;
  updatedAt: string;
}

export interface SuggestionInput {
  source: SuggestionSource;
  recommendationText: string;
  contextJson?: string | null;
  status?: SuggestionStatus;
}

export interface SuggestionQuery {
  source?: SuggestionSource;
  status?: SuggestionStatus;
  limit?: number;
}

export function isSuggestionSource(value: unknown): value is SuggestionSource {
  return SUGGESTION_SOURCES.some(source => source === value);
}
