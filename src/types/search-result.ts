export type SearchResult = {
  id: string;
  score: number;
  metadata: Record<string, unknown>;
  payload?: unknown;
};
