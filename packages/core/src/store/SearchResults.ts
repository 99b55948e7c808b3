import type { RecordMetadata, VectorMatch } from "@lectern/shared";

/**
 * Outcome of one similarity search. The three sequences are parallel; when
 * `error` is set they are all empty.
 */
export class SearchResults {
  private constructor(
    readonly documents: string[],
    readonly metadata: RecordMetadata[],
    readonly distances: number[],
    readonly error?: string,
  ) {}

  static fromQuery(matches: VectorMatch[]): SearchResults {
    return new SearchResults(
      matches.map((match) => match.document),
      matches.map((match) => match.metadata),
      matches.map((match) => match.distance),
    );
  }

  static empty(error?: string): SearchResults {
    return new SearchResults([], [], [], error);
  }

  isEmpty(): boolean {
    return this.documents.length === 0;
  }
}
