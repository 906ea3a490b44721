export interface TitleContext {
  readonly name: string;
  readonly originalName: string;
  readonly year: string;
  readonly season?: number;
  readonly episode?: number;
}

/** One raw search hit. `address` is always absolute. */
export interface Candidate {
  readonly title: string;
  readonly duration: string;
  readonly size: string;
  readonly address: string;
}

export interface StreamDescriptor {
  readonly label: string;
  readonly sourceResolutionHint?: string;
  readonly address: string;
}

export interface MergedStream extends StreamDescriptor {
  readonly originTitle: string;
  readonly originSize: string;
  readonly originDuration: string;
}

export interface RankedStream {
  readonly name: string;
  readonly description: string;
  readonly address: string;
}

/**
 * Upstream search. `concurrency` is the number of queries the collaborator can
 * serve at once; a single shared browser session reports 1.
 */
export interface SearchCollaborator {
  readonly concurrency: number;
  search(query: string): Promise<Candidate[]>;
}

export interface DetailsCollaborator {
  fetchDetails(address: string): Promise<StreamDescriptor[]>;
}
