/** External collaborators an analysis depends on. Order is the reporting order. */
export enum Dependency {
  TEXT_GENERATION = 'text_generation',
  SEARCH = 'search',
  ENRICHMENT = 'enrichment',
}
