/**
 * Durable record of the entities completed for one run scope.
 * `save` always rewrites the whole set; there are no partial writes.
 */
export interface ICheckpointRepository {
  /** Empty set when nothing is stored or the stored record is unreadable. */
  load(): Promise<Set<string>>;
  save(entities: ReadonlySet<string>): Promise<void>;
  clear(): Promise<void>;
}
