// Lookup misses, unresolved ground height and repeated ends are handled
// where they happen; only directory corruption is raised.
export type SiegeErrorCode = 'DuplicateActor';

export class SiegeError extends Error {
  constructor(readonly code: SiegeErrorCode, message: string) {
    super(message);
    this.name = 'SiegeError';
  }
}
