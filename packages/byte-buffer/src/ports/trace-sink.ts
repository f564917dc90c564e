/** Payload of one storage dump. */
export type StorageDump = Readonly<{
  /** Logical size of the buffer when dumped. */
  size: number
  dump: string
}>

/**
 * Destination for raw storage dumps.
 *
 * @remarks
 * `isTraceEnabled()` is queried before any dump is formatted; when it
 * returns false the buffer does no formatting work at all.
 */
export interface TraceSink {
  isTraceEnabled(): boolean
  trace(message: string, meta: StorageDump): void
}
