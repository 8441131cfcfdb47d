export interface TextblockOptions {
  /**
   * Codec used to open `source` when it is a path, e.g. `'gzip'` or `'lz4'`.
   * Plain file when omitted.
   */
  codec?: string
}
