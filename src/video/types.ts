/**
 * Probed values exposed to encode templates
 */
export interface MediaDetails {
  /** Seconds */
  duration: number;
  /** Overall bitrate in kb/s */
  bitrate: number;
  /** KiB */
  size: number;
}
