/**
 * Sensitive-content boundary: reads transcript text, returns the spans to
 * remove as plain phrases (no positions).
 */
export interface SensitiveContentDetector {
  readonly provider: string;

  detect(text: string): Promise<string[]>;
}
