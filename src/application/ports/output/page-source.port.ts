/**
 * Page Source Port (Driven Port)
 * Supplies the list of page URLs to export
 */
export interface PageSourcePort {
  /**
   * Returns the page URLs in input order, without blank entries.
   * @throws ConfigurationError when the list cannot be read or is empty
   */
  readPageUrls(source: string): Promise<string[]>;
}
