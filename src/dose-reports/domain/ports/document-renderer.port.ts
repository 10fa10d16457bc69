export interface DocumentRendererPort {
  /**
   * Render one source document to linear text, one line per visual row
   * @param filePath - Path of the source document
   * @returns Raw rendered text (not yet normalized)
   * @throws DocumentReadError when the document is missing or unreadable
   */
  renderText(filePath: string): Promise<string>;
}
