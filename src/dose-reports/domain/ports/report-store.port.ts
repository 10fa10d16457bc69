export interface ReportStorePort {
  /**
   * List source documents (*.pdf) in a folder, sorted by file name.
   * Creates the folder when it does not exist.
   * @returns Absolute or folder-relative paths in discovery order
   */
  listSourceDocuments(folder: string): Promise<string[]>;

  /**
   * Write a value as indented JSON, creating parent folders as needed
   * @throws ExportWriteError when the file cannot be written
   */
  writeJson(filePath: string, value: unknown): Promise<void>;

  /**
   * Locate previously exported report JSON in a folder: the preferred file
   * when present, otherwise the first *.json by name
   * @returns Path of the file, or null when the folder holds none
   */
  findReportFile(folder: string, preferredFileName: string): Promise<string | null>;

  /**
   * Read and parse a JSON file
   * @throws ReportInputError when the file is unreadable or not JSON
   */
  readJson(filePath: string): Promise<unknown>;
}
