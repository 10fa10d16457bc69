import { Injectable, Logger } from '@nestjs/common';
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { ReportStorePort } from '../../domain/ports/report-store.port';
import { ExportWriteError } from '../../domain/errors/export-write.error';
import { ReportInputError } from '../../domain/errors/report-input.error';

const byName = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Local filesystem store for source PDFs and exported report JSON.
 */
@Injectable()
export class FileSystemReportStoreAdapter implements ReportStorePort {
  private readonly logger = new Logger(FileSystemReportStoreAdapter.name);

  async listSourceDocuments(folder: string): Promise<string[]> {
    await mkdir(folder, { recursive: true });
    const entries = await readdir(folder, { withFileTypes: true });

    return entries
      .filter((entry) => entry.isFile() && /\.pdf$/i.test(entry.name))
      .map((entry) => entry.name)
      .sort(byName)
      .map((name) => join(folder, name));
  }

  async writeJson(filePath: string, value: unknown): Promise<void> {
    try {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new ExportWriteError({
        targetPath: filePath,
        reason: reasonOf(error),
        cause: error,
      });
    }
    this.logger.debug(`[STORE] Wrote ${filePath}`);
  }

  async findReportFile(
    folder: string,
    preferredFileName: string,
  ): Promise<string | null> {
    let names: string[];
    try {
      const entries = await readdir(folder, { withFileTypes: true });
      names = entries
        .filter((entry) => entry.isFile() && /\.json$/i.test(entry.name))
        .map((entry) => entry.name)
        .sort(byName);
    } catch (error) {
      this.logger.warn(`[STORE] Cannot list ${folder}: ${reasonOf(error)}`);
      return null;
    }

    if (names.includes(preferredFileName)) {
      return join(folder, preferredFileName);
    }
    return names.length > 0 ? join(folder, names[0]) : null;
  }

  async readJson(filePath: string): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ReportInputError({
        message: `Unable to read ${filePath}: ${reasonOf(error)}`,
        sourcePath: filePath,
      });
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      throw new ReportInputError({
        message: `Invalid JSON in ${filePath}: ${reasonOf(error)}`,
        sourcePath: filePath,
      });
    }
  }
}
