import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import PDFParser from 'pdf2json';
import { DocumentRendererPort } from '../../domain/ports/document-renderer.port';
import { DocumentReadError } from '../../domain/errors/document-read.error';

export interface PositionedText {
  x: number;
  y: number;
  text: string;
}

export interface RenderedPage {
  texts: PositionedText[];
}

// pdf2json page units; text items closer than this vertically share a row
export const ROW_TOLERANCE = 0.25;

// Horizontal distance between item starts treated as a column break
export const COLUMN_GAP = 12;

/**
 * Rebuilds reading order from positioned text items: rows by y (top to
 * bottom), items by x within a row. Items far apart on one row are emitted
 * on separate lines so a right-hand column does not run into the left one.
 * Pages are separated by a blank line.
 */
export function linearizePages(pages: readonly RenderedPage[]): string {
  return pages
    .map((page) => {
      const rows: Array<{ y: number; items: PositionedText[] }> = [];
      for (const item of page.texts) {
        if (!item.text.trim()) {
          continue;
        }
        const existing = rows.find(
          (row) => Math.abs(row.y - item.y) <= ROW_TOLERANCE,
        );
        if (existing) {
          existing.items.push(item);
        } else {
          rows.push({ y: item.y, items: [item] });
        }
      }

      return rows
        .sort((a, b) => a.y - b.y)
        .map((row) => {
          const ordered = [...row.items].sort((a, b) => a.x - b.x);
          let output = '';
          let previousX: number | null = null;
          for (const part of ordered) {
            if (previousX === null) {
              output = part.text;
            } else {
              output += `${part.x - previousX > COLUMN_GAP ? '\n' : ' '}${part.text}`;
            }
            previousX = part.x;
          }
          return output;
        })
        .join('\n');
    })
    .join('\n\n');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function decodeRun(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Not percent-encoded after all
    return value;
  }
}

/**
 * Reads the Pages / Texts / R[].T structure emitted by pdf2json, skipping
 * anything that does not have that shape.
 */
export function toRenderedPages(pdfData: unknown): RenderedPage[] {
  if (!isRecord(pdfData) || !Array.isArray(pdfData.Pages)) {
    return [];
  }
  return pdfData.Pages.filter(isRecord).map((page) => ({
    texts: (Array.isArray(page.Texts) ? page.Texts : [])
      .filter(isRecord)
      .flatMap((item): PositionedText[] => {
        if (typeof item.x !== 'number' || typeof item.y !== 'number') {
          return [];
        }
        const runs = Array.isArray(item.R) ? item.R : [];
        const text = runs
          .filter(isRecord)
          .map((run) => (typeof run.T === 'string' ? decodeRun(run.T) : ''))
          .join('');
        return [{ x: item.x, y: item.y, text }];
      }),
  }));
}

function describeParserError(errData: unknown): string {
  const error =
    isRecord(errData) && 'parserError' in errData
      ? errData.parserError
      : errData;
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * PDF2JSON rendering adapter
 *
 * Reads the file, parses it with pdf2json and linearizes the positioned
 * text items into one line per visual row.
 *
 * @see https://github.com/modesty/pdf2json
 */
@Injectable()
export class Pdf2JsonRendererAdapter implements DocumentRendererPort {
  private readonly logger = new Logger(Pdf2JsonRendererAdapter.name);

  async renderText(filePath: string): Promise<string> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw new DocumentReadError({
        filePath,
        reason: error instanceof Error ? error.message : String(error),
        cause: error,
      });
    }

    this.logger.debug(
      `[PDF2JSON] Parsing ${basename(filePath)} (${buffer.length} bytes)`,
    );

    const pdfData = await this.parseBuffer(filePath, buffer);
    const pages = toRenderedPages(pdfData);

    this.logger.debug(
      `[PDF2JSON] ${basename(filePath)}: pages=${pages.length}`,
    );
    return linearizePages(pages);
  }

  private parseBuffer(filePath: string, buffer: Buffer): Promise<unknown> {
    const pdfParser = new PDFParser();

    return new Promise<unknown>((resolve, reject) => {
      pdfParser.on('pdfParser_dataError', (errData: unknown) => {
        const reason = describeParserError(errData);
        this.logger.warn(
          `[PDF2JSON] Parse failed for ${basename(filePath)}: ${reason.substring(0, 200)}`,
        );
        reject(new DocumentReadError({ filePath, reason, cause: errData }));
      });

      pdfParser.on('pdfParser_dataReady', (pdfData: unknown) => {
        resolve(pdfData);
      });

      pdfParser.parseBuffer(buffer);
    });
  }
}
