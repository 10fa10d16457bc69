import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  linearizePages,
  Pdf2JsonRendererAdapter,
  toRenderedPages,
} from './pdf2json-renderer.adapter';
import { DocumentReadError } from '../../domain/errors/document-read.error';

describe('Pdf2JsonRendererAdapter', () => {
  describe('linearizePages', () => {
    it('should order rows top to bottom and items left to right', () => {
      const text = linearizePages([
        {
          texts: [
            { x: 8, y: 3, text: '123' },
            { x: 2, y: 5, text: 'Study ID:' },
            { x: 2, y: 3.1, text: 'Patient ID:' },
            { x: 8, y: 5, text: '9' },
          ],
        },
      ]);

      expect(text).toBe('Patient ID: 123\nStudy ID: 9');
    });

    it('should put a far right-hand column on its own line', () => {
      const text = linearizePages([
        {
          texts: [
            { x: 2, y: 4, text: 'Sex: F' },
            { x: 20, y: 4, text: 'KVP = 120 kV' },
          ],
        },
      ]);

      expect(text).toBe('Sex: F\nKVP = 120 kV');
    });

    it('should separate pages with a blank line and skip blank items', () => {
      const text = linearizePages([
        { texts: [{ x: 1, y: 1, text: 'Page one' }, { x: 3, y: 2, text: '  ' }] },
        { texts: [{ x: 1, y: 1, text: 'Page two' }] },
      ]);

      expect(text).toBe('Page one\n\nPage two');
    });
  });

  describe('toRenderedPages', () => {
    it('should decode percent-encoded text runs', () => {
      const pages = toRenderedPages({
        Pages: [
          {
            Texts: [
              { x: 1, y: 2, R: [{ T: 'Patient%20ID%3A' }, { T: '%2042' }] },
              { x: 1, y: 3, R: [{ T: '100%' }] },
            ],
          },
        ],
      });

      expect(pages).toEqual([
        {
          texts: [
            { x: 1, y: 2, text: 'Patient ID: 42' },
            { x: 1, y: 3, text: '100%' },
          ],
        },
      ]);
    });

    it('should skip items without coordinates and data without pages', () => {
      expect(toRenderedPages(null)).toEqual([]);
      expect(toRenderedPages({ Pages: [{ Texts: [{ R: [{ T: 'x' }] }] }] })).toEqual([
        { texts: [] },
      ]);
    });
  });

  describe('renderText', () => {
    it('should raise DocumentReadError for a missing file', async () => {
      const adapter = new Pdf2JsonRendererAdapter();
      const missing = join(tmpdir(), 'ct-dose-missing-file', 'absent.pdf');

      await expect(adapter.renderText(missing)).rejects.toBeInstanceOf(
        DocumentReadError,
      );
      await expect(adapter.renderText(missing)).rejects.toMatchObject({
        filePath: missing,
      });
    });
  });
});
