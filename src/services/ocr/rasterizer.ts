/**
 * PDF Rasterizer
 *
 * Splits a PDF into one PNG per page with poppler's pdftoppm. Used for
 * providers whose primary API only takes single images.
 *
 * @module services/ocr/rasterizer
 */

import { spawn } from 'child_process';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { Document, Page } from '../../models/document.js';
import type { RasterConfig } from '../../utils/config.js';
import { RasterizationError, RequestCancelledError } from './errors.js';

/** Maximum stderr kept from pdftoppm for error messages */
const MAX_STDERR_LENGTH = 10_240;

const TEMP_PREFIX = 'ocr-compare-raster-';

/** pdftoppm names pages <prefix>-<n>.png, zero-padded to the page count's width */
const PAGE_FILE_PATTERN = /^page-(\d+)\.png$/;

export interface RasterizeOptions {
  signal?: AbortSignal;
}

export interface Rasterizer {
  /**
   * Pages in document order, 1-based indices
   *
   * @throws RasterizationError when the file cannot be split
   * @throws RequestCancelledError when the signal aborts
   */
  rasterize(document: Document, options?: RasterizeOptions): Promise<Page[]>;
}

export class PopplerRasterizer implements Rasterizer {
  constructor(private readonly config: RasterConfig) {}

  async rasterize(document: Document, options: RasterizeOptions = {}): Promise<Page[]> {
    if (document.kind !== 'pdf') {
      throw new RasterizationError(`Not a PDF: ${document.fileName}`, document.path);
    }
    if (options.signal?.aborted) {
      throw new RequestCancelledError();
    }

    const start = Date.now();
    const outDir = await fs.mkdtemp(path.join(os.tmpdir(), TEMP_PREFIX));
    try {
      await this.runPdftoppm(document, outDir, options.signal);
      const pages = await readPages(outDir, this.config.dpi);
      if (pages.length === 0) {
        throw new RasterizationError(`pdftoppm produced no pages for ${document.fileName}`, document.path);
      }
      console.error(
        `[Rasterizer] ${document.fileName}: ${pages.length} page(s) at ${this.config.dpi} DPI in ${Date.now() - start}ms`
      );
      return pages;
    } finally {
      await fs.rm(outDir, { recursive: true, force: true });
    }
  }

  private runPdftoppm(document: Document, outDir: string, signal?: AbortSignal): Promise<void> {
    const { pdftoppmPath, dpi, timeoutMs } = this.config;
    const args = ['-png', '-r', String(dpi), document.path, path.join(outDir, 'page')];

    return new Promise((resolve, reject) => {
      const proc = spawn(pdftoppmPath, args, { timeout: timeoutMs, signal });
      let stderr = '';
      let settled = false;

      proc.stderr.on('data', (d: Buffer) => {
        if (stderr.length < MAX_STDERR_LENGTH) stderr += d.toString();
      });

      proc.on('error', (err: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        if (signal?.aborted) {
          reject(new RequestCancelledError());
        } else if (err.code === 'ENOENT') {
          reject(
            new RasterizationError(
              `pdftoppm not found at "${pdftoppmPath}". Install poppler-utils or set PDFTOPPM_PATH`,
              document.path,
              { cause: err }
            )
          );
        } else {
          reject(new RasterizationError(`pdftoppm failed: ${err.message}`, document.path, { cause: err }));
        }
      });

      proc.on('close', (code, killSignal) => {
        if (settled) return;
        settled = true;
        if (killSignal) {
          reject(
            new RasterizationError(
              `pdftoppm killed by ${killSignal} (timeout: ${timeoutMs}ms)`,
              document.path
            )
          );
          return;
        }
        if (code === 0) {
          resolve();
        } else {
          reject(
            new RasterizationError(
              `pdftoppm exited with code ${code}: ${stderr.trim() || 'no output'}`,
              document.path
            )
          );
        }
      });
    });
  }
}

async function readPages(dir: string, dpi: number): Promise<Page[]> {
  const entries = await fs.readdir(dir);
  const numbered = entries.flatMap((name) => {
    const match = PAGE_FILE_PATTERN.exec(name);
    return match ? [{ name, index: parseInt(match[1], 10) }] : [];
  });
  numbered.sort((a, b) => a.index - b.index);

  const pages: Page[] = [];
  for (const { name, index } of numbered) {
    pages.push({ index, imageBytes: await fs.readFile(path.join(dir, name)), dpi });
  }
  return pages;
}
