/**
 * Certificate renderer.
 *
 * SVG is returned byte for byte. PDF and PNG go through the rasteriser,
 * each under a render-pool slot and a hard deadline:
 *
 *   pdf: rasterise into a per-render temp workspace -> embed on an A4 page
 *        oriented like the SVG (landscape when width >= height)
 *   png: fit into 1200x675 (social preview size) on white
 *
 * On timeout the render's abort signal fires and the caller gets
 * RENDER.TIMEOUT at once; the pool slot is only handed back when the
 * underlying work settles, so a stuck render keeps counting against the cap.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { PDFDocument, PageSizes } from 'pdf-lib';
import { RenderFormat, RenderedAsset } from '../domain/delivery';
import {
  CertificateError,
  isCertificateError,
  malformedInputError,
  renderEngineUnavailableError,
  renderTimeoutError,
  requestCanceledError,
} from '../domain/errors';
import { Logger, errorContext, logger as rootLogger } from '../logger';
import { RenderPool, RenderPoolStats } from './render-pool';
import { Rasterizer, SharpRasterizer } from './rasterizer';
import { withTempWorkspace } from './temp-workspace';

export const PREVIEW_WIDTH = 1200;
export const PREVIEW_HEIGHT = 675;
export const DEFAULT_RENDER_TIMEOUT_MS = 15_000;

const CONTENT_TYPES: Record<RenderFormat, string> = {
  svg: 'image/svg+xml',
  pdf: 'application/pdf',
  png: 'image/png',
};

export interface RendererOptions {
  pool: RenderPool;
  rasterizer?: Rasterizer;
  /** Hard deadline per render in ms. Default: 15000 */
  timeoutMs?: number;
  /** Parent directory for temp workspaces. Default: OS temp dir. */
  tempDir?: string;
  logger?: Logger;
}

export class Renderer {
  private readonly pool: RenderPool;
  private readonly rasterizer: Rasterizer;
  private readonly timeoutMs: number;
  private readonly tempDir?: string;
  private readonly log: Logger;

  constructor(options: RendererOptions) {
    this.pool = options.pool;
    this.rasterizer = options.rasterizer ?? new SharpRasterizer();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RENDER_TIMEOUT_MS;
    this.tempDir = options.tempDir;
    this.log = options.logger ?? rootLogger.child({ module: 'renderer' });
  }

  poolStats(): RenderPoolStats {
    return this.pool.stats();
  }

  async render(svg: Buffer, format: RenderFormat, signal?: AbortSignal): Promise<RenderedAsset> {
    const problem = svgProblem(svg);
    if (problem) {
      throw new CertificateError(malformedInputError(problem));
    }

    if (format === 'svg') {
      return { format, contentType: CONTENT_TYPES.svg, body: svg };
    }

    const release = this.pool.tryAcquire();
    if (!release) {
      throw new CertificateError(renderEngineUnavailableError(this.pool.size));
    }

    const controller = new AbortController();
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });
    const startedAt = Date.now();

    const work = (format === 'pdf' ? this.renderPdf(svg, controller.signal) : this.renderPng(svg, controller.signal))
      .finally(() => {
        release();
        signal?.removeEventListener('abort', onCallerAbort);
      });

    try {
      const body = await this.withDeadline(work, controller);
      this.log.debug('Render complete', { format, durationMs: Date.now() - startedAt, bytes: body.length });
      return { format, contentType: CONTENT_TYPES[format], body };
    } catch (err) {
      if (signal?.aborted && !(isCertificateError(err) && err.code === 'RENDER.TIMEOUT')) {
        throw new CertificateError(requestCanceledError());
      }
      throw err;
    }
  }

  private async renderPdf(svg: Buffer, signal: AbortSignal): Promise<Buffer> {
    const { width, height } = await this.rasterizer.dimensions(svg);
    throwIfAborted(signal);

    return withTempWorkspace(
      async (dir) => {
        const rasterPath = path.join(dir, 'page.png');
        await this.rasterizer.toPngFile(svg, rasterPath);
        throwIfAborted(signal);
        const png = await readFile(rasterPath);
        throwIfAborted(signal);
        return buildPdf(png, width >= height ? 'landscape' : 'portrait');
      },
      { root: this.tempDir },
    );
  }

  private async renderPng(svg: Buffer, signal: AbortSignal): Promise<Buffer> {
    throwIfAborted(signal);
    return this.rasterizer.toPngBuffer(svg, PREVIEW_WIDTH, PREVIEW_HEIGHT);
  }

  private withDeadline(work: Promise<Buffer>, controller: AbortController): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      let expired = false;
      const timer = setTimeout(() => {
        expired = true;
        controller.abort();
        reject(new CertificateError(renderTimeoutError(this.timeoutMs)));
      }, this.timeoutMs);

      work.then(
        (body) => {
          clearTimeout(timer);
          resolve(body);
        },
        (err: unknown) => {
          clearTimeout(timer);
          if (expired) {
            this.log.debug('Render settled after deadline', errorContext(err));
            return;
          }
          reject(err);
        },
      );
    });
  }
}

export type PageOrientation = 'landscape' | 'portrait';

/** Embed a PNG on a single A4 page, scaled to fit and centred. */
export async function buildPdf(png: Buffer, orientation: PageOrientation): Promise<Buffer> {
  const [shortSide, longSide] = PageSizes.A4;
  const [pageWidth, pageHeight] = orientation === 'landscape' ? [longSide, shortSide] : [shortSide, longSide];

  const doc = await PDFDocument.create();
  const image = await doc.embedPng(png);
  const page = doc.addPage([pageWidth, pageHeight]);
  const scale = Math.min(pageWidth / image.width, pageHeight / image.height);
  const drawWidth = image.width * scale;
  const drawHeight = image.height * scale;

  page.drawImage(image, {
    x: (pageWidth - drawWidth) / 2,
    y: (pageHeight - drawHeight) / 2,
    width: drawWidth,
    height: drawHeight,
  });

  return Buffer.from(await doc.save());
}

/**
 * Cheap structural check before any engine sees the bytes: after an optional
 * BOM, XML declaration, comments and doctype, the document must open with an
 * <svg> element. Returns the problem, or null.
 */
export function svgProblem(content: Buffer): string | null {
  if (content.length === 0) return 'empty document';
  let text = content.toString('utf8', 0, Math.min(content.length, 4096)).replace(/^\uFEFF/, '');
  const prolog = /^\s*(<\?xml[\s\S]*?\?>|<!--[\s\S]*?-->|<!DOCTYPE[^>]*>)/i;
  let match = prolog.exec(text);
  while (match) {
    text = text.slice(match[0].length);
    match = prolog.exec(text);
  }
  return /^\s*<svg[\s/>]/i.test(text) ? null : 'document root is not <svg>';
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new CertificateError(requestCanceledError());
  }
}
