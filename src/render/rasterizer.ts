/**
 * SVG rasterisation backed by sharp (libvips + librsvg).
 *
 * Decoding errors surface as RENDER.MALFORMED_INPUT; the renderer treats any
 * other failure as an engine fault.
 */

import sharp from 'sharp';
import { CertificateError, malformedInputError } from '../domain/errors';

export interface SvgDimensions {
  width: number;
  height: number;
}

/** Rasteriser contract (injectable for testing). */
export interface Rasterizer {
  dimensions(svg: Buffer): Promise<SvgDimensions>;
  /** Write a PNG of the SVG at its intrinsic size scaled by `density`. */
  toPngFile(svg: Buffer, outPath: string): Promise<void>;
  /** PNG fitted inside width x height on a white background. */
  toPngBuffer(svg: Buffer, width: number, height: number): Promise<Buffer>;
}

/** Raster density (DPI) for print output; SVG user units are 72 DPI. */
export const PRINT_DENSITY = 150;

const WHITE = { r: 255, g: 255, b: 255, alpha: 1 };

export class SharpRasterizer implements Rasterizer {
  async dimensions(svg: Buffer): Promise<SvgDimensions> {
    const metadata = await decode(() => sharp(svg).metadata());
    if (metadata.format !== 'svg' || !metadata.width || !metadata.height) {
      throw new CertificateError(malformedInputError('missing or non-SVG dimensions'));
    }
    return { width: metadata.width, height: metadata.height };
  }

  async toPngFile(svg: Buffer, outPath: string): Promise<void> {
    await decode(() => sharp(svg, { density: PRINT_DENSITY }).flatten({ background: WHITE }).png().toFile(outPath));
  }

  async toPngBuffer(svg: Buffer, width: number, height: number): Promise<Buffer> {
    return decode(() =>
      sharp(svg)
        .resize(width, height, { fit: 'contain', background: WHITE })
        .flatten({ background: WHITE })
        .png()
        .toBuffer(),
    );
  }
}

async function decode<T>(op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (/unsupported image format|Input buffer|svgload|XML/i.test(message)) {
      throw new CertificateError(malformedInputError(message));
    }
    throw err;
  }
}
