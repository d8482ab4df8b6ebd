/**
 * PNG export via pngjs
 */

import { PNG } from 'pngjs';
import { rasterize, type RasterImage, type RasterOptions } from './raster';
import type { Plot } from './plot';

/**
 * Encode RGBA pixels as PNG bytes
 */
export function encodeRaster(image: RasterImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(image.data);
  return PNG.sync.write(png);
}

/**
 * Rasterize a plot and encode it as PNG bytes
 */
export function encodePng(plot: Plot, options: RasterOptions = {}): Buffer {
  return encodeRaster(rasterize(plot, options));
}
