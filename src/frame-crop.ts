/**
 * Frame cropping and coordinate mapping.
 *
 * Crops are zero-copy views into the source pixel buffer (same `data`, shifted
 * offset, original stride). Only the optional zoom to the model input size
 * allocates a new buffer. After inference on a crop, detections are mapped back
 * into full-frame coordinates with transformDetections().
 */

import type { RoiBox } from "./roi-box.js";
import { silentLogger, type Logger } from "./logger.js";
import type { BoundingBox, CropMetadata, CropOffset, FrameShape } from "./types.js";

// ─── Image Types ────────────────────────────────────────────────────────────────

/** Row-major, channel-interleaved 8-bit image, possibly a view into a larger buffer. */
export interface ImageView {
  data: Uint8Array;
  width: number;
  height: number;
  channels: number;
  /** Elements between the starts of two consecutive rows */
  stride: number;
  /** Index of pixel (0, 0) in `data` */
  offset: number;
}

export interface VideoFrame {
  image: ImageView;
  sourceId: number;
  frameId: number;
  timestamp: number;
}

export interface CropResult {
  frame: VideoFrame;
  offset: CropOffset | null;
  /** Side lengths when the crop was upscaled to the model input size */
  zoom: { from: number; to: number } | null;
}

export interface CropOptions {
  modelSize?: number | null;
  resizeToModel?: boolean;
  logger?: Logger;
}

// ─── Image Helpers ──────────────────────────────────────────────────────────────

/** Allocate a contiguous image (zero-filled unless `data` is given). */
export function createImage(
  width: number,
  height: number,
  channels: number = 3,
  data?: Uint8Array,
): ImageView {
  const expected = width * height * channels;
  if (data && data.length !== expected) {
    throw new Error(`Image data has ${data.length} elements, expected ${expected} for ${width}x${height}x${channels}`);
  }
  return {
    data: data ?? new Uint8Array(expected),
    width,
    height,
    channels,
    stride: width * channels,
    offset: 0,
  };
}

export function frameShapeOf(image: ImageView): FrameShape {
  return { height: image.height, width: image.width };
}

/** Read one channel of one pixel through the view's stride and offset. */
export function pixelAt(image: ImageView, x: number, y: number, channel: number = 0): number {
  return image.data[image.offset + y * image.stride + x * image.channels + channel];
}

/**
 * View of the region [x1, x2) × [y1, y2), clamped to the image like array slicing.
 * Shares `data` with the source image.
 */
export function cropView(image: ImageView, roi: RoiBox): ImageView {
  const x1 = Math.max(0, Math.min(image.width, roi.x1));
  const y1 = Math.max(0, Math.min(image.height, roi.y1));
  const x2 = Math.max(x1, Math.min(image.width, roi.x2));
  const y2 = Math.max(y1, Math.min(image.height, roi.y2));

  return {
    data: image.data,
    width: x2 - x1,
    height: y2 - y1,
    channels: image.channels,
    stride: image.stride,
    offset: image.offset + y1 * image.stride + x1 * image.channels,
  };
}

/**
 * Bilinear resize with half-pixel centers (same sampling grid as OpenCV's
 * INTER_LINEAR). Returns a new contiguous image.
 */
export function resizeBilinear(src: ImageView, outWidth: number, outHeight: number): ImageView {
  const { channels } = src;
  const out = createImage(outWidth, outHeight, channels);
  if (src.width === 0 || src.height === 0) return out;

  const scaleX = src.width / outWidth;
  const scaleY = src.height / outHeight;

  for (let y = 0; y < outHeight; y++) {
    const sy = Math.min(Math.max((y + 0.5) * scaleY - 0.5, 0), src.height - 1);
    const y0 = Math.floor(sy);
    const y1 = Math.min(y0 + 1, src.height - 1);
    const fy = sy - y0;

    for (let x = 0; x < outWidth; x++) {
      const sx = Math.min(Math.max((x + 0.5) * scaleX - 0.5, 0), src.width - 1);
      const x0 = Math.floor(sx);
      const x1 = Math.min(x0 + 1, src.width - 1);
      const fx = sx - x0;

      for (let c = 0; c < channels; c++) {
        const top = pixelAt(src, x0, y0, c) * (1 - fx) + pixelAt(src, x1, y0, c) * fx;
        const bottom = pixelAt(src, x0, y1, c) * (1 - fx) + pixelAt(src, x1, y1, c) * fx;
        out.data[(y * outWidth + x) * channels + c] = Math.round(top * (1 - fy) + bottom * fy);
      }
    }
  }

  return out;
}

// ─── Crop ───────────────────────────────────────────────────────────────────────

/**
 * Apply the ROI to a frame.
 *
 * - No ROI: the original frame, offset null.
 * - Empty crop: logged, original frame, offset null (never an empty image).
 * - `resizeToModel` and crop smaller than `modelSize`: upscaled to modelSize×modelSize.
 *   Larger crops are left as-is; the inference step handles any padding.
 */
export function cropFrameIfRoi(frame: VideoFrame, roi: RoiBox | null, options: CropOptions = {}): CropResult {
  const { modelSize = null, resizeToModel = false, logger = silentLogger } = options;

  if (roi === null) {
    return { frame, offset: null, zoom: null };
  }

  let image = cropView(frame.image, roi);
  if (image.width === 0 || image.height === 0) {
    logger.warn(`Empty crop for ROI ${roi.toString()}, using full frame`);
    return { frame, offset: null, zoom: null };
  }

  const offsetX = Math.max(0, Math.min(frame.image.width, roi.x1));
  const offsetY = Math.max(0, Math.min(frame.image.height, roi.y1));
  const offset: CropOffset = { x: offsetX, y: offsetY, scaleX: 1, scaleY: 1 };
  let zoom: CropResult["zoom"] = null;

  if (resizeToModel && modelSize !== null) {
    const cropSize = Math.max(image.width, image.height);
    if (cropSize < modelSize) {
      offset.scaleX = image.width / modelSize;
      offset.scaleY = image.height / modelSize;
      image = resizeBilinear(image, modelSize, modelSize);
      zoom = { from: cropSize, to: modelSize };
    }
  }

  return {
    frame: { ...frame, image },
    offset,
    zoom,
  };
}

// ─── Coordinate Mapping ─────────────────────────────────────────────────────────

/**
 * Map detections from crop (model) space back to full-frame space.
 * Without an offset the input array itself is returned. Class and confidence
 * are never touched.
 */
export function transformDetections<T extends BoundingBox>(detections: T[], offset: CropOffset | null): T[] {
  if (offset === null || detections.length === 0) {
    return detections;
  }

  return detections.map((det) => ({
    ...det,
    x: det.x * offset.scaleX + offset.x,
    y: det.y * offset.scaleY + offset.y,
    width: det.width * offset.scaleX,
    height: det.height * offset.scaleY,
  }));
}

// ─── Observability ──────────────────────────────────────────────────────────────

/** Crop telemetry for one frame. A null ROI reports the full frame. */
export function buildCropMetadata(
  roi: RoiBox | null,
  frame: FrameShape,
  imgsz: number | null,
  enabled: boolean,
  offset: CropOffset | null,
): CropMetadata {
  const frameSize = { height: frame.height, width: frame.width };

  if (roi === null) {
    return {
      enabled,
      cropApplied: offset !== null,
      cropOffset: offset,
      roi: null,
      performance: { imgsz, sizeMultiple: 0, cropRatio: 1, pixelReduction: 0, frameSize },
    };
  }

  const cropRatio = roi.cropRatio(frame);
  return {
    enabled,
    cropApplied: offset !== null,
    cropOffset: offset,
    roi: roi.toBounds(),
    performance: {
      imgsz,
      sizeMultiple: imgsz !== null ? roi.sizeMultiple(imgsz) : 0,
      cropRatio,
      pixelReduction: 1 - cropRatio,
      frameSize,
    },
  };
}
