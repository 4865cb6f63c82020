// ROI Stabilizer - ROI strategy factory
// Validates an RoiStrategyConfig and builds the matching strategy variant.

import { AdaptiveRoiState, FixedRoiState, type RoiStrategy } from "./roi-state.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { RoiStrategyConfig } from "./types.js";

const VALID_MODES = ["none", "adaptive", "fixed"] as const;

/**
 * Build the ROI strategy for `config.mode`.
 * Returns null for "none" (always infer on the full frame).
 * Throws on an unknown mode or invalid parameters.
 */
export function createRoiStrategy(
  config: RoiStrategyConfig,
  logger: Logger = createConsoleLogger("RoiStrategy"),
): RoiStrategy | null {
  const mode = config.mode.toLowerCase();
  const options = { imgsz: config.imgsz, resizeToModel: config.resizeToModel, logger };
  const resizeInfo = config.resizeToModel
    ? `resizeToModel=true (zoom ROI → ${config.imgsz}×${config.imgsz})`
    : "resizeToModel=false";

  switch (mode) {
    case "none":
      logger.info("ROI strategy: NONE (full frame)");
      return null;

    case "adaptive": {
      const state = new AdaptiveRoiState(config.adaptive, options);
      const { margin, smoothingAlpha, minMultiple, maxMultiple } = state.config;
      logger.info(
        `ROI strategy: ADAPTIVE (margin=${margin}, smoothing=${smoothingAlpha}, ` +
          `multiples=${minMultiple}-${maxMultiple}) | ${resizeInfo}`,
      );
      return state;
    }

    case "fixed": {
      const state = new FixedRoiState(config.fixed, options);
      const { xMin, yMin, xMax, yMax } = state.config;
      logger.info(
        `ROI strategy: FIXED (x: ${xMin.toFixed(2)}-${xMax.toFixed(2)}, ` +
          `y: ${yMin.toFixed(2)}-${yMax.toFixed(2)}) | ${resizeInfo}`,
      );
      return state;
    }

    default:
      throw new Error(`Invalid ROI mode: '${config.mode}'. Must be one of: ${VALID_MODES.join(", ")}`);
  }
}
