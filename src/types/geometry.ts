/**
 * Core geometry types for the Wall Panel Optimizer
 * All measurements are in inches, wall-local (x along the wall, y up from the base)
 */

/**
 * A rectangle defined by position and dimensions
 * The position (x, y) represents the bottom-left corner
 */
export interface Rectangle {
  x: number;
  y: number;
  width: number;
  height: number;
}
