/**
 * @healthlog/core - Conditions
 */

export type { Dimension, DimensionName } from "./dimensions.js";
export {
  DIMENSIONS,
  getDimension,
  dimensionOf,
  isConditionValue,
  getApplicableDimensions,
  getApplicableValues,
} from "./dimensions.js";

export { resolveConditions, validateConditions, formatConditions } from "./resolve.js";
