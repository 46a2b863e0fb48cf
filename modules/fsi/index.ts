export * from "./types.js";
export { RescatteringMatrix, RescatteringMatrixModel } from "./rescattering-matrix.js";
export { TriangleRescatteringModel, type RescatteringTerm } from "./triangle-rescattering.js";
export {
  bubbleLoop,
  exchangeProjectionClosedForm,
  exchangeProjectionQuadrature,
  openChannelMomentum,
  triangleLoopFactor,
  THRESHOLD_TOLERANCE,
  type LoopFactorOptions,
  type TriangleKinematics,
} from "./loop-functions.js";
