/**
 * @brandcast/planning
 *
 * Pure planners: how a source is split into segments and where each logo
 * lands on every segment.
 */

export { planSegments, planSegmentsFor, renderableSegments } from './segmentPlanner.js';
export {
  planOverlays,
  resolveOverlaySize,
  resolvePosition,
  type LogoConfiguration,
} from './overlayPlanner.js';
