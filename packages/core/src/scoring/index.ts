export { createScorer, scoreCaption, scoreUpload } from './scorer.js';
export { loadDetectors } from './detectorLoader.js';
export { runDetectors, aggregateOutcomes } from './detectorRunner.js';
export { mapScoreToBand, CAPTION_BANDS, UPLOAD_BANDS } from './bandMapper.js';
export {
  CAPTION_SIGNAL_POLICY,
  UPLOAD_POLICY,
  RECOMMENDATIONS,
  MAX_RECOMMENDATIONS,
  finalizeRecommendations,
} from './policies.js';
