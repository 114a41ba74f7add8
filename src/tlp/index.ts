export {
  TLP_LEVELS,
  parseTlpLevel,
  tlpRank,
  isVisible,
  determineReportLevel,
  highestTlpLevel,
} from './lattice.js';
