/**
 * Pipeline Stages Exports
 *
 * Central export point for the stage implementations, in execution order.
 *
 * @module stages
 */

// Candidate selection
export { filterCandidates, isCandidate, isFullyUpperCase, listCandidatePhrases } from './filter.js';

// Normalization
export { normalizeTerm, normalizeTerms, isAlphabetic, type NormalizationResult } from './normalize.js';

// Frequency counting
export { countFrequencies, countBounds } from './frequency.js';

// Rescaling
export { rescaleWeights, uniformWeight } from './rescale.js';

// Serialization
export { serializeHotwords } from './serialize.js';
