/**
 * IPTV Module
 *
 * M3U playlist parsing, curation and generation
 */

export {
  // Types
  type ChannelRecord,
  type ChannelAttributes,
  type KnownAttribute,
  type CurationMode,
  type CategoryRule,
  type CurationRules,
  type CurationStats,
  KNOWN_ATTRIBUTES,
  UNKNOWN_CHANNEL_NAME,
  DEFAULT_FALLBACK_CATEGORY,
} from './types';

export {
  // M3U Parsing
  type ParseOptions,
  type SkippedEntry,
  parseM3U,
  parseAttributes,
  extractChannelName,
  extractEpgUrl,
} from './m3u-parser';

export {
  // Rules
  type KeywordMatcher,
  type RuleDecision,
  type CompiledRules,
  type DecisionListener,
  createKeywordMatcher,
  containsKeyword,
  compileRules,
  assignCategory,
  applyRules,
} from './rule-engine';

export {
  // M3U Generation
  type WriteM3UOptions,
  formatExtInf,
  writeM3U,
} from './m3u-writer';

export {
  // Pipeline
  type PipelineResult,
  type CurationResult,
  sortChannels,
  runPipeline,
  curatePlaylist,
} from './pipeline';
