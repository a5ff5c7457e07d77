/**
 * Configuration Module
 *
 * Exports curation rule loading and validation.
 */

export {
  ConfigurationError,
  parseCurationRules,
  loadCurationRules,
} from './curation-config';
