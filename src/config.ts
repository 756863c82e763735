/**
 * Global parammap configuration contract & default instance.
 *
 * A central `config` object lets end-users (and tests) tweak library behaviour without
 * digging through scattered constants.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'parammap-ts';
 *   config.warnings = true;      // enable runtime warnings
 *   config.pathSeparator = '/';  // name nested parameters `center/0` instead of `center.0`
 *
 * Adjust BEFORE constructing models so that parameter names are derived with the intended
 * separator. Values are read at call time; nothing caches them.
 */
export interface ParamMapConfig {
  /**
   * Emit guidance & format warnings through `console.warn` (once per warning key).
   * Default: false
   */
  warnings: boolean;

  /**
   * Separator joining the path segments of nested parameter names (`center.0`, `n.real`).
   * Default: '.'
   */
  pathSeparator: string;

  /**
   * Delimiter between a disambiguation prefix and the shared part of a registered name
   * (`scatterer:r`). When a tied Variable is rediscovered and the shared part is free, the
   * registry drops the prefix.
   * Default: ':'
   */
  prefixDelimiter: string;

  /**
   * Noise standard deviation assumed by the `uniformFallback` noise policy when no noise value
   * is mapped or supplied and every free parameter has a uniform prior.
   * Default: 1
   */
  uniformNoiseFallback: number;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: ParamMapConfig = {
  warnings: false, // emit runtime guidance
  pathSeparator: '.', // nested name joiner
  prefixDelimiter: ':', // registry name prefix delimiter
  uniformNoiseFallback: 1, // noiseSd assumed for all-uniform priors
};
