/**
 * Glob pattern matching for layerfs
 *
 * @module glob
 */

export { match, createMatcher, hasMeta, GlobSyntaxError, type Matcher } from './match.js'
