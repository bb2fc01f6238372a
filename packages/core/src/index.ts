/**
 * @snapbind/core
 *
 * Content model, content paths and the selector grammar shared by the
 * snapbind packages. This is the contract layer: settings and redact both
 * depend on it.
 *
 * Zero npm dependencies. Just types and pure functions.
 *
 * @packageDocumentation
 */

// Content: serialization of captured values, map sorting, equality
export {
  cloneContent,
  contentEquals,
  freezeContent,
  isContentMap,
  setEntry,
  sortContent,
  toContent,
} from "./content.js";

// Paths: location of a node inside a content tree
export { ContentPath } from "./path.js";

// Selectors: parsed path patterns matched against content paths
export {
  Selector,
  SelectorParseError,
  isParseFailure,
  parseSelector,
  type SelectorParseFailure,
  type SelectorSegment,
} from "./selector.js";

// Core types used across all packages
export type {
  Content,
  ContentMap,
  ContentPrimitive,
  IndexSegment,
  KeySegment,
  PathSegment,
} from "./types.js";
