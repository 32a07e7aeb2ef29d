/**
 * Anchor parsing and term/index conversion.
 */

export {
  termRef,
  indexRef,
  isGroup,
  freezeAnchors,
  anchorRefKey,
  IndexAnchorsSchema,
  mapAnchors,
  parseAnchorSpec,
  toIndex,
  reindexAnchors,
  tokenifyAnchors,
  assertIndicesInVocabulary,
  UnknownTermError,
  InvalidAnchorError,
  type Anchor,
  type AnchorRef,
  type ClientAnchor,
  type IndexAnchor,
  type TermAnchor,
} from "./anchor.js";
