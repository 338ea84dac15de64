/**
 * Formatting-artifact filter for streamed completion fragments.
 *
 * Some local models wrap FIM output in a markdown fence even when told
 * not to, and stream the fence and its language tag as separate
 * fragments. Fragments whose trimmed text is exactly one of the
 * configured artifacts are dropped. The fragment right after a dropped
 * one loses a single leading "\n", which is the line break the fence
 * line ended with.
 *
 * Which artifacts show up depends on the model, so the set is
 * configuration and the filter is a factory: the relay creates one
 * filter per request and may be given any other implementation. The
 * artifact factory also suppresses the request's own language tag.
 */

export const DEFAULT_ARTIFACTS: readonly string[] = ["```", "python"];

/** Per-request, stateful fragment filter. */
export interface ChunkFilter {
  /** Text to forward, or null when the fragment is suppressed. */
  apply(text: string): string | null;
}

export interface ChunkFilterContext {
  language: string;
}

export type ChunkFilterFactory = (ctx: ChunkFilterContext) => ChunkFilter;

export function createArtifactFilter(
  artifacts: readonly string[] = DEFAULT_ARTIFACTS,
): ChunkFilter {
  const suppressed = new Set(artifacts);
  let afterSuppressed = false;

  return {
    apply(text: string): string | null {
      if (suppressed.has(text.trim())) {
        afterSuppressed = true;
        return null;
      }
      let out = text;
      if (afterSuppressed && out.startsWith("\n")) {
        out = out.slice(1);
      }
      afterSuppressed = false;
      return out;
    },
  };
}

/**
 * Factory for `createArtifactFilter` with a fixed artifact set plus the
 * lower-cased language of each request.
 */
export function artifactFilterFactory(
  artifacts: readonly string[] = DEFAULT_ARTIFACTS,
): ChunkFilterFactory {
  const frozen = [...artifacts];
  return ({ language }) => {
    const tag = language.trim().toLowerCase();
    return createArtifactFilter(tag === "" ? frozen : [...frozen, tag]);
  };
}

/** Forwards every fragment unchanged. */
export const passthroughFilterFactory: ChunkFilterFactory = () => ({
  apply: (text) => text,
});
