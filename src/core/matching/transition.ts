import { EmptyQueryError, NoMatchError } from "../errors.js";

export type Transition = {
  readonly id: string;
  readonly name: string;
  readonly targetStatusName?: string;
};

export type MatchTier = "exact" | "prefix" | "contains";

export type MatchOutcome = {
  selected: Transition;
  matchedBy: MatchTier;
  ambiguityWarning?: string;
};

type ScoredTransition = {
  transition: Transition;
  index: number;
};

/**
 * Resolves a free-text status name against the transitions available on an
 * issue. Tiers are tried in order (exact, prefix, contains) and the first
 * non-empty one wins. Ties are broken by name length, then lowercase name,
 * then id, so the same inputs always select the same transition.
 */
export function matchTransition(transitions: readonly Transition[], queryName: string): MatchOutcome {
  const query = queryName.trim();
  if (!query) {
    throw new EmptyQueryError();
  }

  const queryLower = query.toLowerCase();
  const exact: Transition[] = [];
  const prefix: Transition[] = [];
  const contains: ScoredTransition[] = [];

  for (const transition of transitions) {
    const nameLower = transition.name.toLowerCase();
    if (nameLower === queryLower) {
      exact.push(transition);
    } else if (nameLower.startsWith(queryLower)) {
      prefix.push(transition);
    } else {
      const index = nameLower.indexOf(queryLower);
      if (index >= 0) {
        contains.push({ transition, index });
      }
    }
  }

  // Exact matches never carry a warning.
  if (exact.length > 0) {
    return { selected: pickBestTransition(exact), matchedBy: "exact" };
  }
  if (prefix.length > 0) {
    return buildOutcome(query, prefix, "prefix");
  }
  if (contains.length > 0) {
    const ranked = [...contains].sort(compareByOccurrence).map((entry) => entry.transition);
    return buildOutcome(query, ranked, "contains");
  }

  throw new NoMatchError(
    query,
    transitions.map((transition) => transition.name)
  );
}

export function pickBestTransition(candidates: readonly Transition[]): Transition {
  const [first] = candidates.length === 1 ? candidates : [...candidates].sort(compareForTieBreak);
  if (!first) {
    throw new RangeError("pickBestTransition requires at least one candidate");
  }
  return first;
}

export function formatAmbiguityWarning(
  query: string,
  candidates: readonly Transition[],
  selected: Transition
): string | undefined {
  if (candidates.length <= 1) {
    return undefined;
  }
  const names = candidates.map((candidate) => candidate.name).join(", ");
  return `status ${JSON.stringify(query)} matched multiple transitions (${names}); using ${JSON.stringify(selected.name)}`;
}

function buildOutcome(query: string, candidates: readonly Transition[], matchedBy: MatchTier): MatchOutcome {
  const selected = pickBestTransition(candidates);
  const ambiguityWarning = formatAmbiguityWarning(query, candidates, selected);
  return ambiguityWarning ? { selected, matchedBy, ambiguityWarning } : { selected, matchedBy };
}

function compareByOccurrence(a: ScoredTransition, b: ScoredTransition): number {
  if (a.index !== b.index) {
    return a.index - b.index;
  }
  return (
    compareStrings(a.transition.name.toLowerCase(), b.transition.name.toLowerCase()) ||
    a.transition.name.length - b.transition.name.length
  );
}

function compareForTieBreak(a: Transition, b: Transition): number {
  if (a.name.length !== b.name.length) {
    return a.name.length - b.name.length;
  }
  return compareStrings(a.name.toLowerCase(), b.name.toLowerCase()) || compareStrings(a.id, b.id);
}

// Code-unit order, independent of locale.
function compareStrings(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
