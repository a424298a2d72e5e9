/**
 * Tag predicates
 *
 * Three matching modes, chosen per resource type:
 * - exact:     `z_team` tag values on clusters and jobs
 * - substring: instance-profile ARNs and group file names
 * - team name: team directory and artifact names
 */

/** Prefix some team tags carry that team directory names omit */
export const TEAM_TAG_PREFIX = 'team_';

/**
 * ARNs and group names cannot contain `_`, so tags are compared in hyphenated form
 */
export function hyphenate(tag: string): string {
  return tag.replace(/_/g, '-');
}

/**
 * Strip the `team_` prefix, or `undefined` when the tag does not carry it
 */
export function stripTeamPrefix(tag: string): string | undefined {
  if (!tag.startsWith(TEAM_TAG_PREFIX)) return undefined;
  const stripped = tag.slice(TEAM_TAG_PREFIX.length);
  return stripped.length > 0 ? stripped : undefined;
}

/**
 * Exact, case-sensitive match of a `z_team` value against the requested tags.
 * A record without the tag never matches.
 */
export function matchesExactTag(teamTag: string | undefined, tags: readonly string[]): boolean {
  return teamTag !== undefined && tags.includes(teamTag);
}

/**
 * Match when any hyphenated tag occurs inside the identifier
 */
export function matchesSubstringTag(identifier: string | undefined, tags: readonly string[]): boolean {
  if (identifier === undefined) return false;
  return tags.some((tag) => identifier.includes(hyphenate(tag)));
}

/**
 * Every spelling a team directory may use for a tag: as given, hyphenated,
 * and without the `team_` prefix
 */
export function teamNameForms(tag: string): string[] {
  const forms = new Set<string>([tag, hyphenate(tag)]);
  const stripped = stripTeamPrefix(tag);
  if (stripped !== undefined) {
    forms.add(stripped);
  }
  return [...forms];
}

export function matchesTeamName(teamName: string | undefined, tags: readonly string[]): boolean {
  if (teamName === undefined || teamName === '') return false;
  return tags.some((tag) => teamNameForms(tag).includes(teamName));
}
