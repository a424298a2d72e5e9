/**
 * ACL object-id parsing
 *
 * ACL records reference their parent through an encoded path such as
 * `/clusters/0101-123456-abc` or `/notebooks/42`.
 */

export const ACL_PREFIXES = {
  clusters: '/clusters/',
  jobs: '/jobs/',
  directories: '/directories/',
  notebooks: '/notebooks/',
} as const;

export type AclKind = keyof typeof ACL_PREFIXES;

export type ObjectIdParseResult =
  | { ok: true; id: string }
  | { ok: false; reason: string };

/**
 * Extract the parent identifier from an ACL `object_id`.
 *
 * The value must start with the prefix for `kind` and carry a single,
 * non-empty path segment after it.
 */
export function parseObjectId(objectId: string | undefined, kind: AclKind): ObjectIdParseResult {
  const prefix = ACL_PREFIXES[kind];

  if (objectId === undefined) {
    return { ok: false, reason: 'missing object_id' };
  }
  if (!objectId.startsWith(prefix)) {
    return { ok: false, reason: `object_id "${objectId}" does not start with "${prefix}"` };
  }

  const id = objectId.slice(prefix.length);
  if (id === '' || id.includes('/')) {
    return { ok: false, reason: `object_id "${objectId}" has no single identifier after "${prefix}"` };
  }

  return { ok: true, id };
}
