/**
 * Tag Resolver
 *
 * Maps a variant to its registry targets from the configured tag
 * convention. Pure: the same inputs always give the same targets.
 */

import { Success, type ImageVariant, type PublishTarget, type Result } from '@/types';
import { publishFailure } from '@/lib/errors';
import { isValidTag, parseRepository } from '@/lib/image-ref';
import type { TagConvention } from '@/config/schema';

/**
 * Substitute `{baseTag}` and `{variant}` in a tag template.
 */
export function renderTagTemplate(template: string, baseTag: string, variant: string): string {
  return template.split('{baseTag}').join(baseTag).split('{variant}').join(variant);
}

function ownEntry<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Resolve the targets of one variant. The canonical tag (from `rules`)
 * comes first, followed by alias tags; duplicates are dropped.
 *
 * @example
 * ```typescript
 * resolveTags(debug, 'ghcr.io/henn-dt/open-webui', {
 *   baseTag: 'rag-debug',
 *   rules: { debug: '{baseTag}' },
 *   aliases: {},
 * });
 * // => [{ registry: 'ghcr.io', repository: 'henn-dt/open-webui', tag: 'rag-debug' }]
 * ```
 */
export function resolveTags(
  variant: Pick<ImageVariant, 'name'>,
  baseRepository: string,
  convention: TagConvention,
): Result<PublishTarget[]> {
  const rule = ownEntry(convention.rules, variant.name);
  if (rule === undefined) {
    return publishFailure({ kind: 'UnknownVariant', variant: variant.name });
  }

  const repository = parseRepository(baseRepository);
  if (!repository.ok) return repository;

  const templates = [rule, ...(ownEntry(convention.aliases, variant.name) ?? [])];
  const tags = [...new Set(templates.map((template) => renderTagTemplate(template, convention.baseTag, variant.name)))];

  const invalid = tags.filter((tag) => !isValidTag(tag));
  if (invalid.length > 0) {
    return publishFailure({
      kind: 'ConfigInvalid',
      issues: invalid.map((tag) => `variant "${variant.name}" renders invalid tag "${tag}"`),
    });
  }

  return Success(tags.map((tag) => ({ ...repository.value, tag })));
}

/**
 * Resolve every variant and reject tags claimed by more than one variant.
 * The first failing variant (in order) decides the error.
 */
export function resolveAllTags(
  variants: ReadonlyArray<Pick<ImageVariant, 'name'>>,
  baseRepository: string,
  convention: TagConvention,
): Result<Map<string, PublishTarget[]>> {
  const resolved = new Map<string, PublishTarget[]>();
  const owners = new Map<string, string>();
  const collisions: string[] = [];

  for (const variant of variants) {
    const targets = resolveTags(variant, baseRepository, convention);
    if (!targets.ok) return targets;

    for (const target of targets.value) {
      const owner = owners.get(target.tag);
      if (owner !== undefined && owner !== variant.name) {
        collisions.push(`tag "${target.tag}" is claimed by variants "${owner}" and "${variant.name}"`);
      } else {
        owners.set(target.tag, variant.name);
      }
    }
    resolved.set(variant.name, targets.value);
  }

  if (collisions.length > 0) {
    return publishFailure({ kind: 'ConfigInvalid', issues: collisions });
  }
  return Success(resolved);
}
