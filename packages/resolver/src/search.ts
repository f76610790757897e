// packages/resolver/src/search.ts
import { NOT_FOUND, entriesOf, found, viewNode } from '@featflat/core';
import type { JsonObject, JsonValue, Outcome } from '@featflat/core';

/**
 * Depth-first, pre-order key lookup.
 *
 * Keys of a mapping are visited in document order (see `entriesOf`); the
 * first key equal to `name` wins, whatever its depth. Mapping values are descended into, and so
 * are the mapping elements of a sequence value. Scalars and sequences nested
 * directly in sequences are skipped.
 */
export function search(node: JsonValue, name: string): Outcome {
  const view = viewNode(node);
  if (view.kind !== 'mapping') return NOT_FOUND;
  return searchMapping(view.value, name);
}

function searchMapping(obj: JsonObject, name: string): Outcome {
  for (const [key, value] of entriesOf(obj)) {
    if (key === name) return found(value);

    const view = viewNode(value);
    switch (view.kind) {
      case 'mapping': {
        const hit = searchMapping(view.value, name);
        if (hit.found) return hit;
        break;
      }
      case 'sequence': {
        for (const item of view.value) {
          const itemView = viewNode(item);
          if (itemView.kind !== 'mapping') continue;
          const hit = searchMapping(itemView.value, name);
          if (hit.found) return hit;
        }
        break;
      }
      case 'scalar':
        break;
    }
  }
  return NOT_FOUND;
}
