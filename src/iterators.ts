/**
 * Walks over the linked lists and nested arrays found in scene structs.
 */
import type { Block, FieldPath } from './block.js';
import { STRIP_TYPE } from './constants/scene-dna.js';

/** Maximum list length walked before assuming a corrupt, looping list. */
const MAX_LIST_LENGTH = 1_000_000;

/**
 * Follows `next` pointers starting at `first`. Stops at a null or dangling
 * pointer, and when a block repeats.
 */
export function* listbase(first: Block | undefined, nextField: FieldPath = 'next'): Generator<Block> {
  const seen = new Set<bigint>();
  let current = first;
  while (current && !seen.has(current.address) && seen.size < MAX_LIST_LENGTH) {
    seen.add(current.address);
    yield current;
    current = current.getBlock(nextField);
  }
}

/** Items of the `ListBase` stored at `field` (e.g. `gobject`, `nodes`). */
export function listbaseField(owner: Block, field: string, nextField: FieldPath = 'next'): Generator<Block> {
  return listbase(owner.getBlock([field, 'first']), nextField);
}

/**
 * Modifiers of an object. Each block is typed with its own modifier struct,
 * whose list links live in the embedded `modifier` header.
 */
export function modifiers(object: Block): Generator<Block> {
  return listbaseField(object, 'modifiers', ['modifier', 'next']);
}

/** `modifier.type` of a modifier block, or `undefined` when unreadable. */
export function modifierType(modifier: Block): number | undefined {
  return modifier.hasField(['modifier', 'type']) ? modifier.getNumber(['modifier', 'type']) : undefined;
}

/**
 * Sequencer strips of an `Editing` block, with their type, recursing into
 * meta strips.
 */
export function* sequencerStrips(editing: Block): Generator<{ readonly strip: Block; readonly type: number }> {
  const visited = new Set<bigint>();

  function* walk(first: Block | undefined): Generator<{ readonly strip: Block; readonly type: number }> {
    for (const strip of listbase(first)) {
      if (visited.has(strip.address) || !strip.hasField('type')) {
        continue;
      }
      visited.add(strip.address);
      const type = strip.getNumber('type');
      yield { strip, type };
      if (type === STRIP_TYPE.META && strip.hasField('seqbase')) {
        yield* walk(strip.getBlock(['seqbase', 'first']));
      }
    }
  }

  const root = editing.hasField('seqbase') ? editing.getBlock(['seqbase', 'first']) : undefined;
  yield* walk(root);
}
